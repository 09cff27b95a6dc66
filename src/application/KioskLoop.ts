import { IMediaPlayer } from '../domain/ports/IMediaPlayer';

export interface KioskLoopOptions {
    /** Playback-end check cadence (default: 500ms) */
    playbackPollIntervalMs?: number;
    /** Keep-alive cadence (default: 1000ms) */
    keepAliveIntervalMs?: number;
    onKeepAlive?: () => void;
}

/**
 * Foreground loop of the kiosk: restarts playback on the primary display when it ends
 * and emits a periodic keep-alive so the screen never looks idle.
 */
export class KioskLoop {
    private playbackTimer?: NodeJS.Timeout;
    private keepAliveTimer?: NodeJS.Timeout;

    constructor(
        private readonly player: IMediaPlayer,
        private readonly options: KioskLoopOptions = {}
    ) { }

    get running(): boolean {
        return this.playbackTimer !== undefined;
    }

    start(): void {
        if (this.running) {
            return;
        }
        this.playbackTimer = setInterval(() => this.pollPlayback(), this.options.playbackPollIntervalMs ?? 500);
        this.keepAliveTimer = setInterval(() => this.options.onKeepAlive?.(), this.options.keepAliveIntervalMs ?? 1000);
    }

    stop(): void {
        clearInterval(this.playbackTimer);
        clearInterval(this.keepAliveTimer);
        this.playbackTimer = undefined;
        this.keepAliveTimer = undefined;
    }

    private pollPlayback(): void {
        if (this.player.hasEnded()) {
            this.player.restart();
        }
    }
}
