/**
 * Port for playback on the primary display.
 * Implementations: FfplayMediaPlayer, NullMediaPlayer
 */
export interface IMediaPlayer {
    play(path: string): void;
    hasEnded(): boolean;
    restart(): void;
    stop(): void;
}

/**
 * Player used when the kiosk has no primary-display playback.
 */
export class NullMediaPlayer implements IMediaPlayer {
    play(_path: string): void { }

    hasEnded(): boolean {
        return false;
    }

    restart(): void { }

    stop(): void { }
}
