import { ChildProcess, spawn } from 'child_process';
import { DisplayGeometry } from '../../domain/ports/IDisplayProvider';
import { IPreviewLauncher, PreviewLaunchOptions, PreviewProcess } from '../../domain/ports/IPreviewLauncher';
import { IMediaPlayer } from '../../domain/ports/IMediaPlayer';

export function buildFfplayArgs(filePath: string, display: DisplayGeometry, loop: boolean): string[] {
    return [
        '-noborder',
        ...(loop ? ['-loop', '0'] : ['-autoexit']),
        '-x', String(display.width),
        '-y', String(display.height),
        '-left', String(display.x),
        '-top', String(display.y),
        '-loglevel', 'quiet',
        '-vf', 'fps=24',
        filePath,
    ];
}

class FfplayProcess implements PreviewProcess {
    private exited = false;
    private failed = false;

    constructor(
        readonly display: DisplayGeometry,
        readonly path: string,
        private readonly child: ChildProcess
    ) {
        child.on('exit', () => {
            this.exited = true;
        });
        child.on('error', (error) => {
            this.exited = true;
            this.failed = true;
            console.warn(`[Preview] ffplay failed for ${path}: ${error.message}`);
        });
    }

    hasExited(): boolean {
        return this.exited;
    }

    hasFailed(): boolean {
        return this.failed;
    }

    stop(): void {
        if (!this.exited) {
            this.child.kill('SIGTERM');
        }
    }
}

/**
 * Borderless ffplay windows positioned on a display.
 */
export class FfplayPreviewLauncher implements IPreviewLauncher {
    constructor(private readonly binary: string = 'ffplay') { }

    launch(filePath: string, display: DisplayGeometry, options: PreviewLaunchOptions): PreviewProcess {
        const child = spawn(this.binary, buildFfplayArgs(filePath, display, options.loop), { stdio: 'ignore' });
        return new FfplayProcess(display, filePath, child);
    }
}

/**
 * Plays on the primary display once per launch; KioskLoop restarts it when it ends.
 */
export class FfplayMediaPlayer implements IMediaPlayer {
    private current?: PreviewProcess;
    private currentPath?: string;

    constructor(
        private readonly launcher: IPreviewLauncher,
        private readonly display: DisplayGeometry
    ) { }

    play(filePath: string): void {
        this.stop();
        this.currentPath = filePath;
        this.current = this.launcher.launch(filePath, this.display, { loop: false });
    }

    /**
     * False for a window that failed to start, so the clip is not relaunched in a loop.
     */
    hasEnded(): boolean {
        return this.current !== undefined && this.current.hasExited() && !this.current.hasFailed();
    }

    restart(): void {
        if (this.currentPath) {
            this.play(this.currentPath);
        }
    }

    stop(): void {
        this.current?.stop();
        this.current = undefined;
    }
}
