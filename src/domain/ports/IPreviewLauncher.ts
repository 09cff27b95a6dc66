import { DisplayGeometry } from './IDisplayProvider';

/**
 * A running preview window.
 */
export interface PreviewProcess {
    readonly display: DisplayGeometry;
    readonly path: string;
    hasExited(): boolean;
    /** The window never started (e.g. the player binary is missing). Relaunching will not help. */
    hasFailed(): boolean;
    stop(): void;
}

export interface PreviewLaunchOptions {
    /** Loop forever instead of playing once */
    loop: boolean;
}

/**
 * Port for starting a borderless video window on a display.
 * Implementations: FfplayPreviewLauncher
 */
export interface IPreviewLauncher {
    launch(path: string, display: DisplayGeometry, options: PreviewLaunchOptions): PreviewProcess;
}
