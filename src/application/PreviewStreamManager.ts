import { IDisplayProvider } from '../domain/ports/IDisplayProvider';
import { IPreviewLauncher, PreviewProcess } from '../domain/ports/IPreviewLauncher';

/**
 * Owns the looping preview windows on the auxiliary displays (every display but the first).
 * Exactly one generation of preview processes is alive at a time.
 */
export class PreviewStreamManager {
    private generation: PreviewProcess[] = [];
    private currentPath?: string;

    constructor(
        private readonly displays: IDisplayProvider,
        private readonly launcher: IPreviewLauncher
    ) { }

    get activePath(): string | undefined {
        return this.currentPath;
    }

    get activeProcesses(): readonly PreviewProcess[] {
        return this.generation;
    }

    /**
     * Stops the current generation, then loops `path` on every auxiliary display.
     */
    show(path: string): void {
        this.stopAll();

        const auxiliary = this.displays.listDisplays().slice(1);
        const next: PreviewProcess[] = [];
        for (const display of auxiliary) {
            try {
                next.push(this.launcher.launch(path, display, { loop: true }));
            } catch (error) {
                console.warn(`[Preview] Could not start preview on display at ${display.x},${display.y}:`, error);
            }
        }

        this.generation = next;
        this.currentPath = path;
        console.log(`[Preview] Looping ${path} on ${next.length} auxiliary display(s)`);
    }

    /**
     * Relaunches preview windows that exited on their own. Returns how many came back.
     */
    revive(): number {
        if (!this.currentPath) {
            return 0;
        }
        let revived = 0;
        this.generation = this.generation.map((process) => {
            if (!process.hasExited() || process.hasFailed()) {
                return process;
            }
            try {
                const relaunched = this.launcher.launch(process.path, process.display, { loop: true });
                revived++;
                return relaunched;
            } catch (error) {
                console.warn(`[Preview] Could not revive preview on display at ${process.display.x},${process.display.y}:`, error);
                return process;
            }
        });
        return revived;
    }

    stopAll(): void {
        for (const process of this.generation) {
            try {
                process.stop();
            } catch (error) {
                console.warn('[Preview] Failed to stop preview process:', error);
            }
        }
        this.generation = [];
        this.currentPath = undefined;
    }
}
