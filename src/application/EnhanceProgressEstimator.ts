export type EnhancePhase = 'enhancing' | 'complete' | 'failed';

export interface EnhanceStatus {
    phase: EnhancePhase;
    /** Cosmetic percentage; never above 99 while enhancing */
    percent: number;
}

/**
 * Percent "enhanced" from wall-clock time relative to the input's duration.
 * This is UX smoothing, not render progress: a slow encode sits at 99.
 */
export function estimateEnhancePercent(elapsedSeconds: number, inputDurationSeconds: number): number {
    if (inputDurationSeconds <= 0 || elapsedSeconds <= 0) {
        return 0;
    }
    return Math.floor(Math.min(99, (elapsedSeconds / inputDurationSeconds) * 100));
}

export interface EnhanceProgressEstimatorOptions {
    intervalMs?: number;
    now?: () => number;
}

/**
 * Republishes the cosmetic percentage every second until told the render is complete or failed.
 */
export class EnhanceProgressEstimator {
    private timer?: NodeJS.Timeout;
    private startedAt = 0;
    private lastStatus: EnhanceStatus = { phase: 'enhancing', percent: 0 };
    private readonly listeners = new Set<(status: EnhanceStatus) => void>();
    private readonly intervalMs: number;
    private readonly now: () => number;

    constructor(
        private readonly inputDurationSeconds: number,
        options: EnhanceProgressEstimatorOptions = {}
    ) {
        this.intervalMs = options.intervalMs ?? 1000;
        this.now = options.now ?? Date.now;
    }

    get status(): EnhanceStatus {
        return this.lastStatus;
    }

    onStatus(listener: (status: EnhanceStatus) => void): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    start(): void {
        if (this.timer) {
            return;
        }
        this.startedAt = this.now();
        this.tick();
        this.timer = setInterval(() => this.tick(), this.intervalMs);
        this.timer.unref();
    }

    complete(): void {
        this.finish({ phase: 'complete', percent: 100 });
    }

    fail(): void {
        this.finish({ phase: 'failed', percent: this.lastStatus.percent });
    }

    stop(): void {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = undefined;
        }
    }

    private tick(): void {
        const elapsedSeconds = (this.now() - this.startedAt) / 1000;
        this.publish({ phase: 'enhancing', percent: estimateEnhancePercent(elapsedSeconds, this.inputDurationSeconds) });
    }

    private finish(status: EnhanceStatus): void {
        if (this.lastStatus.phase !== 'enhancing') {
            return;
        }
        this.stop();
        this.publish(status);
    }

    private publish(status: EnhanceStatus): void {
        this.lastStatus = status;
        for (const listener of [...this.listeners]) {
            listener(status);
        }
    }
}
