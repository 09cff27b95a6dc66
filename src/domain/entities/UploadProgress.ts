/**
 * Progress of the upload, written only by the TransferUploader.
 */
export interface UploadProgress {
    /** In [0, 1] */
    fractionComplete: number;
    estimatedSecondsRemaining: number;
    done: boolean;
    resultReference?: string;
}

export function createUploadProgress(): UploadProgress {
    return {
        fractionComplete: 0,
        estimatedSecondsRemaining: 0,
        done: false,
    };
}

/**
 * Linear ETA: elapsed * (1 - fraction) / fraction, floored to whole seconds. Zero before any progress.
 */
export function estimateSecondsRemaining(elapsedSeconds: number, fraction: number): number {
    if (fraction <= 0 || elapsedSeconds <= 0) {
        return 0;
    }
    if (fraction >= 1) {
        return 0;
    }
    return Math.floor((elapsedSeconds * (1 - fraction)) / fraction);
}

/**
 * Applies a new chunk report. The fraction never moves backwards.
 */
export function advanceUploadProgress(
    current: UploadProgress,
    reportedFraction: number,
    elapsedSeconds: number
): UploadProgress {
    const clamped = Math.min(1, Math.max(0, reportedFraction));
    const fractionComplete = Math.max(current.fractionComplete, clamped);
    return {
        ...current,
        fractionComplete,
        estimatedSecondsRemaining: estimateSecondsRemaining(elapsedSeconds, fractionComplete),
    };
}

export function completeUploadProgress(resultReference: string): UploadProgress {
    return {
        fractionComplete: 1,
        estimatedSecondsRemaining: 0,
        done: true,
        resultReference,
    };
}
