import { Artifact } from './Artifact';
import { PipelineErrorCode } from '../errors/PipelineError';

/**
 * Possible states of the single pipeline run of a kiosk session.
 */
export type PipelineState =
    | 'idle'
    | 'attaching'
    | 'rendering'
    | 'post_processing'
    | 'ready_for_upload'
    | 'uploading'
    | 'delivered'
    | 'failed';

/**
 * Forward order of the non-failure states. Each state may only advance to the next one.
 */
export const PIPELINE_STATE_ORDER: readonly PipelineState[] = [
    'idle',
    'attaching',
    'rendering',
    'post_processing',
    'ready_for_upload',
    'uploading',
    'delivered',
];

export interface PipelineFailure {
    code: PipelineErrorCode | 'Unknown';
    /** Technical message for the logs */
    message: string;
    /** Message shown on the kiosk screen */
    displayMessage: string;
}

export interface DeliveryOutcome {
    recipient: string;
    channel: 'email' | 'sms';
    delivered: boolean;
    error?: string;
}

/**
 * PipelineRun is the observable state of one capture → enhance → deliver run.
 */
export interface PipelineRun {
    readonly id: string;
    readonly state: PipelineState;
    readonly failure?: PipelineFailure;
    /** The enhanced, post-processed clip (set once post-processing is done) */
    readonly artifact?: Artifact;
    /** Shareable link produced by the upload */
    readonly resultReference?: string;
    readonly deliveries?: readonly DeliveryOutcome[];
    readonly createdAt: Date;
    readonly updatedAt: Date;
}

export function isTerminalState(state: PipelineState): boolean {
    return state === 'delivered' || state === 'failed';
}

/**
 * True when `to` is the next forward state of `from`, or `to` is `failed` and `from` is not terminal.
 */
export function canTransition(from: PipelineState, to: PipelineState): boolean {
    if (isTerminalState(from)) {
        return false;
    }
    if (to === 'failed') {
        return true;
    }
    return PIPELINE_STATE_ORDER.indexOf(to) === PIPELINE_STATE_ORDER.indexOf(from) + 1;
}

/**
 * True once the run has reached (or passed) `state` without failing.
 */
export function hasReached(run: PipelineRun, state: PipelineState): boolean {
    if (run.state === 'failed') {
        return false;
    }
    return PIPELINE_STATE_ORDER.indexOf(run.state) >= PIPELINE_STATE_ORDER.indexOf(state);
}

export function createPipelineRun(id: string): PipelineRun {
    if (!id.trim()) {
        throw new Error('PipelineRun id cannot be empty');
    }
    const now = new Date();
    return {
        id: id.trim(),
        state: 'idle',
        createdAt: now,
        updatedAt: now,
    };
}

/**
 * Advances a run to its next state, returning a new object.
 */
export function advanceRun(
    run: PipelineRun,
    state: Exclude<PipelineState, 'failed'>,
    updates: Partial<Pick<PipelineRun, 'artifact' | 'resultReference' | 'deliveries'>> = {}
): PipelineRun {
    if (!canTransition(run.state, state)) {
        throw new Error(`Invalid pipeline transition: ${run.state} -> ${state}`);
    }
    return {
        ...run,
        ...updates,
        state,
        updatedAt: new Date(),
    };
}

/**
 * Marks a run as failed. Failing an already terminal run is an error.
 */
export function failRun(run: PipelineRun, failure: PipelineFailure): PipelineRun {
    if (!canTransition(run.state, 'failed')) {
        throw new Error(`Invalid pipeline transition: ${run.state} -> failed`);
    }
    return {
        ...run,
        state: 'failed',
        failure,
        updatedAt: new Date(),
    };
}
