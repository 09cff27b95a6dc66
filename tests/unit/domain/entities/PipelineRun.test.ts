import {
    PipelineRun,
    advanceRun,
    canTransition,
    createPipelineRun,
    failRun,
    hasReached,
    isTerminalState,
} from '../../../../src/domain/entities/PipelineRun';

const failure = { code: 'RenderFailed' as const, message: 'boom', displayMessage: 'Sorry' };

function runAt(...states: Array<Exclude<PipelineRun['state'], 'failed' | 'idle'>>): PipelineRun {
    return states.reduce((run, state) => advanceRun(run, state), createPipelineRun('run_test'));
}

describe('PipelineRun', () => {
    describe('createPipelineRun', () => {
        it('should start idle with matching timestamps', () => {
            const run = createPipelineRun('run_1');

            expect(run.id).toBe('run_1');
            expect(run.state).toBe('idle');
            expect(run.createdAt).toEqual(run.updatedAt);
        });

        it('should reject an empty id', () => {
            expect(() => createPipelineRun('  ')).toThrow('PipelineRun id cannot be empty');
        });
    });

    describe('canTransition', () => {
        it('should allow only the next forward state', () => {
            expect(canTransition('idle', 'attaching')).toBe(true);
            expect(canTransition('attaching', 'rendering')).toBe(true);
            expect(canTransition('ready_for_upload', 'uploading')).toBe(true);
            expect(canTransition('idle', 'rendering')).toBe(false);
            expect(canTransition('rendering', 'attaching')).toBe(false);
        });

        it('should allow failing from any non-terminal state', () => {
            expect(canTransition('idle', 'failed')).toBe(true);
            expect(canTransition('uploading', 'failed')).toBe(true);
        });

        it('should not leave terminal states', () => {
            expect(canTransition('delivered', 'failed')).toBe(false);
            expect(canTransition('failed', 'attaching')).toBe(false);
            expect(isTerminalState('delivered')).toBe(true);
            expect(isTerminalState('failed')).toBe(true);
            expect(isTerminalState('uploading')).toBe(false);
        });
    });

    describe('advanceRun', () => {
        it('should return a new run carrying the updates', () => {
            const run = runAt('attaching', 'rendering', 'post_processing');
            const artifact = { path: '/out/clip_enhanced.mp4', durationSeconds: 12 };

            const next = advanceRun(run, 'ready_for_upload', { artifact });

            expect(next).not.toBe(run);
            expect(next.state).toBe('ready_for_upload');
            expect(next.artifact).toEqual(artifact);
            expect(run.state).toBe('post_processing');
        });

        it('should throw on a skipped state', () => {
            expect(() => advanceRun(createPipelineRun('run_1'), 'uploading'))
                .toThrow('Invalid pipeline transition: idle -> uploading');
        });
    });

    describe('failRun', () => {
        it('should record the failure', () => {
            const failed = failRun(runAt('attaching'), failure);

            expect(failed.state).toBe('failed');
            expect(failed.failure).toEqual(failure);
        });

        it('should refuse to fail a delivered run', () => {
            const delivered = runAt('attaching', 'rendering', 'post_processing', 'ready_for_upload', 'uploading', 'delivered');
            expect(() => failRun(delivered, failure)).toThrow('Invalid pipeline transition: delivered -> failed');
        });
    });

    describe('hasReached', () => {
        it('should be true at and after the state', () => {
            const run = runAt('attaching', 'rendering', 'post_processing', 'ready_for_upload', 'uploading');

            expect(hasReached(run, 'ready_for_upload')).toBe(true);
            expect(hasReached(run, 'uploading')).toBe(true);
            expect(hasReached(run, 'delivered')).toBe(false);
        });

        it('should be false for a failed run', () => {
            expect(hasReached(failRun(runAt('attaching'), failure), 'idle')).toBe(false);
        });
    });
});
