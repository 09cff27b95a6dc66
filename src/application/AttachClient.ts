import { IRenderEngine, IRenderEngineSession } from '../domain/ports/IRenderEngine';
import { AttachExhaustedError, RenderEngineMissingError } from '../domain/errors/PipelineError';
import { withRetry } from '../infrastructure/retry/RetryUtils';

class EngineNotReachableError extends Error {
    constructor(engineName: string) {
        super(`Render engine "${engineName}" is not reachable yet`);
        this.name = 'EngineNotReachableError';
    }
}

/**
 * AttachClient establishes the scripting session with the render engine.
 *
 * The first attempt connects immediately. If nothing answers, the engine is launched
 * (once) and the connection is retried with a fixed delay until `maxAttempts`
 * attempts have been made in total.
 */
export class AttachClient {
    constructor(private readonly engine: IRenderEngine) { }

    async attach(maxAttempts: number, retryDelayMs: number): Promise<IRenderEngineSession> {
        if (!(await this.engine.isInstalled())) {
            throw new RenderEngineMissingError(this.engine.name);
        }

        let launched = false;
        const attempts = Math.max(1, maxAttempts);

        try {
            const session = await withRetry(async (attempt) => {
                console.log(`[Attach] Attempt ${attempt}/${attempts} to attach to ${this.engine.name}...`);
                const connected = await this.engine.connect();
                if (connected) {
                    return connected;
                }
                if (!launched) {
                    launched = true;
                    console.log(`[Attach] 🚀 Launching ${this.engine.name}...`);
                    await this.engine.launch();
                }
                throw new EngineNotReachableError(this.engine.name);
            }, {
                maxAttempts: attempts,
                initialBackoffMs: retryDelayMs,
                backoffMultiplier: 1,
                jitter: 0,
            });

            console.log(`[Attach] ✅ Attached to ${this.engine.name}`);
            return session;
        } catch (error) {
            console.error(`[Attach] ❌ Can't attach after ${attempts} attempts`);
            throw new AttachExhaustedError(attempts, error);
        }
    }
}
