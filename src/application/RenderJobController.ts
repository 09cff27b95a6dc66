import { IRenderEngineSession, RenderJobHandle } from '../domain/ports/IRenderEngine';
import { RenderJobSpec, buildOutputPath, toSettingsBundle } from '../domain/entities/RenderJobSpec';
import {
    ProjectUnavailableError,
    RenderFailedError,
    RenderTimeoutError,
} from '../domain/errors/PipelineError';
import { PollTimeoutError, isRetryableHttpError, pollUntil } from '../infrastructure/retry/RetryUtils';

export interface RenderJobControllerOptions {
    /** Project the render runs in */
    projectName: string;
    /** Project file imported when the project is not in the engine yet */
    templatePath: string;
    /** Status check cadence (default: 500ms) */
    pollIntervalMs?: number;
    /** Heartbeat log cadence (default: 5000ms) */
    logIntervalMs?: number;
    /** Polling ceiling. 0 or absent waits indefinitely. */
    timeoutMs?: number;
    /** Consecutive transient status-read failures tolerated before the render is abandoned (default: 5) */
    statusReadMaxFailures?: number;
}

export interface PollCadence {
    pollIntervalMs: number;
    logIntervalMs: number;
}

/**
 * RenderJobController configures and drives the single render job of a run.
 */
export class RenderJobController {
    private readonly cadence: PollCadence;

    constructor(private readonly options: RenderJobControllerOptions) {
        this.cadence = {
            pollIntervalMs: options.pollIntervalMs ?? 500,
            logIntervalMs: options.logIntervalMs ?? 5000,
        };
    }

    /**
     * Loads the project, applies the settings bundle, clears old jobs and submits exactly one job.
     */
    async submit(session: IRenderEngineSession, spec: RenderJobSpec): Promise<RenderJobHandle> {
        await this.ensureProject(session);

        const bundle = toSettingsBundle(spec);
        console.log(`[Render] Applying settings → ${bundle.customName}.${bundle.format} (${bundle.videoCodec}, ${bundle.quality})`);
        if (!(await session.applySettings(bundle))) {
            throw new RenderFailedError('Render engine rejected the render settings');
        }

        await session.clearRenderJobs();

        const handle = await session.submitJob();
        if (!handle) {
            throw new RenderFailedError('Failed to queue a render job');
        }

        console.log(`[Render] ▶ Render job ${handle} started`);
        return handle;
    }

    /**
     * Polls the job until the engine reports it finished.
     * @returns `{outputDir}/{baseName}_enhanced.{ext}`
     */
    async awaitCompletion(
        session: IRenderEngineSession,
        handle: RenderJobHandle,
        spec: RenderJobSpec,
        cadence: PollCadence = this.cadence
    ): Promise<string> {
        const maxFailures = this.options.statusReadMaxFailures ?? 5;
        let consecutiveFailures = 0;

        try {
            await pollUntil(async () => {
                try {
                    const inProgress = await session.isJobInProgress(handle);
                    consecutiveFailures = 0;
                    return !inProgress;
                } catch (error) {
                    consecutiveFailures++;
                    if (!isRetryableHttpError(error) || consecutiveFailures > maxFailures) {
                        throw error;
                    }
                    console.warn(`[Render] Status read failed (${consecutiveFailures}/${maxFailures}): ${errorMessage(error)}`);
                    return false;
                }
            }, {
                intervalMs: cadence.pollIntervalMs,
                heartbeatIntervalMs: cadence.logIntervalMs,
                timeoutMs: this.options.timeoutMs,
                onHeartbeat: async (elapsedMs) => {
                    const progress = await this.readProgress(session, handle);
                    const percent = progress === undefined ? '' : ` ${Math.round(progress)}%`;
                    console.log(`[Render] Rendering in progress...${percent} (${Math.round(elapsedMs / 1000)}s)`);
                },
            });
        } catch (error) {
            if (error instanceof PollTimeoutError) {
                throw new RenderTimeoutError(error.timeoutMs);
            }
            throw error;
        }

        const engineError = session.getJobError ? await session.getJobError(handle) : undefined;
        if (engineError) {
            throw new RenderFailedError(`Render job ${handle} failed: ${engineError}`);
        }

        const outputPath = buildOutputPath(spec);
        console.log(`[Render] ✅ Render finished. Output: ${outputPath}`);
        return outputPath;
    }

    private async readProgress(session: IRenderEngineSession, handle: RenderJobHandle): Promise<number | undefined> {
        if (!session.getJobProgress) {
            return undefined;
        }
        try {
            return await session.getJobProgress(handle);
        } catch (error) {
            console.warn(`[Render] Progress read failed: ${errorMessage(error)}`);
            return undefined;
        }
    }

    private async ensureProject(session: IRenderEngineSession): Promise<void> {
        const { projectName, templatePath } = this.options;
        console.log(`[Render] Loading project '${projectName}'...`);
        if (await session.loadProject(projectName)) {
            return;
        }

        console.log(`[Render] Importing template from ${templatePath}...`);
        const imported = await session.importProject(templatePath);
        if (!imported) {
            throw new ProjectUnavailableError(projectName, `template ${templatePath} could not be imported`);
        }
        if (!(await session.loadProject(projectName))) {
            throw new ProjectUnavailableError(projectName, 'template imported but the project still does not load');
        }
        console.log(`[Render] Project '${projectName}' loaded from template`);
    }
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
