import { RenderSettingsBundle } from '../entities/RenderJobSpec';

/**
 * Opaque identifier of a submitted render job.
 */
export type RenderJobHandle = string;

/**
 * A scripting session attached to a running render engine.
 * Implementations: RemoteRenderSession, FFmpegRenderSession
 */
export interface IRenderEngineSession {
    /** @returns false when the project does not exist in the engine */
    loadProject(name: string): Promise<boolean>;

    /** Imports a project file into the engine's project library. */
    importProject(filePath: string): Promise<boolean>;

    /** Applies the whole bundle in one call. */
    applySettings(bundle: RenderSettingsBundle): Promise<boolean>;

    clearRenderJobs(): Promise<void>;

    /**
     * Queues and starts one render job.
     * @returns null when the engine refused the job
     */
    submitJob(): Promise<RenderJobHandle | null>;

    isJobInProgress(handle: RenderJobHandle): Promise<boolean>;

    /** Percent complete (0-100), when the engine reports it. */
    getJobProgress?(handle: RenderJobHandle): Promise<number>;

    /** Error reported by the engine for a finished job, if any. */
    getJobError?(handle: RenderJobHandle): Promise<string | undefined>;

    /** Lets the engine shut down once the render is collected. */
    release?(): Promise<void>;
}

/**
 * IRenderEngine - Port for the external rendering engine process.
 * Implementations: RemoteRenderEngine, FFmpegRenderEngine
 */
export interface IRenderEngine {
    readonly name: string;

    /** False when the binary or its scripting support is absent. */
    isInstalled(): Promise<boolean>;

    isRunning(): Promise<boolean>;

    /** @returns null when no engine is reachable yet */
    connect(): Promise<IRenderEngineSession | null>;

    /** Starts the engine process. Safe to call when it is already running. */
    launch(): Promise<void>;
}
