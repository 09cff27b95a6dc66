import axios, { AxiosInstance } from 'axios';
import { spawn } from 'child_process';
import fs from 'fs';
import { IRenderEngine, IRenderEngineSession, RenderJobHandle } from '../../domain/ports/IRenderEngine';
import { RenderSettingsBundle } from '../../domain/entities/RenderJobSpec';

type SettingValue = string | number | boolean;

/**
 * Starts the engine executable. The default spawns it detached from the kiosk process.
 */
export type EngineLauncher = (executable: string, args: string[]) => void;

export interface RemoteRenderEngineOptions {
    /** Base URL of the engine's local scripting bridge, e.g. http://127.0.0.1:9237 */
    bridgeUrl: string;
    executablePath: string;
    launchArgs?: string[];
    requestTimeoutMs?: number;
    launcher?: EngineLauncher;
}

interface JobStatusResponse {
    status: 'Queued' | 'Rendering' | 'Complete' | 'Failed' | 'Cancelled';
    progress?: number;
    error?: string;
}

const IN_PROGRESS_STATUSES: ReadonlySet<JobStatusResponse['status']> = new Set(['Queued', 'Rendering']);

const spawnDetached: EngineLauncher = (executable, args) => {
    const child = spawn(executable, args, { detached: true, stdio: 'ignore' });
    child.on('error', (error) => {
        console.error(`[RemoteRender] Failed to launch ${executable}:`, error.message);
    });
    child.unref();
};

/**
 * Project-level settings the engine keeps on the timeline rather than on the render job.
 */
export function toProjectSettings(bundle: RenderSettingsBundle): Record<string, string> {
    if (!bundle.resolution) {
        return {};
    }
    const width = String(bundle.resolution.width);
    const height = String(bundle.resolution.height);
    return {
        timelineResolutionWidth: width,
        timelineResolutionHeight: height,
        timelineOutputResolutionWidth: width,
        timelineOutputResolutionHeight: height,
    };
}

/**
 * Maps a settings bundle to the engine's render-setting keys.
 */
export function toRenderSettings(bundle: RenderSettingsBundle): Record<string, SettingValue> {
    const settings: Record<string, SettingValue> = {
        SelectAllFrames: true,
        TargetDir: bundle.targetDir,
        CustomName: bundle.customName,
        Format: bundle.format,
        VideoCodec: bundle.videoCodec,
        ExportVideo: bundle.exportVideo,
        ExportAudio: bundle.exportAudio,
        Quality: bundle.quality,
    };
    if (bundle.encoder) {
        settings.Encoder = bundle.encoder;
    }
    return { ...settings, ...bundle.extra };
}

/**
 * Session over the engine's HTTP scripting bridge.
 */
export class RemoteRenderSession implements IRenderEngineSession {
    constructor(private readonly http: AxiosInstance) { }

    async loadProject(name: string): Promise<boolean> {
        const response = await this.http.post('/projects/load', { name }, { validateStatus: (s) => s === 200 || s === 404 });
        return response.status === 200;
    }

    async importProject(filePath: string): Promise<boolean> {
        const response = await this.http.post('/projects/import', { path: filePath }, { validateStatus: (s) => s < 500 });
        return response.status === 200;
    }

    async applySettings(bundle: RenderSettingsBundle): Promise<boolean> {
        const response = await this.http.put<{ applied?: boolean }>('/render/settings', {
            sourcePath: bundle.sourcePath,
            projectSettings: toProjectSettings(bundle),
            renderSettings: toRenderSettings(bundle),
        });
        return response.data.applied === true;
    }

    async clearRenderJobs(): Promise<void> {
        await this.http.delete('/render/jobs');
    }

    async submitJob(): Promise<RenderJobHandle | null> {
        const response = await this.http.post<{ jobId?: string | null }>('/render/jobs', { start: true });
        const jobId = response.data.jobId;
        return typeof jobId === 'string' && jobId ? jobId : null;
    }

    async isJobInProgress(handle: RenderJobHandle): Promise<boolean> {
        const status = await this.fetchStatus(handle);
        return IN_PROGRESS_STATUSES.has(status.status);
    }

    async getJobProgress(handle: RenderJobHandle): Promise<number> {
        const status = await this.fetchStatus(handle);
        return status.progress ?? 0;
    }

    async getJobError(handle: RenderJobHandle): Promise<string | undefined> {
        const status = await this.fetchStatus(handle);
        if (status.status === 'Failed' || status.status === 'Cancelled') {
            return status.error || `Render job ${status.status.toLowerCase()}`;
        }
        return undefined;
    }

    async release(): Promise<void> {
        await this.http.post('/session/release');
    }

    private async fetchStatus(handle: RenderJobHandle): Promise<JobStatusResponse> {
        const response = await this.http.get<JobStatusResponse>(`/render/jobs/${encodeURIComponent(handle)}`);
        return response.data;
    }
}

/**
 * Render engine running as a separate desktop process, scripted through a local HTTP bridge.
 * Launched headless (`-nogui`) when it is not already running.
 */
export class RemoteRenderEngine implements IRenderEngine {
    readonly name = 'remote';
    private readonly http: AxiosInstance;
    private readonly launcher: EngineLauncher;
    private launched = false;

    constructor(private readonly options: RemoteRenderEngineOptions) {
        if (!options.bridgeUrl) {
            throw new Error('Render bridge URL is required');
        }
        if (!options.executablePath) {
            throw new Error('Render engine executable path is required');
        }
        this.http = axios.create({
            baseURL: options.bridgeUrl,
            timeout: options.requestTimeoutMs ?? 10000,
        });
        this.launcher = options.launcher ?? spawnDetached;
    }

    async isInstalled(): Promise<boolean> {
        try {
            await fs.promises.access(this.options.executablePath, fs.constants.F_OK);
            return true;
        } catch {
            return false;
        }
    }

    async isRunning(): Promise<boolean> {
        try {
            await this.http.get('/health');
            return true;
        } catch {
            return false;
        }
    }

    async connect(): Promise<IRenderEngineSession | null> {
        if (!(await this.isRunning())) {
            return null;
        }
        return new RemoteRenderSession(this.http);
    }

    async launch(): Promise<void> {
        if (this.launched || (await this.isRunning())) {
            return;
        }
        const args = this.options.launchArgs ?? ['-nogui'];
        console.log(`[RemoteRender] Launching ${this.options.executablePath} ${args.join(' ')}`);
        this.launcher(this.options.executablePath, args);
        this.launched = true;
    }
}
