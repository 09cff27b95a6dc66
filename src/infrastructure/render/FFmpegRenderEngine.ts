import ffmpeg, { FfmpegCommand } from 'fluent-ffmpeg';
import Ajv, { JSONSchemaType } from 'ajv';
import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { IRenderEngine, IRenderEngineSession, RenderJobHandle } from '../../domain/ports/IRenderEngine';
import { RenderQuality, RenderSettingsBundle } from '../../domain/entities/RenderJobSpec';

/**
 * A local render "project": the enhancement filter chain applied to every clip.
 */
export interface RenderProject {
    name: string;
    videoFilters: string[];
    audioFilters?: string[];
}

const RENDER_PROJECT_SCHEMA: JSONSchemaType<RenderProject> = {
    type: 'object',
    properties: {
        name: { type: 'string', minLength: 1 },
        videoFilters: { type: 'array', items: { type: 'string' } },
        audioFilters: { type: 'array', items: { type: 'string' }, nullable: true },
    },
    required: ['name', 'videoFilters'],
    additionalProperties: false,
};

const validateProject = new Ajv({ allErrors: true }).compile(RENDER_PROJECT_SCHEMA);

const VIDEO_ENCODERS: Record<string, { software: string; nvidia: string }> = {
    'H.265': { software: 'libx265', nvidia: 'hevc_nvenc' },
    'H.264': { software: 'libx264', nvidia: 'h264_nvenc' },
};

/** Constant-quality level per preset (crf for software encoders, cq for NVENC). */
export const QUALITY_LEVELS: Record<RenderQuality, number> = {
    Best: 18,
    High: 20,
    Medium: 23,
    Low: 28,
};

export function resolveVideoEncoder(videoCodec: string, encoder?: string): string | null {
    const entry = VIDEO_ENCODERS[videoCodec];
    if (!entry) {
        return null;
    }
    return encoder === 'NVIDIA' ? entry.nvidia : entry.software;
}

export function buildOutputOptions(bundle: RenderSettingsBundle, videoEncoder: string): string[] {
    const level = QUALITY_LEVELS[bundle.quality];
    const qualityFlag = videoEncoder.endsWith('_nvenc') ? `-cq ${level}` : `-crf ${level}`;
    return [qualityFlag, '-pix_fmt yuv420p', '-movflags +faststart'];
}

export function parseRenderProject(raw: string): RenderProject {
    const data: unknown = JSON.parse(raw);
    if (!validateProject(data)) {
        const details = (validateProject.errors ?? []).map((e) => `${e.instancePath || '/'} ${e.message}`).join('; ');
        throw new Error(`Invalid render project: ${details}`);
    }
    return data;
}

interface LocalJob {
    status: 'rendering' | 'complete' | 'failed';
    progress: number;
    error?: string;
    command: FfmpegCommand;
}

/**
 * Session of the in-process engine: one loaded project, one settings bundle, a job table.
 */
export class FFmpegRenderSession implements IRenderEngineSession {
    private project?: RenderProject;
    private bundle?: RenderSettingsBundle;
    private readonly jobs = new Map<RenderJobHandle, LocalJob>();

    constructor(private readonly projectsDir: string) { }

    async loadProject(name: string): Promise<boolean> {
        const projectPath = path.join(this.projectsDir, `${name}.json`);
        try {
            this.project = parseRenderProject(await fs.promises.readFile(projectPath, 'utf-8'));
            console.log(`[FFmpegRender] Loaded project "${this.project.name}"`);
            return true;
        } catch (error) {
            console.warn(`[FFmpegRender] Could not load project ${projectPath}:`, error instanceof Error ? error.message : error);
            return false;
        }
    }

    async importProject(filePath: string): Promise<boolean> {
        try {
            const raw = await fs.promises.readFile(filePath, 'utf-8');
            const project = parseRenderProject(raw);
            await fs.promises.mkdir(this.projectsDir, { recursive: true });
            await fs.promises.writeFile(path.join(this.projectsDir, `${project.name}.json`), raw);
            console.log(`[FFmpegRender] Imported project "${project.name}" from ${filePath}`);
            return true;
        } catch (error) {
            console.warn(`[FFmpegRender] Could not import project ${filePath}:`, error instanceof Error ? error.message : error);
            return false;
        }
    }

    async applySettings(bundle: RenderSettingsBundle): Promise<boolean> {
        if (!this.project) {
            console.warn('[FFmpegRender] Render settings applied before a project was loaded');
            return false;
        }
        if (!resolveVideoEncoder(bundle.videoCodec, bundle.encoder)) {
            console.warn(`[FFmpegRender] Unsupported video codec: ${bundle.videoCodec}`);
            return false;
        }
        this.bundle = bundle;
        return true;
    }

    async clearRenderJobs(): Promise<void> {
        for (const job of this.jobs.values()) {
            if (job.status === 'rendering') {
                job.command.kill('SIGKILL');
            }
        }
        this.jobs.clear();
    }

    async submitJob(): Promise<RenderJobHandle | null> {
        const { project, bundle } = this;
        if (!project || !bundle) {
            return null;
        }
        const videoEncoder = resolveVideoEncoder(bundle.videoCodec, bundle.encoder);
        if (!videoEncoder) {
            return null;
        }

        await fs.promises.mkdir(bundle.targetDir, { recursive: true });
        const outputPath = path.join(bundle.targetDir, `${bundle.customName}.${bundle.format}`);
        const handle = uuidv4();

        const videoFilters = [...project.videoFilters];
        if (bundle.resolution) {
            videoFilters.push(`scale=${bundle.resolution.width}:${bundle.resolution.height}`);
        }

        const command = ffmpeg(bundle.sourcePath).videoCodec(videoEncoder).format(bundle.format);
        if (videoFilters.length > 0) {
            command.videoFilters(videoFilters);
        }
        if (bundle.exportAudio) {
            command.audioCodec('aac');
            if (project.audioFilters && project.audioFilters.length > 0) {
                command.audioFilters(project.audioFilters);
            }
        } else {
            command.noAudio();
        }
        command.outputOptions(buildOutputOptions(bundle, videoEncoder));

        const job: LocalJob = { status: 'rendering', progress: 0, command };
        this.jobs.set(handle, job);

        command
            .on('progress', (progress: { percent?: number }) => {
                if (typeof progress.percent === 'number') {
                    job.progress = Math.max(0, Math.min(100, progress.percent));
                }
            })
            .on('end', () => {
                job.status = 'complete';
                job.progress = 100;
            })
            .on('error', (err: Error) => {
                job.status = 'failed';
                job.error = err.message;
            })
            .save(outputPath);

        console.log(`[FFmpegRender] Job ${handle}: ${bundle.sourcePath} → ${outputPath} (${videoEncoder})`);
        return handle;
    }

    async isJobInProgress(handle: RenderJobHandle): Promise<boolean> {
        return this.jobs.get(handle)?.status === 'rendering';
    }

    async getJobProgress(handle: RenderJobHandle): Promise<number> {
        return this.jobs.get(handle)?.progress ?? 0;
    }

    async getJobError(handle: RenderJobHandle): Promise<string | undefined> {
        const job = this.jobs.get(handle);
        if (!job) {
            return `Unknown render job ${handle}`;
        }
        return job.status === 'failed' ? `FFmpeg error: ${job.error ?? 'unknown'}` : undefined;
    }
}

/**
 * Render engine backed by the local ffmpeg binary. Always "running"; there is nothing to launch.
 */
export class FFmpegRenderEngine implements IRenderEngine {
    readonly name = 'ffmpeg';
    private session?: FFmpegRenderSession;

    constructor(private readonly projectsDir: string) {
        if (!projectsDir) {
            throw new Error('Projects directory is required');
        }
    }

    isInstalled(): Promise<boolean> {
        return new Promise((resolve) => {
            ffmpeg.getAvailableFormats((err) => resolve(!err));
        });
    }

    async isRunning(): Promise<boolean> {
        return true;
    }

    async connect(): Promise<IRenderEngineSession | null> {
        if (!this.session) {
            this.session = new FFmpegRenderSession(this.projectsDir);
        }
        return this.session;
    }

    async launch(): Promise<void> { }
}
