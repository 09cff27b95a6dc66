import path from 'path';

export interface Resolution {
    readonly width: number;
    readonly height: number;
}

export type RenderQuality = 'Best' | 'High' | 'Medium' | 'Low';

/**
 * Codec and quality settings for the render. `extra` carries engine-specific keys verbatim.
 */
export interface RenderCodecSettings {
    readonly format: string;
    readonly videoCodec: string;
    readonly encoder?: string;
    readonly quality: RenderQuality;
    readonly exportAudio: boolean;
    readonly extra?: Readonly<Record<string, string | number | boolean>>;
}

/**
 * Immutable description of the one render job of a run.
 */
export interface RenderJobSpec {
    readonly inputPath: string;
    readonly resolution?: Resolution;
    readonly codec: RenderCodecSettings;
    readonly outputDir: string;
    /** Input file name without extension */
    readonly baseName: string;
}

/**
 * The bundle applied to the engine in a single call before submission.
 */
export interface RenderSettingsBundle {
    readonly sourcePath: string;
    readonly targetDir: string;
    readonly customName: string;
    readonly format: string;
    readonly videoCodec: string;
    readonly encoder?: string;
    readonly quality: RenderQuality;
    readonly exportVideo: boolean;
    readonly exportAudio: boolean;
    readonly resolution?: Resolution;
    readonly extra: Readonly<Record<string, string | number | boolean>>;
}

export const ENHANCED_SUFFIX = '_enhanced';

export const DEFAULT_CODEC_SETTINGS: RenderCodecSettings = {
    format: 'mp4',
    videoCodec: 'H.265',
    encoder: 'NVIDIA',
    quality: 'Best',
    exportAudio: true,
    extra: {
        RateControl: 'VBR',
        Preset: 'Fast',
        Tuning: 'High Quality',
        PixelAspectRatio: 'Square',
        DataLevels: 'Auto',
        BypassReEncodeWhenPossible: true,
    },
};

export interface RenderJobSpecInput {
    inputPath: string;
    outputDir: string;
    resolution?: Resolution;
    codec?: RenderCodecSettings;
}

export function createRenderJobSpec(input: RenderJobSpecInput): RenderJobSpec {
    if (!input.inputPath.trim()) {
        throw new Error('RenderJobSpec requires an input path');
    }
    if (!input.outputDir.trim()) {
        throw new Error('RenderJobSpec requires an output directory');
    }
    if (input.resolution && (input.resolution.width <= 0 || input.resolution.height <= 0)) {
        throw new Error('Resolution values must be positive');
    }

    const baseName = path.parse(input.inputPath).name;
    return Object.freeze({
        inputPath: input.inputPath,
        resolution: input.resolution ? Object.freeze({ ...input.resolution }) : undefined,
        codec: Object.freeze({ ...(input.codec ?? DEFAULT_CODEC_SETTINGS) }),
        outputDir: input.outputDir,
        baseName,
    });
}

/**
 * `{outputDir}/{baseName}_enhanced.{ext}`
 */
export function buildOutputPath(spec: RenderJobSpec): string {
    return path.join(spec.outputDir, `${spec.baseName}${ENHANCED_SUFFIX}.${spec.codec.format}`);
}

export function toSettingsBundle(spec: RenderJobSpec): RenderSettingsBundle {
    return {
        sourcePath: spec.inputPath,
        targetDir: spec.outputDir,
        customName: `${spec.baseName}${ENHANCED_SUFFIX}`,
        format: spec.codec.format,
        videoCodec: spec.codec.videoCodec,
        encoder: spec.codec.encoder,
        quality: spec.codec.quality,
        exportVideo: true,
        exportAudio: spec.codec.exportAudio,
        resolution: spec.resolution,
        extra: { ...(spec.codec.extra ?? {}) },
    };
}
