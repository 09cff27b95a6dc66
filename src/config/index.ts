import dotenv from 'dotenv';
import { CarrierGateways, DEFAULT_CARRIER_GATEWAYS } from '../domain/entities/ContactInfo';
import { RenderQuality } from '../domain/entities/RenderJobSpec';
import { DisplayGeometry } from '../domain/ports/IDisplayProvider';

// Load environment variables
dotenv.config();

export type RenderEngineKind = 'ffmpeg' | 'remote';

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    environment: string;

    // Capture
    inputVideoPath: string;
    outputDir: string;

    // Render engine
    renderEngine: RenderEngineKind;
    renderBridgeUrl: string;
    renderEngineExecutable: string;
    renderEngineArgs: string[];
    projectName: string;
    templateProjectPath: string;
    projectsDir: string;

    // Render settings
    renderFormat: string;
    renderVideoCodec: string;
    renderEncoder?: string;
    renderQuality: RenderQuality;

    // Attach / render polling
    attachMaxAttempts: number;
    attachRetryDelayMs: number;
    renderPollIntervalMs: number;
    renderHeartbeatIntervalMs: number;
    renderTimeoutMs: number; // 0 = wait indefinitely

    // Post-processing
    trimToleranceSeconds: number;
    fallbackDurationSeconds: number;

    // Google (Drive upload + Gmail delivery)
    googleAccessToken: string;
    driveFolderId?: string;
    uploadChunkSizeBytes: number;
    uploadChunkMaxAttempts: number;
    uploadChunkRetryDelayMs: number;
    senderAddress: string;
    emailSubject: string;
    carrierGateways: CarrierGateways;

    // Kiosk
    displays?: DisplayGeometry[];
    previewPlayer: string;
    primaryPlayback: boolean;
    instanceGuardPort: number;
    playbackPollIntervalMs: number;
    keepAliveIntervalMs: number;
    statusIntervalMs: number;
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getOptionalEnvVar(key: string): string | undefined {
    const value = getEnvVar(key, '');
    return value ? value : undefined;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getEnvVarBoolean(key: string, defaultValue?: boolean): boolean {
    const value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }
    return getEnvVar(key).toLowerCase() === 'true';
}

function getEnvVarJson<T>(key: string, guard: (value: unknown) => value is T, defaultValue: T): T {
    const raw = getOptionalEnvVar(key);
    if (raw === undefined) {
        return defaultValue;
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        throw new Error(`Environment variable ${key} must be valid JSON: ${error instanceof Error ? error.message : error}`);
    }
    if (!guard(parsed)) {
        throw new Error(`Environment variable ${key} has an unexpected shape: ${raw}`);
    }
    return parsed;
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isCarrierGateways(value: unknown): value is CarrierGateways {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
        && Object.values(value).every((suffix) => typeof suffix === 'string' && suffix.startsWith('@'));
}

function isDisplayGeometry(value: unknown): value is DisplayGeometry {
    if (typeof value !== 'object' || value === null) {
        return false;
    }
    return ['x', 'y', 'width', 'height'].every((key) => typeof Reflect.get(value, key) === 'number');
}

function isDisplayLayout(value: unknown): value is DisplayGeometry[] | undefined {
    return value === undefined || (Array.isArray(value) && value.length > 0 && value.every(isDisplayGeometry));
}

const RENDER_QUALITIES: readonly RenderQuality[] = ['Best', 'High', 'Medium', 'Low'];

function isRenderQuality(value: string): value is RenderQuality {
    return RENDER_QUALITIES.some((quality) => quality === value);
}

function getRenderQuality(): RenderQuality {
    const value = getEnvVar('RENDER_QUALITY', 'Best');
    if (!isRenderQuality(value)) {
        throw new Error(`RENDER_QUALITY must be one of ${RENDER_QUALITIES.join(', ')}, got: ${value}`);
    }
    return value;
}

function getRenderEngine(): RenderEngineKind {
    const value = getEnvVar('RENDER_ENGINE', 'ffmpeg').toLowerCase();
    if (value !== 'ffmpeg' && value !== 'remote') {
        throw new Error(`RENDER_ENGINE must be "ffmpeg" or "remote", got: ${value}`);
    }
    return value;
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    return {
        environment: getEnvVar('NODE_ENV', 'development'),

        // Capture
        inputVideoPath: getEnvVar('INPUT_VIDEO_PATH', ''),
        outputDir: getEnvVar('OUTPUT_DIR', './output'),

        // Render engine
        renderEngine: getRenderEngine(),
        renderBridgeUrl: getEnvVar('RENDER_BRIDGE_URL', 'http://127.0.0.1:9237'),
        renderEngineExecutable: getEnvVar('RENDER_ENGINE_EXECUTABLE', ''),
        renderEngineArgs: getEnvVarJson('RENDER_ENGINE_ARGS', isStringArray, ['-nogui']),
        projectName: getEnvVar('RENDER_PROJECT_NAME', 'EnhanceTemplate'),
        templateProjectPath: getEnvVar('RENDER_TEMPLATE_PATH', './assets/projects/EnhanceTemplate.json'),
        projectsDir: getEnvVar('RENDER_PROJECTS_DIR', './data/projects'),

        // Render settings
        renderFormat: getEnvVar('RENDER_FORMAT', 'mp4'),
        renderVideoCodec: getEnvVar('RENDER_VIDEO_CODEC', 'H.265'),
        renderEncoder: process.env.RENDER_ENCODER !== undefined ? getOptionalEnvVar('RENDER_ENCODER') : 'NVIDIA',
        renderQuality: getRenderQuality(),

        // Attach / render polling
        attachMaxAttempts: getEnvVarNumber('ATTACH_MAX_ATTEMPTS', 10),
        attachRetryDelayMs: getEnvVarNumber('ATTACH_RETRY_DELAY_MS', 2000),
        renderPollIntervalMs: getEnvVarNumber('RENDER_POLL_INTERVAL_MS', 500),
        renderHeartbeatIntervalMs: getEnvVarNumber('RENDER_HEARTBEAT_INTERVAL_MS', 5000),
        renderTimeoutMs: getEnvVarNumber('RENDER_TIMEOUT_MS', 0),

        // Post-processing
        trimToleranceSeconds: getEnvVarNumber('TRIM_TOLERANCE_SECONDS', 0.1),
        fallbackDurationSeconds: getEnvVarNumber('FALLBACK_DURATION_SECONDS', 60),

        // Google
        googleAccessToken: getEnvVar('GOOGLE_ACCESS_TOKEN', ''),
        driveFolderId: getOptionalEnvVar('DRIVE_FOLDER_ID'),
        uploadChunkSizeBytes: getEnvVarNumber('UPLOAD_CHUNK_SIZE_BYTES', 1024 * 1024),
        uploadChunkMaxAttempts: getEnvVarNumber('UPLOAD_CHUNK_MAX_ATTEMPTS', 5),
        uploadChunkRetryDelayMs: getEnvVarNumber('UPLOAD_CHUNK_RETRY_DELAY_MS', 1000),
        senderAddress: getEnvVar('SENDER_ADDRESS', ''),
        emailSubject: getEnvVar('EMAIL_SUBJECT', 'Your Video from Pod'),
        carrierGateways: getEnvVarJson('CARRIER_GATEWAYS', isCarrierGateways, DEFAULT_CARRIER_GATEWAYS),

        // Kiosk
        displays: getEnvVarJson('DISPLAY_LAYOUT', isDisplayLayout, undefined),
        previewPlayer: getEnvVar('PREVIEW_PLAYER', 'ffplay'),
        primaryPlayback: getEnvVarBoolean('PRIMARY_PLAYBACK', false),
        instanceGuardPort: getEnvVarNumber('INSTANCE_GUARD_PORT', 65432),
        playbackPollIntervalMs: getEnvVarNumber('PLAYBACK_POLL_INTERVAL_MS', 500),
        keepAliveIntervalMs: getEnvVarNumber('KEEP_ALIVE_INTERVAL_MS', 1000),
        statusIntervalMs: getEnvVarNumber('STATUS_INTERVAL_MS', 1000),
    };
}

/**
 * Validates that required configuration is present.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!config.inputVideoPath) {
        errors.push('INPUT_VIDEO_PATH is required (the captured clip to enhance)');
    }
    if (!config.googleAccessToken) {
        errors.push('GOOGLE_ACCESS_TOKEN is required for Drive upload and Gmail delivery');
    }
    if (!config.senderAddress) {
        errors.push('SENDER_ADDRESS is required for delivery');
    }
    if (config.renderEngine === 'remote' && !config.renderEngineExecutable) {
        errors.push('RENDER_ENGINE_EXECUTABLE is required when RENDER_ENGINE is "remote"');
    }
    if (!Number.isInteger(config.attachMaxAttempts) || config.attachMaxAttempts < 1) {
        errors.push('ATTACH_MAX_ATTEMPTS must be a positive integer');
    }
    if (config.uploadChunkSizeBytes <= 0 || config.uploadChunkSizeBytes % (256 * 1024) !== 0) {
        errors.push('UPLOAD_CHUNK_SIZE_BYTES must be a positive multiple of 262144');
    }
    if (config.renderTimeoutMs < 0) {
        errors.push('RENDER_TIMEOUT_MS cannot be negative');
    }

    return errors;
}

// Singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
