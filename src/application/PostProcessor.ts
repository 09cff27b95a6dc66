import fs from 'fs';
import path from 'path';
import { IMediaProbe } from '../domain/ports/IMediaProbe';

export const DEFAULT_TRIM_TOLERANCE_SECONDS = 0.1;

/**
 * PostProcessor makes the rendered clip match the input's duration.
 * Best effort: missing tooling or a failed trim leaves the file as it is.
 */
export class PostProcessor {
    constructor(
        private readonly probe: IMediaProbe,
        private readonly toleranceSeconds: number = DEFAULT_TRIM_TOLERANCE_SECONDS
    ) { }

    async normalize(filePath: string, targetDurationSeconds: number): Promise<string> {
        const info = await this.probe.probe(filePath);
        if (!info) {
            console.warn(`[PostProcess] Duration probe unavailable, skipping trim for ${filePath}`);
            return filePath;
        }

        const deviation = info.durationSeconds - targetDurationSeconds;
        if (Math.abs(deviation) <= this.toleranceSeconds) {
            console.log(`[PostProcess] Duration ${info.durationSeconds.toFixed(2)}s within tolerance`);
            return filePath;
        }

        if (deviation < 0) {
            console.warn(
                `[PostProcess] Output is ${(-deviation).toFixed(2)}s shorter than the input; a lossless trim cannot extend it`
            );
            return filePath;
        }

        const parsed = path.parse(filePath);
        const tempPath = path.join(parsed.dir, `${parsed.name}.trim${parsed.ext}`);

        try {
            console.log(`[PostProcess] Trimming ${info.durationSeconds.toFixed(2)}s → ${targetDurationSeconds.toFixed(2)}s`);
            await this.probe.trim(filePath, targetDurationSeconds, tempPath);
            await fs.promises.rename(tempPath, filePath);
        } catch (error) {
            console.warn(`[PostProcess] Trim failed, keeping the untrimmed file:`, error);
            await fs.promises.rm(tempPath, { force: true });
        }

        return filePath;
    }
}
