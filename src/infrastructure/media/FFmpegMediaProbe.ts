import ffmpeg from 'fluent-ffmpeg';
import { IMediaProbe, MediaInfo } from '../../domain/ports/IMediaProbe';

/**
 * ffprobe/ffmpeg-backed media inspection.
 */
export class FFmpegMediaProbe implements IMediaProbe {
    probe(filePath: string): Promise<MediaInfo | null> {
        return new Promise((resolve) => {
            ffmpeg.ffprobe(filePath, (err, metadata) => {
                if (err) {
                    console.warn(`[MediaProbe] ffprobe failed for ${filePath}: ${err.message}`);
                    resolve(null);
                    return;
                }

                const duration = Number(metadata.format.duration);
                if (!Number.isFinite(duration) || duration <= 0) {
                    console.warn(`[MediaProbe] No usable duration for ${filePath}`);
                    resolve(null);
                    return;
                }

                const video = metadata.streams.find((s) => s.codec_type === 'video');
                resolve({
                    durationSeconds: duration,
                    width: video?.width,
                    height: video?.height,
                });
            });
        });
    }

    trim(inputPath: string, durationSeconds: number, outputPath: string): Promise<void> {
        return new Promise((resolve, reject) => {
            ffmpeg(inputPath)
                .outputOptions([`-t ${durationSeconds}`, '-c copy'])
                .on('end', () => resolve())
                .on('error', (err: Error) => reject(new Error(`FFmpeg trim failed: ${err.message}`)))
                .save(outputPath);
        });
    }
}
