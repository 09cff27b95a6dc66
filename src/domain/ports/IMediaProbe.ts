export interface MediaInfo {
    durationSeconds: number;
    width?: number;
    height?: number;
}

/**
 * Port for media inspection and lossless trimming.
 * Implementations: FFmpegMediaProbe
 */
export interface IMediaProbe {
    /** @returns null when the probing tool is unavailable or the file cannot be read */
    probe(filePath: string): Promise<MediaInfo | null>;

    /** Writes the first `durationSeconds` of `inputPath` to `outputPath` without re-encoding. */
    trim(inputPath: string, durationSeconds: number, outputPath: string): Promise<void>;
}
