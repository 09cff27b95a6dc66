/**
 * The enhanced clip handed from post-processing to the uploader.
 */
export interface Artifact {
    readonly path: string;
    /** Expected duration in seconds (the input clip's duration) */
    readonly durationSeconds: number;
}
