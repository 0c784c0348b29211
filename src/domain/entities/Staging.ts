/**
 * A local file uploaded to object storage so a platform can fetch it by URL.
 * Staged objects are never deleted by the pipeline.
 */
export interface StagedAsset {
    publicUrl: string;
    bucket: string;
    key: string;
}

export interface StagingRequest {
    localPath: string;
    bucket: string;
    key: string;
    contentType: string;
    publicRead: boolean;
}
