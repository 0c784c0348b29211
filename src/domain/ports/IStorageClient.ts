import { StagedAsset, StagingRequest } from '../entities/Staging';

/**
 * IStorageClient - Stages a local file at a publicly fetchable URL.
 * Implementations: S3StorageClient, MediaStorageClient (Cloudinary)
 */
export interface IStorageClient {
    put(request: StagingRequest): Promise<StagedAsset>;
}
