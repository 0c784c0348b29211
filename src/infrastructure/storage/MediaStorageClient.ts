import { v2 as cloudinary } from 'cloudinary';
import fs from 'fs';
import path from 'path';
import { StagedAsset, StagingRequest } from '../../domain/entities/Staging';
import { ConfigurationError, errorMessage } from '../../domain/errors';
import { IStorageClient } from '../../domain/ports/IStorageClient';

type ResourceType = 'image' | 'video' | 'raw';

export function resourceTypeFor(contentType: string): ResourceType {
    if (contentType.startsWith('video/')) return 'video';
    if (contentType.startsWith('image/')) return 'image';
    return 'raw';
}

/**
 * Cloudinary staging: the bucket becomes the folder and the key (without
 * extension) the public id.
 */
export class MediaStorageClient implements IStorageClient {
    private readonly configured: boolean;

    constructor(
        cloudName: string,
        apiKey: string,
        apiSecret: string
    ) {
        this.configured = Boolean(cloudName && apiKey && apiSecret);
        if (this.configured) {
            cloudinary.config({
                cloud_name: cloudName,
                api_key: apiKey,
                api_secret: apiSecret,
                secure: true,
            });
        }
    }

    async put(request: StagingRequest): Promise<StagedAsset> {
        if (!this.configured) {
            throw new ConfigurationError('CLOUDINARY_CLOUD_NAME', 'Media credentials are required (cloudName, apiKey, apiSecret)');
        }

        const stats = await fs.promises.stat(request.localPath);
        console.log(`[MediaStorage] Uploading ${request.localPath} (${(stats.size / (1024 * 1024)).toFixed(2)} MB)`);

        const publicId = path.parse(request.key).name;
        try {
            const result = await cloudinary.uploader.upload(request.localPath, {
                folder: request.bucket || undefined,
                public_id: publicId,
                resource_type: resourceTypeFor(request.contentType),
                type: request.publicRead ? 'upload' : 'authenticated',
                overwrite: true,
            });

            return {
                publicUrl: result.secure_url,
                bucket: request.bucket,
                key: result.public_id,
            };
        } catch (error) {
            console.error('[Cloudinary] Detailed Error:', error);
            throw new Error(`Media upload failed: ${errorMessage(error)}`);
        }
    }
}
