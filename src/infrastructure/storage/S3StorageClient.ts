import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import fs from 'fs';
import { StagedAsset, StagingRequest } from '../../domain/entities/Staging';
import { ConfigurationError, errorMessage } from '../../domain/errors';
import { IStorageClient } from '../../domain/ports/IStorageClient';

export interface S3StorageOptions {
    region: string;
    /** Explicit credentials; when empty the SDK's default provider chain is used */
    accessKeyId?: string;
    secretAccessKey?: string;
}

/**
 * Stages files in an S3 bucket and returns their virtual-hosted public URL.
 */
export class S3StorageClient implements IStorageClient {
    private readonly client: S3Client;
    private readonly region: string;

    constructor(options: S3StorageOptions, client?: S3Client) {
        this.region = options.region;
        this.client = client ?? new S3Client({
            region: options.region,
            ...(options.accessKeyId && options.secretAccessKey && {
                credentials: {
                    accessKeyId: options.accessKeyId,
                    secretAccessKey: options.secretAccessKey,
                },
            }),
        });
    }

    async put(request: StagingRequest): Promise<StagedAsset> {
        if (!request.bucket) {
            throw new ConfigurationError('S3_BUCKET_NAME');
        }

        const body = await fs.promises.readFile(request.localPath);
        console.log(`[S3] Uploading ${request.localPath} (${(body.length / (1024 * 1024)).toFixed(2)} MB) to s3://${request.bucket}/${request.key}`);

        try {
            await this.client.send(new PutObjectCommand({
                Bucket: request.bucket,
                Key: request.key,
                Body: body,
                ContentType: request.contentType,
                ...(request.publicRead && { ACL: 'public-read' }),
            }));
        } catch (error) {
            throw new Error(`S3 upload failed: ${errorMessage(error)}`);
        }

        const publicUrl = `https://${request.bucket}.s3.${this.region}.amazonaws.com/${request.key}`;
        console.log(`[S3] ✅ Staged at ${publicUrl}`);

        return { publicUrl, bucket: request.bucket, key: request.key };
    }
}
