import { PutObjectCommand, type S3Client } from '@aws-sdk/client-s3';
import type { ParkingAction } from '../types';
import { StorageWriteError, describeError } from '../utils/errors';
import { ok, err, type Result } from '../utils/result';

export const FALLBACK_IMAGE_KEY = 'error.jpg';

export interface ImageStore {
    put(key: string, imageBuffer: Buffer): Promise<Result<void, StorageWriteError>>;
    urlFor(key: string): string;
}

export function buildImageKey(action: ParkingAction, epochSeconds: number): string {
    return `${action.toLowerCase()}_${epochSeconds}.jpg`;
}

export function buildImageUrl(bucket: string, region: string, key: string): string {
    return `https://${bucket}.s3.${region}.amazonaws.com/${key}`;
}

export class S3ImageStore implements ImageStore {
    constructor(private client: S3Client, private bucket: string, private region: string) {}

    async put(key: string, imageBuffer: Buffer): Promise<Result<void, StorageWriteError>> {
        try {
            await this.client.send(new PutObjectCommand({
                Bucket: this.bucket,
                Key: key,
                Body: imageBuffer,
                ContentType: 'image/jpeg',
            }));
            return ok(undefined);
        } catch (error) {
            return err(new StorageWriteError(`Upload of ${key} failed: ${describeError(error)}`, error));
        }
    }

    urlFor(key: string): string {
        return buildImageUrl(this.bucket, this.region, key);
    }
}
