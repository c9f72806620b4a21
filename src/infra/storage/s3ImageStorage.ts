import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import type { ImageStorage, StoredImage } from '../../application/images/uploadImage.js';
import type { ImageStorageConfig } from '../config.js';
import { logger } from '../logger.js';

export class S3ImageStorage implements ImageStorage {
  private readonly publicBaseUrl: string;

  constructor(
    private readonly config: ImageStorageConfig,
    private readonly client: S3Client = new S3Client({
      region: config.region,
      endpoint: config.endpoint,
      // MinIO and other S3-compatible endpoints need path-style addressing
      forcePathStyle: config.endpoint !== undefined,
    })
  ) {
    this.publicBaseUrl = config.publicBaseUrl.replace(/\/+$/, '');
  }

  async put(key: string, body: Buffer, contentType: string): Promise<StoredImage> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.config.bucket,
        Key: key,
        Body: body,
        ContentType: contentType,
        ContentLength: body.length,
      })
    );
    logger.info({ key, size: body.length }, 'Image uploaded');

    return { key, url: `${this.publicBaseUrl}/${key}` };
  }
}
