import { S3Client, PutObjectCommand } from '@aws-sdk/client-s3';
import * as fs from 'fs';
import * as path from 'path';

export interface S3ServiceOptions {
  region: string;
  bucketName: string;
  accessKeyId: string;
  secretAccessKey: string;
  endpoint?: string;
}

const CONTENT_TYPES: Record<string, string> = {
  '.mp4': 'video/mp4',
  '.h264': 'video/h264',
};

export class S3Service {
  private s3Client: S3Client;
  readonly bucketName: string;

  constructor(private readonly options: S3ServiceOptions) {
    this.bucketName = options.bucketName;

    this.s3Client = new S3Client({
      region: options.region,
      credentials: {
        accessKeyId: options.accessKeyId,
        secretAccessKey: options.secretAccessKey,
      },
      // S3-compatible stores (MinIO and friends) want path-style addressing
      ...(options.endpoint ? { endpoint: options.endpoint, forcePathStyle: true } : {}),
    });
  }

  async uploadFile(localPath: string, key: string): Promise<void> {
    const { size } = await fs.promises.stat(localPath);

    const command = new PutObjectCommand({
      Bucket: this.bucketName,
      Key: key,
      Body: fs.createReadStream(localPath),
      ContentLength: size,
      ContentType: CONTENT_TYPES[path.extname(localPath).toLowerCase()] ?? 'application/octet-stream',
    });

    await this.s3Client.send(command);
  }

  isConfigured(): boolean {
    return !!(
      this.options.accessKeyId &&
      this.options.secretAccessKey &&
      this.options.bucketName
    );
  }
}
