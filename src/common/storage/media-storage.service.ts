/**
 * Dental Clinic API - Media Storage Service
 *
 * Stores treatment images in S3. Without AWS credentials the service runs in
 * mock mode: uploads are logged and links point at a placeholder host.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  DeleteObjectCommand,
  GetObjectCommand,
  PutObjectCommand,
  S3Client,
} from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';

export interface MediaDownloadLink {
  url: string;
  expiresAt: Date;
}

const EXTENSIONS: Record<string, string> = {
  'image/jpeg': 'jpg',
  'image/png': 'png',
  'image/gif': 'gif',
  'image/webp': 'webp',
};

@Injectable()
export class MediaStorageService {
  private readonly logger = new Logger(MediaStorageService.name);
  private readonly s3Client: S3Client | null;
  private readonly bucketName: string;
  private readonly region: string;

  constructor(private readonly config: ConfigService) {
    this.bucketName = this.config.get<string>('aws.s3.mediaBucket') || 'dental-clinic-media';
    this.region = this.config.get<string>('aws.region') || 'us-east-1';

    const accessKeyId = this.config.get<string>('aws.accessKeyId');
    const secretAccessKey = this.config.get<string>('aws.secretAccessKey');

    if (accessKeyId && secretAccessKey) {
      this.s3Client = new S3Client({
        region: this.region,
        credentials: { accessKeyId, secretAccessKey },
      });
      this.logger.log(`S3 media storage initialized: bucket=${this.bucketName}, region=${this.region}`);
    } else {
      this.s3Client = null;
      this.logger.warn('AWS credentials not configured - using mock media storage');
    }
  }

  /**
   * Key for a treatment image, namespaced by clinic.
   */
  generateTreatmentImageKey(clinicId: number, treatmentId: number, mimeType: string): string {
    const timestamp = Date.now();
    const random = Math.random().toString(36).substring(2, 8);
    const extension = EXTENSIONS[mimeType] ?? 'bin';
    return `treatments/${clinicId}/${treatmentId}/${timestamp}-${random}.${extension}`;
  }

  async upload(storageKey: string, body: Buffer, mimeType: string): Promise<void> {
    if (!this.s3Client) {
      this.logger.log(`Mock upload: ${storageKey} (${mimeType}, ${body.length} bytes)`);
      return;
    }

    await this.s3Client.send(
      new PutObjectCommand({
        Bucket: this.bucketName,
        Key: storageKey,
        Body: body,
        ContentType: mimeType,
      }),
    );
    this.logger.log(`Uploaded media to S3: ${storageKey}`);
  }

  async getDownloadLink(storageKey: string, expiresInSeconds = 3600): Promise<MediaDownloadLink> {
    const expiresAt = new Date(Date.now() + expiresInSeconds * 1000);

    if (!this.s3Client) {
      return {
        url: `https://mock-s3.local/${this.bucketName}/${storageKey}?presigned=download`,
        expiresAt,
      };
    }

    const command = new GetObjectCommand({ Bucket: this.bucketName, Key: storageKey });
    const url = await getSignedUrl(this.s3Client, command, { expiresIn: expiresInSeconds });
    return { url, expiresAt };
  }

  async delete(storageKey: string): Promise<void> {
    if (!this.s3Client) {
      this.logger.log(`Mock delete: ${storageKey}`);
      return;
    }

    await this.s3Client.send(new DeleteObjectCommand({ Bucket: this.bucketName, Key: storageKey }));
    this.logger.log(`Deleted media from S3: ${storageKey}`);
  }
}
