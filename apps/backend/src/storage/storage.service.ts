import { GetObjectCommand, NoSuchKey, S3Client, S3ServiceException } from '@aws-sdk/client-s3';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

/**
 * Read access to the prompt bucket through the S3 API. Cloud Storage serves
 * the same API at its XML endpoint when HMAC keys are configured.
 */
@Injectable()
export class StorageService {
  private readonly logger = new Logger(StorageService.name);
  private readonly client: S3Client;
  private readonly bucket: string;

  constructor(configService: ConfigService) {
    const endpoint = configService.get<string>('STORAGE_ENDPOINT') || 'https://storage.googleapis.com';
    const region = configService.get<string>('STORAGE_REGION') || 'auto';
    const accessKeyId = configService.get<string>('STORAGE_ACCESS_KEY');
    const secretAccessKey = configService.get<string>('STORAGE_SECRET_KEY');
    this.bucket = configService.get<string>('GCS_PROMPT_BUCKET_NAME') || '';

    this.client = new S3Client({
      region,
      endpoint,
      forcePathStyle: true,
      credentials: accessKeyId && secretAccessKey ? { accessKeyId, secretAccessKey } : undefined,
    });
  }

  /** Returns the object as UTF-8 text, or null when it does not exist. */
  async readText(key: string, bucket = this.bucket): Promise<string | null> {
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
      if (!response.Body) {
        throw new Error(`Empty object body for key ${bucket}/${key}`);
      }
      return await response.Body.transformToString('utf-8');
    } catch (error) {
      if (this.isMissingObject(error)) {
        this.logger.debug(`Object not found ${bucket}/${key}`);
        return null;
      }
      throw error;
    }
  }

  private isMissingObject(error: unknown) {
    if (error instanceof NoSuchKey) {
      return true;
    }
    return (
      error instanceof S3ServiceException &&
      (error.name === 'NotFound' || error.$metadata.httpStatusCode === 404)
    );
  }
}
