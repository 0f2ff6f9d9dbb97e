import { NoSuchKey, S3Client, S3ServiceException } from '@aws-sdk/client-s3';
import { ConfigService } from '@nestjs/config';
import { StorageService } from './storage.service';

describe('StorageService', () => {
  let storageService: StorageService;
  let send: jest.SpyInstance;

  beforeEach(() => {
    send = jest.spyOn(S3Client.prototype, 'send');
    storageService = new StorageService(
      new ConfigService({
        GCS_PROMPT_BUCKET_NAME: 'prompt-bucket',
        STORAGE_ACCESS_KEY: 'test-access-key',
        STORAGE_SECRET_KEY: 'test-secret',
      }),
    );
  });

  afterEach(() => {
    send.mockRestore();
  });

  it('should read an object from the prompt bucket as text', async () => {
    send.mockImplementationOnce(async () => ({
      Body: { transformToString: jest.fn().mockResolvedValue('Grade the essay: {essay_content}') },
    }));

    const text = await storageService.readText('ai_english_prompt/段落寫作評閱.txt');

    expect(text).toBe('Grade the essay: {essay_content}');
    const [command] = send.mock.calls[0];
    expect(command.input).toEqual({
      Bucket: 'prompt-bucket',
      Key: 'ai_english_prompt/段落寫作評閱.txt',
    });
  });

  it('should read from an explicit bucket', async () => {
    send.mockImplementationOnce(async () => ({
      Body: { transformToString: jest.fn().mockResolvedValue('{}') },
    }));

    await storageService.readText('answers.txt', 'other-bucket');

    const [command] = send.mock.calls[0];
    expect(command.input.Bucket).toBe('other-bucket');
  });

  it('should return null for a missing key', async () => {
    send.mockImplementationOnce(async () => {
      throw new NoSuchKey({ message: 'The specified key does not exist.', $metadata: {} });
    });

    await expect(storageService.readText('missing.txt')).resolves.toBeNull();
  });

  it('should return null for a 404 response', async () => {
    send.mockImplementationOnce(async () => {
      throw new S3ServiceException({
        name: 'NotFound',
        $fault: 'client',
        $metadata: { httpStatusCode: 404 },
      });
    });

    await expect(storageService.readText('missing.txt')).resolves.toBeNull();
  });

  it('should rethrow other storage failures', async () => {
    send.mockImplementationOnce(async () => {
      throw new Error('connect ECONNREFUSED');
    });

    await expect(storageService.readText('prompt.txt')).rejects.toThrow('connect ECONNREFUSED');
  });
});
