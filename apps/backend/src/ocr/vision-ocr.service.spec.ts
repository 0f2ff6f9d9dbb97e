import { ConfigService } from '@nestjs/config';
import { OcrError } from './ocr.types';
import { VisionOcrService } from './vision-ocr.service';

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });

describe('VisionOcrService', () => {
  let ocrService: VisionOcrService;
  let fetchSpy: jest.SpyInstance;

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
    ocrService = new VisionOcrService(new ConfigService({ VISION_API_KEY: 'test-key' }));
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('should return the first annotation description', async () => {
    fetchSpy.mockResolvedValueOnce(
      jsonResponse({
        responses: [
          {
            textAnnotations: [
              { description: 'My summer vacation\nI went to Tainan.' },
              { description: 'My' },
            ],
          },
        ],
      }),
    );

    const text = await ocrService.detectText(Buffer.from('image-bytes'));

    expect(text).toBe('My summer vacation\nI went to Tainan.');
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe('https://vision.googleapis.com/v1/images:annotate?key=test-key');
    expect(JSON.parse(init.body)).toEqual({
      requests: [
        {
          image: { content: Buffer.from('image-bytes').toString('base64') },
          features: [{ type: 'TEXT_DETECTION' }],
        },
      ],
    });
  });

  it('should return an empty string when no text is detected', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({ responses: [{}] }));

    await expect(ocrService.detectText(Buffer.from('blank'))).resolves.toBe('');
  });

  it('should throw on a per-image error', async () => {
    fetchSpy.mockResolvedValueOnce(
      jsonResponse({ responses: [{ error: { code: 3, message: 'Bad image data.' } }] }),
    );

    await expect(ocrService.detectText(Buffer.from('broken'))).rejects.toThrow(
      'Vision API error: Bad image data.',
    );
  });

  it('should throw on a non-2xx status', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({}, 403));

    await expect(ocrService.detectText(Buffer.from('image'))).rejects.toThrow(OcrError);
  });

  it('should wrap transport failures', async () => {
    fetchSpy.mockRejectedValueOnce(new Error('socket hang up'));

    await expect(ocrService.detectText(Buffer.from('image'))).rejects.toThrow(
      'Vision API request failed: socket hang up',
    );
  });

  it('should require an API key', async () => {
    const unconfigured = new VisionOcrService(new ConfigService({}));

    await expect(unconfigured.detectText(Buffer.from('image'))).rejects.toThrow(
      'VISION_API_KEY must be configured',
    );
    expect(fetchSpy).not.toHaveBeenCalled();
  });
});
