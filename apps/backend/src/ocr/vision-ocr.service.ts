import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OcrError, VisionAnnotateRequest, VisionAnnotateResponse } from './ocr.types';

@Injectable()
export class VisionOcrService {
  private readonly logger = new Logger(VisionOcrService.name);
  private readonly apiKey: string;
  private readonly timeoutMs: number;

  private readonly ANNOTATE_URL = 'https://vision.googleapis.com/v1/images:annotate';

  constructor(configService: ConfigService) {
    this.apiKey = configService.get<string>('VISION_API_KEY') || '';
    this.timeoutMs = Number(configService.get<string>('OCR_TIMEOUT_MS') || '30000');
  }

  /**
   * Runs text detection on one image. Returns the full detected text, or an
   * empty string when the image holds none.
   */
  async detectText(image: Buffer): Promise<string> {
    if (!this.apiKey) {
      throw new OcrError('VISION_API_KEY must be configured');
    }

    const payload: VisionAnnotateRequest = {
      requests: [
        {
          image: { content: image.toString('base64') },
          features: [{ type: 'TEXT_DETECTION' }],
        },
      ],
    };

    const startedAt = Date.now();
    const response = await this.post(payload);

    if (!response.ok) {
      throw new OcrError(`Vision API request failed: ${response.status} ${response.statusText}`);
    }

    const data = (await response.json()) as VisionAnnotateResponse;
    const [result] = data.responses || [];

    if (result?.error) {
      throw new OcrError(
        `Vision API error: ${result.error.message || `code ${result.error.code ?? 'unknown'}`}`,
      );
    }

    const text = result?.textAnnotations?.[0]?.description || '';
    this.logger.debug(`Detected ${text.length} chars in ${Date.now() - startedAt}ms`);
    return text;
  }

  private async post(payload: VisionAnnotateRequest): Promise<Response> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      return await fetch(`${this.ANNOTATE_URL}?key=${encodeURIComponent(this.apiKey)}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new OcrError(`Vision API request failed: ${message}`);
    } finally {
      clearTimeout(timeout);
    }
  }
}
