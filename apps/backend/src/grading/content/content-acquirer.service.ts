import { Injectable, Logger } from '@nestjs/common';
import { BadRequestError } from '../../common/errors';
import { VisionOcrService } from '../../ocr/vision-ocr.service';
import { AcquiredContent, GradingUploads, UploadedImage } from '../grading.types';
import { CategoryProfile } from '../submission-categories';

export const OCR_TEXT_SEPARATOR = '\n\n';

const hasBytes = (image: UploadedImage) => image.buffer.length > 0;

@Injectable()
export class ContentAcquirerService {
  private readonly logger = new Logger(ContentAcquirerService.name);

  constructor(private readonly ocrService: VisionOcrService) {}

  /**
   * Typed text wins. Otherwise the category's uploads are OCR'd and the
   * images travel with the prompt.
   */
  async acquire(
    profile: CategoryProfile,
    text: string | undefined,
    uploads: GradingUploads,
  ): Promise<AcquiredContent> {
    if (text?.trim()) {
      this.logger.log('Using typed submission text');
      return { text, images: [] };
    }

    const images = (uploads[profile.uploadField] || []).filter(hasBytes);
    if (!images.length) {
      throw new BadRequestError(
        `A text submission or at least one image in ${profile.uploadField} is required for ${profile.category}.`,
        'NO_CONTENT_PROVIDED',
      );
    }

    this.logger.log(`Running OCR on ${images.length} uploaded image(s)`);
    const texts = await this.recognizeAll(images);
    if (!texts.length) {
      throw new BadRequestError(
        'OCR failed for every uploaded image and no text was provided.',
        'NO_CONTENT_PROVIDED',
      );
    }

    return { text: texts.join(OCR_TEXT_SEPARATOR), images };
  }

  /** Reference answer for quiz essays. Never throws; a miss is ''. */
  async acquireReferenceAnswer(text: string | undefined, images: UploadedImage[] = []) {
    if (text?.trim()) {
      return text;
    }

    const usable = images.filter(hasBytes);
    if (!usable.length) {
      return '';
    }

    this.logger.log(`Running OCR on ${usable.length} reference answer image(s)`);
    const texts = await this.recognizeAll(usable);
    return texts.join(OCR_TEXT_SEPARATOR);
  }

  // Results keep upload order regardless of which call settles first.
  private async recognizeAll(images: UploadedImage[]): Promise<string[]> {
    const results = await Promise.all(
      images.map(async (image, index) => {
        const label = `${image.originalName || 'image'} (#${index + 1})`;
        try {
          const text = await this.ocrService.detectText(image.buffer);
          if (!text.trim()) {
            this.logger.warn(`OCR returned no text for ${label}`);
            return null;
          }
          return text;
        } catch (error) {
          const message = error instanceof Error ? error.message : 'Unknown error';
          this.logger.warn(`OCR failed for ${label}: ${message}`);
          return null;
        }
      }),
    );

    return results.filter((text): text is string => text !== null);
  }
}
