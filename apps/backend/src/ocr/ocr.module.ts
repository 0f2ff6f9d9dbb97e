import { Global, Module } from '@nestjs/common';
import { VisionOcrService } from './vision-ocr.service';

@Global()
@Module({
  providers: [VisionOcrService],
  exports: [VisionOcrService],
})
export class OcrModule {}
