import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Post,
  UploadedFiles,
  UseInterceptors,
} from '@nestjs/common';
import { FileFieldsInterceptor } from '@nestjs/platform-express';
import type { Express } from 'express';
import { memoryStorage } from 'multer';
import { GradeSubmissionDto } from './dto/grade-submission.dto';
import { GradingResult, GradingUploads, UploadedImage } from './grading.types';
import { GradingService } from './grading.service';

const UPLOAD_FIELDS = [
  'essayImage',
  'learningSheetFile',
  'readingWritingFile',
  'standardAnswerImage',
] as const;

type UploadedFileMap = Partial<Record<(typeof UPLOAD_FIELDS)[number], Express.Multer.File[]>>;

const toUploadedImage = (file: Express.Multer.File): UploadedImage => ({
  originalName: file.originalname,
  mimeType: file.mimetype,
  buffer: file.buffer,
});

const toGradingUploads = (files: UploadedFileMap = {}): GradingUploads => {
  const uploads: GradingUploads = {};
  for (const field of UPLOAD_FIELDS) {
    const list = files[field];
    if (list?.length) {
      uploads[field] = list.map(toUploadedImage);
    }
  }
  return uploads;
};

@Controller('grade')
export class GradingController {
  constructor(private readonly gradingService: GradingService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(
    FileFieldsInterceptor(
      UPLOAD_FIELDS.map((name) => ({ name, maxCount: 10 })),
      {
        storage: memoryStorage(),
        limits: { fileSize: 10 * 1024 * 1024 }, // 10MB per file
        fileFilter: (_req, file, cb) => {
          // Non-image parts are dropped, not rejected
          cb(null, /^image\//.test(file.mimetype));
        },
      },
    ),
  )
  async grade(
    @Body() body: GradeSubmissionDto,
    @UploadedFiles() files?: UploadedFileMap,
  ): Promise<GradingResult> {
    const outcome = await this.gradingService.grade({ ...body, uploads: toGradingUploads(files) });
    return outcome.result;
  }
}
