import { IsNotEmpty, IsOptional, IsString } from 'class-validator';

/**
 * Text fields of the grading form. The category itself is checked against the
 * dispatch table so an unknown one reports UNSUPPORTED_CATEGORY.
 */
export class GradeSubmissionDto {
  @IsString()
  @IsNotEmpty()
  submissionType!: string;

  @IsString()
  @IsNotEmpty()
  gradeLevel!: string;

  @IsOptional()
  @IsString()
  text?: string;

  @IsOptional()
  @IsString()
  bookrange?: string;

  @IsOptional()
  @IsString()
  learnsheets?: string;

  @IsOptional()
  @IsString()
  worksheetCategory?: string;

  @IsOptional()
  @IsString()
  standardAnswerText?: string;

  @IsOptional()
  @IsString()
  scoringInstructions?: string;
}
