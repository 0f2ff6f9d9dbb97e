export type ScoreValue = string | number;

export type ErrorAnalysisItem = {
  original_sentence: string;
  error_type: string;
  error_content: string;
  suggestion: string;
};

export type RubricItem = {
  item: string;
  score: number;
  comment: string;
};

export type ParagraphResult = {
  submissionType: string;
  error_analysis: ErrorAnalysisItem[];
  rubric_evaluation: {
    structure_performance: RubricItem[];
    content_language: RubricItem[];
  };
  overall_assessment: {
    total_score: string;
    suggested_grade: string;
    grade_basis: string;
    general_comment: string;
  };
  model_paragraph: string;
  teacher_summary_feedback: string;
};

export type ErrorAnalysisTableItem = {
  original_sentence: string;
  error_type: string;
  problem_description: string;
  suggestion: string;
};

export type QuizResult = {
  submissionType: string;
  error_analysis_table: ErrorAnalysisTableItem[];
  summary_feedback_for_student: {
    summary_feedback: string;
    total_score_display: string;
    suggested_grade_display: string;
    grade_basis_display: string;
  };
  revised_demonstration: {
    original_with_errors_highlighted: string;
    suggested_revision: string;
  };
  positive_learning_feedback: string;
};

export type QuestionFeedback = {
  question_number: string;
  student_answer: string;
  is_correct: string;
  comment: string;
  correct_answer: string;
  answer_source_query: string;
  answer_source_content: string;
};

export type SectionFeedback = {
  section_title: string;
  questions_feedback: QuestionFeedback[];
  section_summary: string;
};

export type ScoreBreakdownItem = {
  section: string;
  max_score: ScoreValue;
  obtained_score: ScoreValue;
};

export type WorksheetResult = {
  submissionType: string;
  title: string;
  sections: SectionFeedback[];
  overall_score_summary_title: string;
  score_breakdown_table: ScoreBreakdownItem[];
  final_total_score_text: string;
  final_suggested_grade_title: string;
  final_suggested_grade_text: string;
  overall_feedback_title?: string | null;
  overall_feedback?: string | null;
};

export type ResultSchemaName = 'paragraph' | 'quiz' | 'worksheet';

export type GradingOutcome =
  | { schema: 'paragraph'; result: ParagraphResult }
  | { schema: 'quiz'; result: QuizResult }
  | { schema: 'worksheet'; result: WorksheetResult };

export type GradingResult = GradingOutcome['result'];

export type UploadedImage = {
  originalName: string;
  mimeType: string;
  buffer: Buffer;
};

export type UploadField = 'essayImage' | 'learningSheetFile' | 'readingWritingFile';

export type GradingUploads = Partial<Record<UploadField | 'standardAnswerImage', UploadedImage[]>>;

export type GradingRequest = {
  submissionType: string;
  gradeLevel: string;
  text?: string;
  bookrange?: string;
  learnsheets?: string;
  worksheetCategory?: string;
  standardAnswerText?: string;
  scoringInstructions?: string;
  uploads: GradingUploads;
};

export type AcquiredContent = {
  text: string;
  images: UploadedImage[];
};

export type PromptPart =
  | { type: 'text'; text: string }
  | { type: 'image'; mimeType: string; data: Buffer };

export type ModelOutcome =
  | { status: 'blocked'; reason?: string }
  | { status: 'no-text'; finishReason?: string }
  | { status: 'text'; text: string };
