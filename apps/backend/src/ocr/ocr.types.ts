export interface VisionAnnotateRequest {
  requests: Array<{
    image: { content: string };
    features: Array<{ type: 'TEXT_DETECTION' | 'DOCUMENT_TEXT_DETECTION' }>;
  }>;
}

export interface VisionAnnotateResponse {
  responses?: Array<{
    textAnnotations?: Array<{ description?: string; locale?: string }>;
    error?: { code?: number; message?: string };
  }>;
}

export class OcrError extends Error {
  constructor(message: string) {
    super(message);
    this.name = OcrError.name;
  }
}
