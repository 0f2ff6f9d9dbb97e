import { AcquiredContent, PromptPart } from '../grading.types';

export const IMAGE_INTRO_TEXT = '以下為學生原始作業圖片，請參考其版面與手寫內容：';

/** Filled template first, then the student's images behind a short intro. */
export const buildPromptParts = (promptText: string, content: AcquiredContent): PromptPart[] => {
  const parts: PromptPart[] = [{ type: 'text', text: promptText }];
  const images = content.images.filter((image) => image.buffer.length > 0);

  if (images.length) {
    parts.push({ type: 'text', text: IMAGE_INTRO_TEXT });
    parts.push(
      ...images.map((image): PromptPart => ({
        type: 'image',
        mimeType: image.mimeType,
        data: image.buffer,
      })),
    );
  }

  return parts;
};
