import { buildPromptParts, IMAGE_INTRO_TEXT } from './prompt-parts';

describe('buildPromptParts', () => {
  it('should send only the prompt text when no images are attached', () => {
    expect(buildPromptParts('filled prompt', { text: 'typed essay', images: [] })).toEqual([
      { type: 'text', text: 'filled prompt' },
    ]);
  });

  it('should append the intro and images in upload order', () => {
    const first = Buffer.from('page-1');
    const second = Buffer.from('page-2');

    const parts = buildPromptParts('filled prompt', {
      text: 'ocr text',
      images: [
        { originalName: 'p1.jpg', mimeType: 'image/jpeg', buffer: first },
        { originalName: 'empty.png', mimeType: 'image/png', buffer: Buffer.alloc(0) },
        { originalName: 'p2.png', mimeType: 'image/png', buffer: second },
      ],
    });

    expect(parts).toEqual([
      { type: 'text', text: 'filled prompt' },
      { type: 'text', text: IMAGE_INTRO_TEXT },
      { type: 'image', mimeType: 'image/jpeg', data: first },
      { type: 'image', mimeType: 'image/png', data: second },
    ]);
  });
});
