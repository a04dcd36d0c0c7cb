/**
 * Tests for rendering a shared window into one handler's chat turns
 */

import { HandlerRegistry } from '../../handler-registry/HandlerRegistry';
import { buildHistory, buildMessageContent, isVisionCapable } from '../history';
import { descriptor, humanMessage, responseMessage } from '../../testing';

describe('buildHistory', () => {
  const gemini = descriptor({ handlerId: 'gemini', displayName: 'Gemini' });
  const claude = descriptor({ handlerId: 'claude', displayName: 'Claude' });
  const vision = descriptor({ handlerId: 'llama-vision', displayName: 'Llama Vision', capabilityTags: ['vision'] });
  const fallback = descriptor({ handlerId: 'ministral', displayName: 'Ministral', isDefaultFallback: true });
  const registry = new HandlerRegistry([gemini, claude, vision, fallback]);

  it('should render human messages as user turns with the author name', () => {
    const turns = buildHistory([humanMessage({ body: 'hello all' })], gemini, registry);
    expect(turns).toEqual([{ role: 'user', content: 'Alice: hello all' }]);
  });

  it('should keep the answering handler unlabelled and label the others', () => {
    const window = [
      humanMessage({ id: 'm1', body: 'compare cats and dogs' }),
      responseMessage({ id: 'r1', handlerId: 'gemini', body: 'Cats are quieter.' }),
      responseMessage({ id: 'r2', handlerId: 'claude', body: 'Dogs are louder.' }),
    ];

    expect(buildHistory(window, gemini, registry)).toEqual([
      { role: 'user', content: 'Alice: compare cats and dogs' },
      { role: 'assistant', content: 'Cats are quieter.' },
      { role: 'assistant', content: '[Claude] Dogs are louder.' },
    ]);
  });

  it('should fall back to the handler id for a removed handler', () => {
    const window = [responseMessage({ handlerId: 'retired', body: 'Old words.' })];
    expect(buildHistory(window, gemini, registry)).toEqual([
      { role: 'assistant', content: '[retired] Old words.' },
    ]);
  });

  it('should append attachment text and image descriptions', () => {
    const window = [
      humanMessage({
        body: 'see these',
        attachments: [
          { kind: 'text', extractedText: 'line one' },
          { kind: 'image', url: 'https://example.test/a.png', extractedText: 'a red barn' },
          { kind: 'image', url: 'https://example.test/b.png' },
        ],
      }),
    ];

    expect(buildHistory(window, vision, registry)).toEqual([
      {
        role: 'user',
        content: 'Alice: see these\n[Attachment: line one]\n[Image description: a red barn]',
      },
    ]);
  });
});

describe('buildMessageContent', () => {
  const gemini = descriptor({ handlerId: 'gemini', displayName: 'Gemini' });
  const vision = descriptor({ handlerId: 'llama-vision', capabilityTags: ['vision'] });
  const message = humanMessage({
    body: 'what is this?',
    attachments: [{ kind: 'image', url: 'https://example.test/cat.png', extractedText: 'a sleeping cat' }],
  });

  it('should forward image URLs to vision handlers', () => {
    expect(isVisionCapable(vision)).toBe(true);
    expect(buildMessageContent(message, vision)).toEqual({
      text: 'Alice: what is this?',
      imageUrls: ['https://example.test/cat.png'],
    });
  });

  it('should describe images for handlers without vision', () => {
    expect(isVisionCapable(gemini)).toBe(false);
    expect(buildMessageContent(message, gemini)).toEqual({
      text: 'Alice: what is this?\n[Image description: a sleeping cat]',
      imageUrls: [],
    });
  });

  it('should render an attachment-only message without a body', () => {
    const bare = humanMessage({ body: '', attachments: [{ kind: 'text', extractedText: 'notes' }] });
    expect(buildMessageContent(bare, gemini).text).toBe('Alice: [Attachment: notes]');
  });
});
