/**
 * Tests for catalogue parsing and prompt rendering
 */

import { RegistryConfigError } from '../../errors';
import { loadBuiltInCatalogue, parseCatalogue } from '../catalogue';
import { formatClockTime, formatZoneName, renderSystemPrompt } from '../prompt-template';
import { BASE_TIME } from '../../testing';

describe('catalogue', () => {
  it('should expand the preamble into every template', () => {
    const handlers = loadBuiltInCatalogue();
    for (const handler of handlers) {
      expect(handler.systemPromptTemplate.startsWith('You are {MODEL_ID},')).toBe(true);
    }
  });

  it('should mark exactly one built-in as default fallback', () => {
    const fallbacks = loadBuiltInCatalogue().filter(h => h.isDefaultFallback);
    expect(fallbacks.map(h => h.handlerId)).toEqual(['ministral']);
  });

  it('should reject an unknown tier', () => {
    expect(() => parseCatalogue({
      promptPreamble: 'Hi',
      handlers: [{
        id: 'x',
        displayName: 'X',
        tier: 'urgent',
        confidenceThreshold: 0.5,
        aliases: [],
        triggerKeywords: [],
        capabilityTags: [],
        model: 'm',
        persona: 'p',
      }],
    })).toThrow(RegistryConfigError);
  });
});

describe('renderSystemPrompt', () => {
  const template = 'I am {MODEL_ID} talking to {USERNAME} ({DISCORD_USER_ID}) at {TIME} {TZ} in {SERVER_NAME}/#{CHANNEL_NAME}.';

  it('should substitute every recognised variable', () => {
    const rendered = renderSystemPrompt(template, {
      modelId: 'Gemini',
      username: 'Alice',
      userId: 'user-1',
      serverName: 'Book Club',
      channelName: 'general',
      at: BASE_TIME,
    }, 'UTC');

    expect(rendered).toBe('I am Gemini talking to Alice (user-1) at 06:30 PM UTC in Book Club/#general.');
  });

  it('should fall back to direct message names', () => {
    const rendered = renderSystemPrompt('{SERVER_NAME} / {CHANNEL_NAME}', {
      modelId: 'Gemini',
      username: 'Alice',
      userId: 'user-1',
      at: BASE_TIME,
    }, 'UTC');

    expect(rendered).toBe('Direct Message / DM');
  });

  it('should leave unknown placeholders alone', () => {
    const rendered = renderSystemPrompt('{MODEL_ID} {MOOD}', {
      modelId: 'Sydney',
      username: 'Alice',
      userId: 'user-1',
    }, 'UTC');

    expect(rendered).toBe('Sydney {MOOD}');
  });

  it('should render time in the display timezone', () => {
    expect(formatClockTime(BASE_TIME, 'America/Chicago')).toBe('12:30 PM');
    expect(formatZoneName(BASE_TIME, 'America/Chicago')).toBe('CST');
  });
});
