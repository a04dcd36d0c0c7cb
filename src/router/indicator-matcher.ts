/**
 * Indicator Matcher
 *
 * Case-insensitive phrase matching on word boundaries. Single words
 * and multi-word phrases both match only as whole tokens, so "sad"
 * never fires inside "crusade".
 */

import type { Attachment, Message } from '../context-store/types';

const patternCache = new Map<string, RegExp>();

export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[‘’ʼ]/g, "'")
    .replace(/\s+/g, ' ')
    .trim();
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function phrasePattern(phrase: string): RegExp {
  const normalized = normalizeText(phrase);
  let pattern = patternCache.get(normalized);
  if (!pattern) {
    pattern = new RegExp(`(?<![a-z0-9])${escapeRegExp(normalized)}(?![a-z0-9])`);
    patternCache.set(normalized, pattern);
  }
  return pattern;
}

/**
 * Index of the phrase in already-normalized text, or -1
 */
export function findPhrase(haystack: string, phrase: string): number {
  if (!phrase.trim()) return -1;
  const match = phrasePattern(phrase).exec(haystack);
  return match ? match.index : -1;
}

/**
 * Indicators present in the text, in the order given
 */
export function matchIndicators(haystack: string, indicators: readonly string[]): string[] {
  return indicators.filter(indicator => findPhrase(haystack, indicator) !== -1);
}

export function attachmentTokens(attachments: readonly Attachment[]): string[] {
  return attachments.map(attachment => `attachment:${attachment.kind}`);
}

/**
 * Body plus extracted attachment text
 */
export function messageText(message: Message): string {
  const parts = [message.body];
  for (const attachment of message.attachments) {
    if (attachment.extractedText) parts.push(attachment.extractedText);
  }
  return normalizeText(parts.join(' '));
}

/**
 * Text plus attachment-kind tokens, for the tier scan
 */
export function scanText(message: Message): string {
  return [messageText(message), ...attachmentTokens(message.attachments)].join(' ');
}
