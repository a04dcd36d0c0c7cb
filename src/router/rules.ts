/**
 * Routing rules, evaluated top to bottom; the first match wins
 */

import type { Message } from '../context-store/types';
import { PRIORITY_TIERS, type HandlerDescriptor, type PriorityTier } from '../handler-registry/types';
import { findPhrase, matchIndicators, messageText, normalizeText, scanText } from './indicator-matcher';
import type { RoutingRuleDefinition, RuleInput, RuleMatch } from './types';

/** Score of a tier match found only in earlier messages */
const CARRIED_OVER_SCORE = 0.5;

/**
 * Distress vocabulary beats everything, including explicit names
 */
export const crisisRule: RoutingRuleDefinition = {
  name: 'crisis',
  evaluate({ message, handlers }) {
    const text = messageText(message);
    for (const handler of handlers) {
      if (handler.priorityTier !== 'crisis') continue;
      const matched = matchIndicators(text, handler.triggerKeywords);
      if (matched.length > 0) {
        return { handler, matchedIndicators: matched, score: 1 };
      }
    }
    return null;
  },
};

/**
 * A handler's name in the body selects it; the earliest mention wins
 */
export const explicitTriggerRule: RoutingRuleDefinition = {
  name: 'explicit',
  evaluate({ message, handlers }) {
    const body = normalizeText(message.body);
    let best: { handler: Readonly<HandlerDescriptor>; alias: string; position: number } | null = null;

    for (const handler of handlers) {
      for (const alias of handler.aliases) {
        const position = findPhrase(body, alias);
        if (position === -1) continue;
        // Same start: the longer alias is the more specific name
        if (!best || position < best.position
          || (position === best.position && alias.length > best.alias.length)) {
          best = { handler, alias, position };
        }
      }
    }

    return best ? { handler: best.handler, matchedIndicators: [best.alias], score: 1 } : null;
  },
};

/**
 * Replying to a handler's message keeps talking to that handler
 */
export const replyRule: RoutingRuleDefinition = {
  name: 'reply',
  evaluate({ options, handlers }) {
    if (!options.replyToHandlerId) return null;
    const handler = handlers.find(h => h.handlerId === options.replyToHandlerId);
    return handler ? { handler, matchedIndicators: [], score: 1 } : null;
  },
};

/**
 * Images go to the first vision-capable handler
 */
export const contentTypeRule: RoutingRuleDefinition = {
  name: 'content_type',
  evaluate({ message, handlers, engaged }) {
    if (!engaged) return null;
    if (!message.attachments.some(a => a.kind === 'image')) return null;

    const handler = handlers.find(h => h.capabilityTags.includes('vision'));
    return handler ? { handler, matchedIndicators: ['attachment:image'], score: 1 } : null;
  },
};

/**
 * Walk tiers high to low over the inbound message, then over the most
 * recent human messages in the window.
 */
export function createTierScanRule(contextScanDepth: number): RoutingRuleDefinition {
  return {
    name: 'tier_scan',
    evaluate({ message, window, handlers, engaged }) {
      if (!engaged) return null;

      const direct = scanTiers(scanText(message), handlers, 1);
      if (direct) return direct;

      const recent = recentHumanText(window, message.id, contextScanDepth);
      return recent ? scanTiers(recent, handlers, CARRIED_OVER_SCORE) : null;
    },
  };
}

/**
 * Router mode or direct address with nothing more specific
 */
export const fallbackRule: RoutingRuleDefinition = {
  name: 'fallback',
  evaluate({ options, handlers }) {
    if (!options.activeRouterMode && !options.addressed) return null;
    const handler = handlers.find(h => h.isDefaultFallback);
    return handler ? { handler, matchedIndicators: [], score: 0 } : null;
  },
};

function scanTiers(text: string, handlers: RuleInput['handlers'], score: number): RuleMatch | null {
  for (const tier of PRIORITY_TIERS) {
    if (tier === 'crisis') continue;
    const match = scanTier(text, tier, handlers, score);
    if (match) return match;
  }
  return null;
}

/**
 * Several matches in one tier: the higher confidence threshold is the
 * more specialised handler; equal thresholds keep list order.
 */
function scanTier(
  text: string,
  tier: PriorityTier,
  handlers: RuleInput['handlers'],
  score: number
): RuleMatch | null {
  let best: RuleMatch | null = null;

  for (const handler of handlers) {
    if (handler.priorityTier !== tier) continue;
    const matched = matchIndicators(text, handler.triggerKeywords);
    if (matched.length === 0) continue;
    if (!best || handler.confidenceThreshold > best.handler.confidenceThreshold) {
      best = { handler, matchedIndicators: matched, score };
    }
  }

  return best;
}

function recentHumanText(window: readonly Message[], excludeId: string, depth: number): string | null {
  if (depth <= 0) return null;

  const recent = window
    .filter(m => !m.isResponse && m.id !== excludeId)
    .slice(-depth);
  if (recent.length === 0) return null;

  return recent.map(scanText).join(' ');
}

export function defaultRules(contextScanDepth: number): RoutingRuleDefinition[] {
  return [
    crisisRule,
    explicitTriggerRule,
    replyRule,
    contentTypeRule,
    createTierScanRule(contextScanDepth),
    fallbackRule,
  ];
}
