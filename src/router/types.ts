/**
 * Router - Type Definitions
 */

import type { Message } from '../context-store/types';
import type { HandlerDescriptor, PriorityTier } from '../handler-registry/types';

/**
 * Which rule produced a decision
 */
export type RoutingRule =
  | 'crisis'
  | 'explicit'
  | 'reply'
  | 'content_type'
  | 'tier_scan'
  | 'fallback'
  | 'none';

export interface RouteOptions {
  activeRouterMode: boolean;
  /** Direct message, @mention or a mention keyword in the body */
  addressed?: boolean;
  /** Handler that produced the message this one replies to */
  replyToHandlerId?: string;
}

export interface RoutingDecision {
  messageId: string;
  /** null: nobody answers; the message is only recorded */
  selectedHandlerId: string | null;
  matchedTier: PriorityTier | null;
  /** Matched indicators in descriptor order */
  matchedIndicators: string[];
  score: number;
  rule: RoutingRule;
}

/**
 * Everything a rule may look at
 */
export interface RuleInput {
  message: Message;
  window: readonly Message[];
  options: RouteOptions;
  handlers: readonly Readonly<HandlerDescriptor>[];
  /** Router mode on, addressed, or attachment-only */
  engaged: boolean;
}

export interface RuleMatch {
  handler: Readonly<HandlerDescriptor>;
  matchedIndicators: string[];
  score: number;
}

/**
 * One entry in the ordered rule table
 */
export interface RoutingRuleDefinition {
  name: Exclude<RoutingRule, 'none'>;
  evaluate(input: RuleInput): RuleMatch | null;
}

export interface RouterConfig {
  /** Human messages from the window scanned when the inbound text matches nothing */
  contextScanDepth: number;
}
