/**
 * Router
 *
 * Deterministic rule table mapping an inbound message and its window
 * to at most one handler. Same inputs, same decision.
 */

import type { Message } from '../context-store/types';
import type { HandlerRegistry } from '../handler-registry/HandlerRegistry';
import { createLogger } from '../logger';
import { defaultRules } from './rules';
import type { RouteOptions, RouterConfig, RoutingDecision, RoutingRuleDefinition } from './types';

const log = createLogger('router');

export const DEFAULT_ROUTER_CONFIG: RouterConfig = {
  contextScanDepth: 2,
};

export class Router {
  private rules: RoutingRuleDefinition[];

  constructor(
    private registry: HandlerRegistry,
    config: Partial<RouterConfig> = {},
    rules?: RoutingRuleDefinition[]
  ) {
    const { contextScanDepth } = { ...DEFAULT_ROUTER_CONFIG, ...config };
    this.rules = rules ?? defaultRules(contextScanDepth);
  }

  route(message: Message, window: readonly Message[], options: RouteOptions): RoutingDecision {
    const handlers = this.registry.list();
    const engaged = options.activeRouterMode
      || options.addressed === true
      || (message.body.trim() === '' && message.attachments.length > 0);

    for (const rule of this.rules) {
      const match = rule.evaluate({ message, window, options, handlers, engaged });
      if (!match) continue;

      const decision: RoutingDecision = {
        messageId: message.id,
        selectedHandlerId: match.handler.handlerId,
        matchedTier: match.handler.priorityTier,
        matchedIndicators: match.matchedIndicators,
        score: match.score,
        rule: rule.name,
      };
      log.info('Routed message', { ...decision, channelId: message.channelId });
      return decision;
    }

    const decision: RoutingDecision = {
      messageId: message.id,
      selectedHandlerId: null,
      matchedTier: null,
      matchedIndicators: [],
      score: 0,
      rule: 'none',
    };
    log.debug('No handler selected', { messageId: message.id, channelId: message.channelId });
    return decision;
  }
}
