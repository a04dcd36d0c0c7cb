/**
 * Router - public API
 */

export { Router, DEFAULT_ROUTER_CONFIG } from './Router';
export {
  crisisRule,
  explicitTriggerRule,
  replyRule,
  contentTypeRule,
  createTierScanRule,
  fallbackRule,
  defaultRules,
} from './rules';
export { findPhrase, matchIndicators, messageText, normalizeText, scanText } from './indicator-matcher';
export type {
  RouteOptions,
  RouterConfig,
  RoutingDecision,
  RoutingRule,
  RoutingRuleDefinition,
  RuleInput,
  RuleMatch,
} from './types';
