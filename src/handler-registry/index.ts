/**
 * Handler Registry - public API
 */

export { HandlerRegistry, validateDescriptors } from './HandlerRegistry';
export { loadBuiltInCatalogue, parseCatalogue } from './catalogue';
export {
  renderSystemPrompt,
  formatClockTime,
  formatZoneName,
  DM_SERVER_NAME,
  DM_CHANNEL_NAME,
} from './prompt-template';
export { PRIORITY_TIERS, tierRank } from './types';
export type {
  HandlerDescriptor,
  HandlerRegistryOptions,
  PriorityTier,
  PromptVariables,
  RegistryOverrides,
  CloneRecord,
} from './types';
