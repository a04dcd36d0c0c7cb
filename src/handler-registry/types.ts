/**
 * Handler Registry - Type Definitions
 */

/**
 * Priority tiers, highest first
 */
export const PRIORITY_TIERS = [
  'crisis',
  'safety',
  'content-type',
  'reasoning',
  'domain',
  'creative',
  'detail',
  'general',
] as const;

export type PriorityTier = typeof PRIORITY_TIERS[number];

/**
 * Lower rank means higher priority
 */
export function tierRank(tier: PriorityTier): number {
  return PRIORITY_TIERS.indexOf(tier);
}

export interface HandlerDescriptor {
  handlerId: string;
  displayName: string;
  priorityTier: PriorityTier;
  /** Advisory floor in [0, 1]; only breaks ties inside a tier */
  confidenceThreshold: number;
  /** Indicator vocabulary scanned by the router */
  triggerKeywords: readonly string[];
  /** Literal names that address this handler directly */
  aliases: readonly string[];
  capabilityTags: readonly string[];
  isDefaultFallback: boolean;
  systemPromptTemplate: string;
  /** Backend model identifier */
  model: string;
  temperature?: number;
  clonedFrom?: string;
}

/**
 * Prompt edits and clones saved next to the built-in catalogue
 */
export interface RegistryOverrides {
  prompts: Record<string, string>;
  clones: CloneRecord[];
}

export interface CloneRecord {
  handlerId: string;
  sourceId: string;
  /** Parent's template at clone time; target of reset */
  baselineTemplate: string;
}

export interface HandlerRegistryOptions {
  /** Where prompt edits and clones are saved; in-memory only when omitted */
  overridesPath?: string;
}

/**
 * Values substituted into a system prompt template
 */
export interface PromptVariables {
  modelId: string;
  username: string;
  userId: string;
  serverName?: string;
  channelName?: string;
  /** Instant rendered as {TIME}; defaults to now */
  at?: number;
}
