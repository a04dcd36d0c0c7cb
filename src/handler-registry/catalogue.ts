/**
 * Built-in handler catalogue (data/handlers.json)
 */

import { z } from 'zod';
import catalogueData from '../../data/handlers.json';
import { RegistryConfigError } from '../errors';
import { PRIORITY_TIERS, type HandlerDescriptor } from './types';

const handlerSchema = z.object({
  id: z.string().regex(/^[a-z0-9][a-z0-9_-]*$/, 'lowercase letters, digits, - and _ only'),
  displayName: z.string().min(1),
  tier: z.enum(PRIORITY_TIERS),
  confidenceThreshold: z.number().min(0).max(1),
  aliases: z.array(z.string().min(1)),
  triggerKeywords: z.array(z.string().min(1)),
  capabilityTags: z.array(z.string().min(1)),
  isDefaultFallback: z.boolean().optional(),
  model: z.string().min(1),
  temperature: z.number().min(0).max(2).optional(),
  persona: z.string().min(1),
});

const catalogueSchema = z.object({
  promptPreamble: z.string().min(1),
  handlers: z.array(handlerSchema).min(1),
});

/**
 * Validate a raw catalogue and expand it into descriptors
 */
export function parseCatalogue(raw: unknown): HandlerDescriptor[] {
  const result = catalogueSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new RegistryConfigError(`Invalid handler catalogue at ${issue.path.join('.')}: ${issue.message}`, {
      path: issue.path,
    });
  }

  const { promptPreamble, handlers } = result.data;
  return handlers.map(entry => ({
    handlerId: entry.id,
    displayName: entry.displayName,
    priorityTier: entry.tier,
    confidenceThreshold: entry.confidenceThreshold,
    triggerKeywords: entry.triggerKeywords,
    aliases: entry.aliases,
    capabilityTags: entry.capabilityTags,
    isDefaultFallback: entry.isDefaultFallback ?? false,
    systemPromptTemplate: `${promptPreamble}\n\n${entry.persona}`,
    model: entry.model,
    temperature: entry.temperature,
  }));
}

export function loadBuiltInCatalogue(): HandlerDescriptor[] {
  return parseCatalogue(catalogueData);
}
