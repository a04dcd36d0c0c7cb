/**
 * Handler Registry
 *
 * Read-mostly table of handler descriptors. Reads are synchronous;
 * clone and prompt edits go through one serialized write path and are
 * optionally saved to an overrides file.
 */

import { z } from 'zod';
import { ChannelLock } from '../context-store/ChannelLock';
import type { FileSystem } from '../context-store/FileSystem';
import { writeAtomic } from '../context-store/FileSystem';
import {
  CloneError,
  HandlerNotFoundError,
  InvalidArgumentError,
  RegistryConfigError,
  StoreUnavailableError,
  isNotFoundError,
} from '../errors';
import { createLogger } from '../logger';
import {
  tierRank,
  type CloneRecord,
  type HandlerDescriptor,
  type HandlerRegistryOptions,
  type RegistryOverrides,
} from './types';

const log = createLogger('handler-registry');

const HANDLER_ID_PATTERN = /^[a-z0-9][a-z0-9_-]*$/;
const WRITE_LANE = 'registry';

const overridesSchema = z.object({
  prompts: z.record(z.string()),
  clones: z.array(
    z.object({
      handlerId: z.string(),
      sourceId: z.string(),
      baselineTemplate: z.string(),
    })
  ),
});

export class HandlerRegistry {
  private descriptors = new Map<string, Readonly<HandlerDescriptor>>();
  /** Template restored by resetSystemPrompt */
  private baselines = new Map<string, string>();
  private clones: CloneRecord[] = [];
  private writes = new ChannelLock();

  constructor(
    descriptors: HandlerDescriptor[],
    private fs?: FileSystem,
    private options: HandlerRegistryOptions = {}
  ) {
    validateDescriptors(descriptors);

    for (const descriptor of descriptors) {
      this.descriptors.set(descriptor.handlerId, Object.freeze({ ...descriptor }));
      this.baselines.set(descriptor.handlerId, descriptor.systemPromptTemplate);
    }
  }

  /**
   * Build a registry and replay saved clones and prompt edits
   */
  static async load(
    descriptors: HandlerDescriptor[],
    fs: FileSystem,
    options: HandlerRegistryOptions
  ): Promise<HandlerRegistry> {
    const registry = new HandlerRegistry(descriptors, fs, options);
    await registry.restore();
    return registry;
  }

  // ============================================================================
  // Reads
  // ============================================================================

  resolve(handlerId: string): Readonly<HandlerDescriptor> {
    const descriptor = this.descriptors.get(handlerId);
    if (!descriptor) {
      throw new HandlerNotFoundError(handlerId);
    }
    return descriptor;
  }

  get(handlerId: string): Readonly<HandlerDescriptor> | undefined {
    return this.descriptors.get(handlerId);
  }

  has(handlerId: string): boolean {
    return this.descriptors.has(handlerId);
  }

  /**
   * All descriptors by priority tier, then display name
   */
  list(): Readonly<HandlerDescriptor>[] {
    return Array.from(this.descriptors.values()).sort(compareDescriptors);
  }

  get defaultFallback(): Readonly<HandlerDescriptor> {
    const fallback = this.list().find(d => d.isDefaultFallback);
    if (!fallback) {
      throw new RegistryConfigError('Registry has no default fallback handler');
    }
    return fallback;
  }

  // ============================================================================
  // Writes
  // ============================================================================

  /**
   * Copy a handler under a new id with its own system prompt
   */
  async clone(sourceId: string, newId: string, newSystemPrompt: string): Promise<Readonly<HandlerDescriptor>> {
    return this.writes.run(WRITE_LANE, async () => {
      const source = this.descriptors.get(sourceId);
      if (!source) {
        throw new CloneError('source_not_found', sourceId, newId);
      }
      if (this.descriptors.has(newId)) {
        throw new CloneError('duplicate_id', sourceId, newId);
      }
      if (!HANDLER_ID_PATTERN.test(newId)) {
        throw new InvalidArgumentError('handler id', 'use lowercase letters, digits, - and _', { newId });
      }

      const record: CloneRecord = {
        handlerId: newId,
        sourceId,
        baselineTemplate: source.systemPromptTemplate,
      };
      const prompts = this.promptOverrides();
      if (newSystemPrompt !== record.baselineTemplate) {
        prompts[newId] = newSystemPrompt;
      }

      await this.persist({ prompts, clones: [...this.clones, record] });
      const descriptor = this.applyClone(record, source, newSystemPrompt);
      log.info('Cloned handler', { sourceId, newId });
      return descriptor;
    });
  }

  async setSystemPrompt(handlerId: string, prompt: string): Promise<void> {
    await this.writes.run(WRITE_LANE, async () => {
      const current = this.resolve(handlerId);
      const updated = Object.freeze({ ...current, systemPromptTemplate: prompt });

      await this.persist({
        prompts: this.promptOverrides(updated),
        clones: this.clones,
      });
      this.descriptors.set(handlerId, updated);
    });
  }

  /**
   * Restore the built-in template; clones go back to the parent's
   * template as it was when they were cloned.
   */
  async resetSystemPrompt(handlerId: string): Promise<void> {
    await this.writes.run(WRITE_LANE, async () => {
      const current = this.resolve(handlerId);
      const baseline = this.baselines.get(handlerId);
      if (baseline === undefined || baseline === current.systemPromptTemplate) return;

      const updated = Object.freeze({ ...current, systemPromptTemplate: baseline });
      await this.persist({
        prompts: this.promptOverrides(updated),
        clones: this.clones,
      });
      this.descriptors.set(handlerId, updated);
    });
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private applyClone(
    record: CloneRecord,
    source: Readonly<HandlerDescriptor>,
    template: string
  ): Readonly<HandlerDescriptor> {
    // Only one default may exist, and the clone answers to its own id
    const descriptor: Readonly<HandlerDescriptor> = Object.freeze({
      ...source,
      handlerId: record.handlerId,
      displayName: record.handlerId,
      aliases: [record.handlerId],
      isDefaultFallback: false,
      systemPromptTemplate: template,
      clonedFrom: record.sourceId,
    });

    this.descriptors.set(descriptor.handlerId, descriptor);
    this.baselines.set(descriptor.handlerId, record.baselineTemplate);
    this.clones = [...this.clones, record];
    return descriptor;
  }

  /**
   * Prompts that differ from their baseline, with `changed` applied
   */
  private promptOverrides(changed?: Readonly<HandlerDescriptor>): Record<string, string> {
    const prompts: Record<string, string> = {};
    for (const descriptor of this.descriptors.values()) {
      const current = changed && changed.handlerId === descriptor.handlerId ? changed : descriptor;
      if (current.systemPromptTemplate !== this.baselines.get(current.handlerId)) {
        prompts[current.handlerId] = current.systemPromptTemplate;
      }
    }
    return prompts;
  }

  private async persist(overrides: RegistryOverrides): Promise<void> {
    const { overridesPath } = this.options;
    if (!this.fs || !overridesPath) return;

    try {
      await writeAtomic(this.fs, overridesPath, JSON.stringify(overrides, null, 2));
    } catch (error) {
      throw new StoreUnavailableError('registry write', overridesPath, error);
    }
  }

  private async restore(): Promise<void> {
    const { overridesPath } = this.options;
    if (!this.fs || !overridesPath) return;

    let content: string;
    try {
      content = await this.fs.read(overridesPath);
    } catch (error) {
      if (isNotFoundError(error)) return;
      throw new StoreUnavailableError('registry load', overridesPath, error);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      throw new RegistryConfigError(`Invalid registry overrides file: ${overridesPath}`);
    }

    const parsed = overridesSchema.safeParse(raw);
    if (!parsed.success) {
      throw new RegistryConfigError(`Invalid registry overrides file: ${overridesPath}`);
    }

    for (const record of parsed.data.clones) {
      const source = this.descriptors.get(record.sourceId);
      if (!source || this.descriptors.has(record.handlerId)) {
        log.warn('Skipping saved clone', { handlerId: record.handlerId, sourceId: record.sourceId });
        continue;
      }
      this.applyClone(record, source, record.baselineTemplate);
    }

    for (const [handlerId, prompt] of Object.entries(parsed.data.prompts)) {
      const current = this.descriptors.get(handlerId);
      if (!current) {
        log.warn('Skipping prompt override for unknown handler', { handlerId });
        continue;
      }
      this.descriptors.set(handlerId, Object.freeze({ ...current, systemPromptTemplate: prompt }));
    }
  }
}

function compareDescriptors(a: HandlerDescriptor, b: HandlerDescriptor): number {
  return tierRank(a.priorityTier) - tierRank(b.priorityTier)
    || a.displayName.localeCompare(b.displayName, 'en')
    || a.handlerId.localeCompare(b.handlerId, 'en');
}

/**
 * Fail fast on a catalogue the router cannot work with
 */
export function validateDescriptors(descriptors: HandlerDescriptor[]): void {
  const seen = new Set<string>();
  for (const descriptor of descriptors) {
    if (seen.has(descriptor.handlerId)) {
      throw new RegistryConfigError(`Duplicate handler id: ${descriptor.handlerId}`, {
        handlerId: descriptor.handlerId,
      });
    }
    seen.add(descriptor.handlerId);

    const threshold = descriptor.confidenceThreshold;
    if (!(threshold >= 0 && threshold <= 1)) {
      throw new RegistryConfigError(`Confidence threshold out of range for ${descriptor.handlerId}`, {
        handlerId: descriptor.handlerId,
        threshold,
      });
    }
  }

  const fallbacks = descriptors.filter(d => d.isDefaultFallback);
  if (fallbacks.length !== 1) {
    throw new RegistryConfigError(
      `Exactly one default fallback handler is required, found ${fallbacks.length}`,
      { fallbacks: fallbacks.map(d => d.handlerId) }
    );
  }
}
