/**
 * Admin command surface
 *
 * Mutating commands take the caller's capability flags and refuse
 * non-admins before touching any state.
 */

import type { ContextStore } from '../context-store/ContextStore';
import type { ConversationWindow } from '../context-store/types';
import { PermissionDeniedError } from '../errors';
import type { HandlerRegistry } from '../handler-registry/HandlerRegistry';
import type { HandlerDescriptor } from '../handler-registry/types';
import { createLogger } from '../logger';
import type { Caller } from './types';

const log = createLogger('admin');

export class AdminCommands {
  constructor(
    private store: ContextStore,
    private registry: HandlerRegistry
  ) {}

  listHandlers(): Readonly<HandlerDescriptor>[] {
    return this.registry.list();
  }

  async setSystemPrompt(caller: Caller, handlerId: string, prompt: string): Promise<Readonly<HandlerDescriptor>> {
    this.requireAdmin(caller, 'set_system_prompt');
    await this.registry.setSystemPrompt(handlerId, prompt);
    log.info('System prompt updated', { handlerId, by: caller.userId });
    return this.registry.resolve(handlerId);
  }

  async resetSystemPrompt(caller: Caller, handlerId: string): Promise<Readonly<HandlerDescriptor>> {
    this.requireAdmin(caller, 'reset_system_prompt');
    await this.registry.resetSystemPrompt(handlerId);
    log.info('System prompt reset', { handlerId, by: caller.userId });
    return this.registry.resolve(handlerId);
  }

  async cloneHandler(
    caller: Caller,
    sourceId: string,
    newId: string,
    prompt: string
  ): Promise<Readonly<HandlerDescriptor>> {
    this.requireAdmin(caller, 'clone_handler');
    return this.registry.clone(sourceId, newId, prompt);
  }

  async setContextWindow(caller: Caller, channelId: string, size: number): Promise<ConversationWindow> {
    this.requireAdmin(caller, 'set_context_window');
    return this.store.setWindowSize(channelId, size);
  }

  getContextWindow(channelId: string): ConversationWindow {
    return this.store.getWindowSettings(channelId);
  }

  async resetContextWindow(channelId: string): Promise<ConversationWindow> {
    return this.store.resetWindowSize(channelId);
  }

  /**
   * @returns number of removed messages
   */
  async clearContext(caller: Caller, channelId: string, olderThanMs?: number): Promise<number> {
    this.requireAdmin(caller, 'clear_context');
    return this.store.clear(channelId, olderThanMs);
  }

  async activateRouterMode(caller: Caller, channelId: string): Promise<ConversationWindow> {
    this.requireAdmin(caller, 'activate_router_mode');
    return this.store.setRouterMode(channelId, true);
  }

  async deactivateRouterMode(caller: Caller, channelId: string): Promise<ConversationWindow> {
    this.requireAdmin(caller, 'deactivate_router_mode');
    return this.store.setRouterMode(channelId, false);
  }

  private requireAdmin(caller: Caller, command: string): void {
    if (!caller.isAdmin) {
      log.warn('Rejected admin command', { command, userId: caller.userId });
      throw new PermissionDeniedError(command);
    }
  }
}
