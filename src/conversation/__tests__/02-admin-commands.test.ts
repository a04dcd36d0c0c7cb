/**
 * Admin surface: permission checks and the state each command changes
 */

import { ContextStore } from '../../context-store/ContextStore';
import { InMemoryFileSystem } from '../../context-store/FileSystem';
import { PermissionDeniedError } from '../../errors';
import { HandlerRegistry } from '../../handler-registry/HandlerRegistry';
import { loadBuiltInCatalogue } from '../../handler-registry/catalogue';
import { AdminCommands } from '../AdminCommands';
import { humanMessage } from '../../testing';

const ADMIN = { userId: 'admin-1', isAdmin: true };
const MEMBER = { userId: 'user-1', isAdmin: false };

describe('AdminCommands', () => {
  let store: ContextStore;
  let registry: HandlerRegistry;
  let admin: AdminCommands;

  beforeEach(async () => {
    store = new ContextStore(new InMemoryFileSystem(), {
      storageDir: '/state',
      defaultWindowSize: 10,
      maxWindowSize: 50,
    });
    await store.init();
    registry = new HandlerRegistry(loadBuiltInCatalogue());
    admin = new AdminCommands(store, registry);
  });

  describe('permissions', () => {
    it('should refuse every mutating command for non-admins', async () => {
      const attempts: Array<[string, () => Promise<unknown>]> = [
        ['set_system_prompt', () => admin.setSystemPrompt(MEMBER, 'gemini', 'Be brief.')],
        ['reset_system_prompt', () => admin.resetSystemPrompt(MEMBER, 'gemini')],
        ['clone_handler', () => admin.cloneHandler(MEMBER, 'gemini', 'gemini-lite', 'Be brief.')],
        ['set_context_window', () => admin.setContextWindow(MEMBER, 'general', 5)],
        ['clear_context', () => admin.clearContext(MEMBER, 'general')],
        ['activate_router_mode', () => admin.activateRouterMode(MEMBER, 'general')],
        ['deactivate_router_mode', () => admin.deactivateRouterMode(MEMBER, 'general')],
      ];

      for (const [command, attempt] of attempts) {
        await expect(attempt()).rejects.toThrow(PermissionDeniedError);
        await expect(attempt()).rejects.toThrow(`Command '${command}' requires administrator permission`);
      }
    });

    it('should leave state untouched after a refusal', async () => {
      await store.append(humanMessage({ id: 'a', body: 'keep me' }));
      const prompt = registry.resolve('gemini').systemPromptTemplate;

      await expect(admin.setSystemPrompt(MEMBER, 'gemini', 'Be brief.')).rejects.toThrow(PermissionDeniedError);
      await expect(admin.setContextWindow(MEMBER, 'general', 5)).rejects.toThrow(PermissionDeniedError);
      await expect(admin.clearContext(MEMBER, 'general')).rejects.toThrow(PermissionDeniedError);
      await expect(admin.activateRouterMode(MEMBER, 'general')).rejects.toThrow(PermissionDeniedError);
      await expect(admin.cloneHandler(MEMBER, 'gemini', 'gemini-lite', 'x')).rejects.toThrow(PermissionDeniedError);

      expect(registry.resolve('gemini').systemPromptTemplate).toBe(prompt);
      expect(registry.has('gemini-lite')).toBe(false);
      expect(await store.count('general')).toBe(1);
      expect(store.getWindowSettings('general')).toEqual({
        channelId: 'general',
        windowSize: 10,
        activeRouterMode: false,
      });
    });

    it('should let anyone read and reset the context window', async () => {
      await admin.setContextWindow(ADMIN, 'general', 25);

      expect(admin.getContextWindow('general').windowSize).toBe(25);
      expect(await admin.resetContextWindow('general')).toEqual({
        channelId: 'general',
        windowSize: 10,
        activeRouterMode: false,
      });
    });
  });

  describe('admin changes', () => {
    it('should update and restore a system prompt', async () => {
      const original = registry.resolve('gemini').systemPromptTemplate;

      const updated = await admin.setSystemPrompt(ADMIN, 'gemini', 'Answer in haiku.');
      expect(updated.systemPromptTemplate).toBe('Answer in haiku.');

      const reset = await admin.resetSystemPrompt(ADMIN, 'gemini');
      expect(reset.systemPromptTemplate).toBe(original);
    });

    it('should register a clone', async () => {
      const clone = await admin.cloneHandler(ADMIN, 'gemini', 'gemini-pirate', 'Talk like a pirate.');

      expect(clone).toMatchObject({
        handlerId: 'gemini-pirate',
        clonedFrom: 'gemini',
        systemPromptTemplate: 'Talk like a pirate.',
        isDefaultFallback: false,
      });
      expect(admin.listHandlers().map(h => h.handlerId)).toContain('gemini-pirate');
    });

    it('should toggle router mode', async () => {
      expect((await admin.activateRouterMode(ADMIN, 'general')).activeRouterMode).toBe(true);
      expect((await admin.deactivateRouterMode(ADMIN, 'general')).activeRouterMode).toBe(false);
    });

    it('should clear history and report the count', async () => {
      await store.append(humanMessage({ id: 'a' }));
      await store.append(humanMessage({ id: 'b' }));

      expect(await admin.clearContext(ADMIN, 'general')).toBe(2);
      expect(await store.count('general')).toBe(0);
    });
  });
});
