/**
 * Conversation Engine
 *
 * Control flow for one inbound message:
 *   append (dedup) -> window -> route -> prompt -> stream -> commit -> react
 */

import type { ContextStore } from '../context-store/ContextStore';
import type { Message } from '../context-store/types';
import {
  DuplicateMessageError,
  GenerationFailedError,
  InvalidArgumentError,
  isCrosstalkError,
  toUserMessage,
  type CrosstalkError,
} from '../errors';
import type { HandlerRegistry } from '../handler-registry/HandlerRegistry';
import { renderSystemPrompt } from '../handler-registry/prompt-template';
import type { HandlerDescriptor } from '../handler-registry/types';
import { createLogger } from '../logger';
import type { ResponseAssembler } from '../response-assembler/ResponseAssembler';
import type { ResponseStream } from '../response-assembler/ResponseStream';
import { pickReaction } from '../response-assembler/reactions';
import type { Router } from '../router/Router';
import { findPhrase, normalizeText } from '../router/indicator-matcher';
import type { InteractionLog } from './InteractionLog';
import type {
  ConversationEngineConfig,
  InboundEvent,
  InboundOutcome,
  RerollOutcome,
  Transport,
} from './types';

const log = createLogger('conversation');

export const FAILURE_REACTION = '❌';

export interface ConversationEngineDependencies {
  store: ContextStore;
  registry: HandlerRegistry;
  router: Router;
  assembler: ResponseAssembler;
  transport: Transport;
  interactionLog?: InteractionLog;
}

export interface HandleOptions {
  signal?: AbortSignal;
}

type StreamOutcome =
  | { status: 'responded'; response: Message }
  | { status: 'cancelled' }
  | { status: 'failed'; error: CrosstalkError };

export class ConversationEngine {
  /** Latest answered turn per channel, target of reroll */
  private lastTurns = new Map<string, ResponseStream>();

  constructor(
    private deps: ConversationEngineDependencies,
    private config: ConversationEngineConfig
  ) {}

  async handleInbound(event: InboundEvent, options: HandleOptions = {}): Promise<InboundOutcome> {
    const { store, router, registry } = this.deps;
    const messageId = event.messageId;

    let stored: Message;
    let window: Message[];
    try {
      ({ stored, window } = await store.appendWithWindow(toMessage(event)));
    } catch (error) {
      if (error instanceof DuplicateMessageError) {
        log.debug('Dropped duplicate delivery', { channelId: event.channelId, messageId });
        return { status: 'duplicate', messageId };
      }
      throw error;
    }

    const settings = store.getWindowSettings(event.channelId);
    const decision = router.route(stored, window, {
      activeRouterMode: settings.activeRouterMode,
      addressed: this.isAddressed(event),
      replyToHandlerId: event.replyToHandlerId,
    });
    if (decision.selectedHandlerId === null) {
      return { status: 'recorded', messageId, decision };
    }

    const handler = registry.resolve(decision.selectedHandlerId);
    const stream = this.deps.assembler.invoke({
      handler,
      systemPrompt: this.renderPrompt(handler, event),
      window,
      message: stored,
      sampling: {},
      signal: options.signal,
    });

    const outcome = await this.deliver(stream, stored);
    return { ...outcome, messageId, decision };
  }

  /**
   * Regenerate the channel's last answered turn with the same handler,
   * prompt and window
   */
  async reroll(channelId: string, temperature?: number, options: HandleOptions = {}): Promise<RerollOutcome> {
    const previous = this.lastTurns.get(channelId);
    if (!previous) {
      throw new InvalidArgumentError('reroll', 'there is no response to reroll in this channel', { channelId });
    }

    const sampling = temperature === undefined ? {} : { temperature };
    const stream = this.deps.assembler.reroll(previous, sampling, { signal: options.signal });
    return this.deliver(stream, previous.request.message);
  }

  hasTurn(channelId: string): boolean {
    return this.lastTurns.has(channelId);
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private async deliver(stream: ResponseStream, inbound: Message): Promise<StreamOutcome> {
    const { transport } = this.deps;
    const { channelId } = inbound;
    const speaker = { handlerId: stream.handlerId, displayName: stream.request.handler.displayName };

    let response: Message;
    try {
      await stream.pipeTo(chunk => transport.emitChunk(channelId, speaker, chunk));
      if (stream.state === 'cancelled') {
        return { status: 'cancelled' };
      }
      response = await stream.commit();
    } catch (error) {
      if (!(error instanceof GenerationFailedError)) throw error;
      await transport.notice(channelId, `[${speaker.displayName}] ${toUserMessage(error)}`, inbound.id);
      await transport.react(channelId, inbound.id, FAILURE_REACTION);
      return { status: 'failed', error };
    }

    this.lastTurns.set(channelId, stream);
    await this.afterCommit(stream, inbound, response);
    return { status: 'responded', response };
  }

  /**
   * The response is already durable; failures here are logged, not raised
   */
  private async afterCommit(stream: ResponseStream, inbound: Message, response: Message): Promise<void> {
    const { transport, interactionLog } = this.deps;

    try {
      await transport.react(inbound.channelId, inbound.id, pickReaction(response.body));
    } catch (error) {
      log.warn('Could not add reaction', { channelId: inbound.channelId, messageId: inbound.id, error: String(error) });
    }

    if (!interactionLog) return;
    try {
      await interactionLog.record({
        timestamp: new Date(response.createdAt).toISOString(),
        channelId: inbound.channelId,
        userId: inbound.authorId,
        handlerId: stream.handlerId,
        prompt: inbound.body,
        response: response.body,
      });
    } catch (error) {
      log.warn('Could not write interaction log', {
        responseId: response.id,
        error: isCrosstalkError(error) ? error.message : String(error),
      });
    }
  }

  private isAddressed(event: InboundEvent): boolean {
    if (event.isDirectMessage || event.mentionsBot) return true;
    const body = normalizeText(event.body);
    return this.config.mentionKeywords.some(keyword => findPhrase(body, keyword) !== -1);
  }

  private renderPrompt(handler: Readonly<HandlerDescriptor>, event: InboundEvent): string {
    return renderSystemPrompt(
      handler.systemPromptTemplate,
      {
        modelId: handler.model,
        username: event.authorDisplayName,
        userId: event.authorId,
        serverName: event.isDirectMessage ? undefined : event.serverName,
        channelName: event.isDirectMessage ? undefined : event.channelName,
        at: event.timestamp,
      },
      this.config.timezone
    );
  }
}

export function toMessage(event: InboundEvent): Message {
  return {
    id: event.messageId,
    channelId: event.channelId,
    authorId: event.authorId,
    authorDisplayName: event.authorDisplayName,
    body: event.body,
    attachments: event.attachments,
    createdAt: event.timestamp,
    handlerId: null,
    isResponse: false,
  };
}
