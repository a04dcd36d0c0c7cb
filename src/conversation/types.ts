/**
 * Conversation layer - Type Definitions
 */

import type { Attachment, Message } from '../context-store/types';
import type { CrosstalkError } from '../errors';
import type { HandlerDescriptor } from '../handler-registry/types';
import type { Chunk } from '../response-assembler/types';
import type { RoutingDecision } from '../router/types';

/**
 * What the chat platform delivers for each human message
 */
export interface InboundEvent {
  messageId: string;
  channelId: string;
  authorId: string;
  authorDisplayName: string;
  body: string;
  attachments: Attachment[];
  isDirectMessage: boolean;
  mentionsBot: boolean;
  /** Milliseconds since epoch (UTC) */
  timestamp: number;
  serverName?: string;
  channelName?: string;
  /** Set when the message replies to a handler's message */
  replyToHandlerId?: string;
}

export type Speaker = Pick<HandlerDescriptor, 'handlerId' | 'displayName'>;

/**
 * Callbacks into the chat platform. The core never starts anything on
 * the platform by itself.
 */
export interface Transport {
  emitChunk(channelId: string, speaker: Speaker, chunk: Chunk): void | Promise<void>;
  react(channelId: string, messageId: string, reaction: string): void | Promise<void>;
  notice(channelId: string, text: string, replyToMessageId?: string): void | Promise<void>;
}

export type InboundOutcome =
  | { status: 'duplicate'; messageId: string }
  | { status: 'recorded'; messageId: string; decision: RoutingDecision }
  | { status: 'responded'; messageId: string; decision: RoutingDecision; response: Message }
  | { status: 'cancelled'; messageId: string; decision: RoutingDecision }
  | { status: 'failed'; messageId: string; decision: RoutingDecision; error: CrosstalkError };

export type RerollOutcome =
  | { status: 'responded'; response: Message }
  | { status: 'cancelled' }
  | { status: 'failed'; error: CrosstalkError };

/**
 * Capability flags supplied by the command layer
 */
export interface Caller {
  userId: string;
  isAdmin: boolean;
}

export interface InteractionRecord {
  timestamp: string;
  channelId: string;
  userId: string;
  handlerId: string;
  prompt: string;
  response: string;
}

export interface ConversationEngineConfig {
  /** Display timezone for {TIME} and {TZ} */
  timezone: string;
  /** Body words that count as addressing the bot */
  mentionKeywords: string[];
}
