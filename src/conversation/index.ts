/**
 * Conversation layer - public API
 */

export { ConversationEngine, FAILURE_REACTION, toMessage } from './ConversationEngine';
export type { ConversationEngineDependencies, HandleOptions } from './ConversationEngine';
export { AdminCommands } from './AdminCommands';
export { CommandParser, COMMAND_PREFIX } from './CommandParser';
export type { CommandContext, CommandHandler, CommandReply, ParsedCommand } from './CommandParser';
export { ConsoleTransport } from './ConsoleTransport';
export type { ConsoleTransportOptions } from './ConsoleTransport';
export { InteractionLog } from './InteractionLog';
export type {
  Caller,
  ConversationEngineConfig,
  InboundEvent,
  InboundOutcome,
  InteractionRecord,
  RerollOutcome,
  Speaker,
  Transport,
} from './types';
