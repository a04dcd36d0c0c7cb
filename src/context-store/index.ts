/**
 * Context Store - public API
 */

export { ContextStore } from './ContextStore';
export { ChannelLock } from './ChannelLock';
export { ChannelSettings } from './ChannelSettings';
export { JSONLFile } from './JSONLFile';
export type { RecordParser } from './JSONLFile';
export { NodeFileSystem, InMemoryFileSystem, writeAtomic } from './FileSystem';
export type { FileSystem } from './FileSystem';
export type {
  AppendResult,
  Attachment,
  AttachmentKind,
  ChannelLease,
  ChannelSettingsRecord,
  ContextStoreConfig,
  ConversationWindow,
  Message,
  WindowOptions,
} from './types';
