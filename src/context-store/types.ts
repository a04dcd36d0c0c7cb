/**
 * Context Store - Type Definitions
 */

export type AttachmentKind = 'image' | 'text';

/**
 * Attachment metadata; content extraction happens before the core sees it
 */
export interface Attachment {
  kind: AttachmentKind;
  extractedText?: string;
  /** Source URL, forwarded to vision-capable handlers */
  url?: string;
}

/**
 * Message structure (immutable once stored)
 */
export interface Message {
  /** Platform-assigned id, unique within a channel */
  id: string;
  channelId: string;
  authorId: string;
  authorDisplayName: string;
  body: string;
  attachments: Attachment[];
  createdAt: number; // Milliseconds since epoch (UTC)
  /** Handler that produced this message, null for human messages */
  handlerId: string | null;
  isResponse: boolean;
}

/**
 * Per-channel settings as persisted
 */
export interface ChannelSettingsRecord {
  /** Override of the process-wide default; absent means default */
  windowSize?: number;
  activeRouterMode: boolean;
  createdAt: number;
  updatedAt: number;
}

/**
 * Settings file layout (channels.json)
 */
export interface ChannelSettingsIndex {
  channels: Record<string, ChannelSettingsRecord>;
}

/**
 * Effective per-channel configuration
 */
export interface ConversationWindow {
  channelId: string;
  windowSize: number;
  activeRouterMode: boolean;
}

export interface AppendResult {
  stored: Message;
  /** Messages stored before `stored`, oldest first */
  window: Message[];
}

export interface WindowOptions {
  /** Leave out this message, e.g. the inbound message being answered */
  excludeMessageId?: string;
}

/**
 * Store configuration
 */
export interface ContextStoreConfig {
  /** Root directory for channels.json and per-channel logs */
  storageDir: string;
  defaultWindowSize: number;
  maxWindowSize: number;
  /** Clock used by clear(); injectable for tests */
  now?: () => number;
}

/**
 * Held while mutating a channel's log
 */
export interface ChannelLease {
  channelId: string;
  holder: string;
  acquiredAt: number;
  release: () => void;
}
