/**
 * History rendering
 *
 * Turns a shared channel window into the chat turns one handler sees.
 * Every handler reads every other handler's replies; only the answering
 * handler's own replies appear unlabelled.
 */

import type { Attachment, Message } from '../context-store/types';
import type { HandlerRegistry } from '../handler-registry/HandlerRegistry';
import type { HandlerDescriptor } from '../handler-registry/types';
import type { ChatTurn, MessageContent } from './types';

export const VISION_TAG = 'vision';

export function isVisionCapable(handler: Pick<HandlerDescriptor, 'capabilityTags'>): boolean {
  return handler.capabilityTags.includes(VISION_TAG);
}

export function buildHistory(
  window: readonly Message[],
  handler: Readonly<HandlerDescriptor>,
  registry: HandlerRegistry
): ChatTurn[] {
  return window.map((message): ChatTurn => {
    if (!message.isResponse) {
      return { role: 'user', content: humanText(message, attachmentLines(message.attachments, false)) };
    }
    if (message.handlerId === handler.handlerId) {
      return { role: 'assistant', content: message.body };
    }

    // Another handler spoke; label it so the model can tell voices apart
    const speaker = message.handlerId === null
      ? message.authorDisplayName
      : registry.get(message.handlerId)?.displayName ?? message.handlerId;
    return { role: 'assistant', content: `[${speaker}] ${message.body}` };
  });
}

/**
 * Content of the message being answered. Vision handlers get image URLs;
 * everyone else gets the extracted description.
 */
export function buildMessageContent(message: Message, handler: Readonly<HandlerDescriptor>): MessageContent {
  const vision = isVisionCapable(handler);
  const imageUrls = vision
    ? message.attachments.flatMap(a => (a.kind === 'image' && a.url ? [a.url] : []))
    : [];

  return {
    text: humanText(message, attachmentLines(message.attachments, vision)),
    imageUrls,
  };
}

function humanText(message: Message, extras: string[]): string {
  const parts = [message.body.trim(), ...extras].filter(part => part.length > 0);
  return `${message.authorDisplayName}: ${parts.join('\n')}`.trimEnd();
}

/**
 * @param urlsForwarded - images with a URL travel as image parts and need no description
 */
function attachmentLines(attachments: readonly Attachment[], urlsForwarded: boolean): string[] {
  const lines: string[] = [];
  for (const attachment of attachments) {
    const text = attachment.extractedText?.trim();
    if (attachment.kind === 'text') {
      if (text) lines.push(`[Attachment: ${text}]`);
      continue;
    }
    if (urlsForwarded && attachment.url) continue;
    if (text) lines.push(`[Image description: ${text}]`);
  }
  return lines;
}
