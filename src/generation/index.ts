/**
 * Generation boundary - public API
 */

export { OpenAICompatibleBackend, classifyStatus } from './OpenAICompatibleBackend';
export { buildHistory, buildMessageContent, isVisionCapable, VISION_TAG } from './history';
export type {
  ChatTurn,
  GenerationBackend,
  GenerationRequest,
  MessageContent,
  OpenAICompatibleConfig,
  SamplingSettings,
} from './types';
