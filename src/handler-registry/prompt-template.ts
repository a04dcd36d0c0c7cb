/**
 * System prompt variable substitution
 */

import type { PromptVariables } from './types';

const VARIABLE_PATTERN = /\{(MODEL_ID|USERNAME|DISCORD_USER_ID|TIME|TZ|SERVER_NAME|CHANNEL_NAME)\}/g;

export const DM_SERVER_NAME = 'Direct Message';
export const DM_CHANNEL_NAME = 'DM';

/**
 * `06:30 PM` in the given timezone
 */
export function formatClockTime(at: number, timezone: string): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: timezone,
    hour: '2-digit',
    minute: '2-digit',
    hour12: true,
  }).formatToParts(new Date(at));

  const part = (type: Intl.DateTimeFormatPartTypes) => parts.find(p => p.type === type)?.value ?? '';
  return `${part('hour')}:${part('minute')} ${part('dayPeriod').toUpperCase()}`;
}

/**
 * Short zone name such as `UTC` or `CST`
 */
export function formatZoneName(at: number, timezone: string): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: timezone,
    timeZoneName: 'short',
  }).formatToParts(new Date(at));

  return parts.find(p => p.type === 'timeZoneName')?.value ?? timezone;
}

/**
 * Fill the recognised placeholders; anything else stays as written
 */
export function renderSystemPrompt(template: string, vars: PromptVariables, timezone: string): string {
  const at = vars.at ?? Date.now();

  return template.replace(VARIABLE_PATTERN, (_match, name: string) => {
    switch (name) {
      case 'MODEL_ID':
        return vars.modelId;
      case 'USERNAME':
        return vars.username;
      case 'DISCORD_USER_ID':
        return vars.userId;
      case 'TIME':
        return formatClockTime(at, timezone);
      case 'TZ':
        return formatZoneName(at, timezone);
      case 'SERVER_NAME':
        return vars.serverName ?? DM_SERVER_NAME;
      case 'CHANNEL_NAME':
        return vars.channelName ?? DM_CHANNEL_NAME;
      default:
        return _match;
    }
  });
}
