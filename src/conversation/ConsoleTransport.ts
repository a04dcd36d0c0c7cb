/**
 * Console Transport - prints replies for the interactive CLI
 */

import type { Chunk } from '../response-assembler/types';
import type { Speaker, Transport } from './types';

const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  red: '\x1b[31m',
};

export interface ConsoleTransportOptions {
  output?: NodeJS.WritableStream;
  color?: boolean;
}

export class ConsoleTransport implements Transport {
  private output: NodeJS.WritableStream;
  private color: boolean;

  constructor(options: ConsoleTransportOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.color = options.color ?? false;
  }

  emitChunk(_channelId: string, speaker: Speaker, chunk: Chunk): void {
    if (chunk.index === 0) {
      this.write(`${this.paint(`[${speaker.displayName}]`, colors.bright + colors.cyan)} ${chunk.text}`);
    } else {
      this.write(chunk.text);
    }
  }

  react(_channelId: string, _messageId: string, reaction: string): void {
    this.write(this.paint(`(${reaction})`, colors.dim));
  }

  notice(_channelId: string, text: string): void {
    this.write(this.paint(text, colors.red));
  }

  private paint(text: string, color: string): string {
    return this.color ? `${color}${text}${colors.reset}` : text;
  }

  private write(line: string): void {
    this.output.write(`${line}\n`);
  }
}
