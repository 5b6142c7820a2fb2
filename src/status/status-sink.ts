import { logger } from '../utils/logger.js';

/** Receives the human-readable outcome of every core operation. */
export interface StatusSink {
  setStatus(message: string): void;
}

export const loggerStatusSink: StatusSink = {
  setStatus(message: string): void {
    logger.info(message);
  },
};

/** Keeps every status line; `last` is what a status bar would show. */
export class StatusLog implements StatusSink {
  readonly messages: string[] = [];

  setStatus(message: string): void {
    this.messages.push(message);
  }

  get last(): string | undefined {
    return this.messages[this.messages.length - 1];
  }

  clear(): void {
    this.messages.length = 0;
  }
}
