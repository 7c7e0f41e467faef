import type { LogHandler } from '../index.js';

// This is a no-op log handler that does nothing with the logs.
export class NullHandler implements LogHandler {
  log(): void {}
}
