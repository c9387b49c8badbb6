import { OperationInProgressError } from './errors';
import { getLogger } from './logger';

/**
 * Runs at most one operation at a time. A host (a window, a server route)
 * keeps one runner and hands every user-initiated action to it; a second
 * action while one is in flight is rejected rather than queued.
 */
export class OperationRunner {
  private active: string | null = null;

  get isRunning(): boolean {
    return this.active !== null;
  }

  get current(): string | null {
    return this.active;
  }

  async run<T>(name: string, task: () => Promise<T>): Promise<T> {
    if (this.active !== null) {
      throw new OperationInProgressError(this.active);
    }

    this.active = name;
    getLogger().debug('Operation started', { operation: name });
    try {
      return await task();
    } finally {
      this.active = null;
      getLogger().debug('Operation finished', { operation: name });
    }
  }
}
