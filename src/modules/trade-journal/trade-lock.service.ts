import { Injectable, Logger } from '@nestjs/common';

/**
 * Keyed mutex: work submitted under the same key runs one at a time, in
 * arrival order. Different keys never wait on each other.
 */
@Injectable()
export class TradeLockService {
  private readonly logger = new Logger(TradeLockService.name);
  private readonly tails = new Map<string, Promise<void>>();
  private readonly LOCK_TIMEOUT_MS = 30_000;

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;

    const lockTimeout = setTimeout(() => {
      this.logger.error({
        message: 'Trade lock timeout — force releasing after 30s',
        data: { key },
      });
      release();
    }, this.LOCK_TIMEOUT_MS);

    try {
      return await fn();
    } finally {
      clearTimeout(lockTimeout);
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}
