import { RequestTimeoutError, ValidationError } from './errors.js';
import type { WireFrame } from './messages.js';

type PendingEntry = {
  resolve: (frame: WireFrame) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
};

/**
 * Correlation table from request id to a single-resolution handle. Every
 * settle path goes through `take`, so an entry is removed exactly once
 * whether it resolves, times out or is torn down.
 */
export class PendingRequestTable {
  private readonly entries = new Map<string, PendingEntry>();

  get size(): number {
    return this.entries.size;
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  register(id: string, timeoutMs: number): Promise<WireFrame> {
    if (this.entries.has(id)) {
      return Promise.reject(new ValidationError(`Request id ${id} is already awaiting a response`));
    }

    return new Promise<WireFrame>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.reject(id, new RequestTimeoutError(id, timeoutMs));
      }, timeoutMs);

      this.entries.set(id, { resolve, reject, timer });
    });
  }

  resolve(id: string, frame: WireFrame): boolean {
    const entry = this.take(id);
    if (!entry) {
      return false;
    }

    entry.resolve(frame);
    return true;
  }

  reject(id: string, error: Error): boolean {
    const entry = this.take(id);
    if (!entry) {
      return false;
    }

    entry.reject(error);
    return true;
  }

  rejectAll(error: Error): number {
    const ids = [...this.entries.keys()];
    let rejected = 0;

    for (const id of ids) {
      if (this.reject(id, error)) {
        rejected += 1;
      }
    }

    return rejected;
  }

  private take(id: string): PendingEntry | undefined {
    const entry = this.entries.get(id);
    if (!entry) {
      return undefined;
    }

    this.entries.delete(id);
    clearTimeout(entry.timer);
    return entry;
  }
}
