import { describeError } from '../common/errors';

export interface Closable {
  close(): Promise<void>;
}

/**
 * Output handles keyed by destination, opened on first use and released
 * together. Handles stay listed after `closeAll` so their final row counts
 * remain readable.
 */
export class DestinationArena<H extends Closable> {
  private readonly handles = new Map<string, H>();
  private released = false;

  acquire(key: string, open: () => H): H {
    if (this.released) {
      throw new Error(`Cannot open ${key}: destinations already released`);
    }
    let handle = this.handles.get(key);
    if (!handle) {
      handle = open();
      this.handles.set(key, handle);
    }
    return handle;
  }

  get(key: string): H | undefined {
    return this.handles.get(key);
  }

  get size(): number {
    return this.handles.size;
  }

  entries(): Array<[string, H]> {
    return [...this.handles.entries()];
  }

  /** Closes every handle, even when some fail; failures are rethrown together. */
  async closeAll(): Promise<void> {
    this.released = true;
    const results = await Promise.allSettled(
      [...this.handles.values()].map((handle) => handle.close()),
    );
    const failures = results.flatMap((result): unknown[] =>
      result.status === 'rejected' ? [result.reason] : [],
    );
    if (failures.length > 0) {
      throw new AggregateError(
        failures,
        `${failures.length} output file(s) failed to close: ${describeError(failures[0])}`,
      );
    }
  }
}

/**
 * Runs `body`, then `release`, on success and failure alike. A release failure
 * after a body failure is reported alongside it.
 */
export async function runScoped<T>(
  body: () => Promise<T>,
  release: () => Promise<void>,
): Promise<T> {
  let result: T;
  try {
    result = await body();
  } catch (error) {
    try {
      await release();
    } catch (releaseError) {
      throw new AggregateError([error, releaseError], describeError(error));
    }
    throw error;
  }
  await release();
  return result;
}
