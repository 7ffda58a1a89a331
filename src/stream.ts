import Debug from 'debug';
import { StreamError } from './errors';

const debug = Debug('remote-model:stream');

/**
 * An open transport stream: its decoded messages and a way to tear it down.
 */
export interface StreamSource<T> {
  iterator: AsyncIterator<T>;
  /**
   * Cancels the transport call. Must be safe to call more than once.
   */
  cancel(): void;
}

/**
 * Lazy, finite, non-restartable sequence of decoded outputs.
 *
 * The underlying call starts on the first pull. Breaking out of a
 * `for await` loop (or calling `return()`) releases the transport stream,
 * even while a pull is still waiting for the server.
 */
export class ResultStream<T> implements AsyncIterableIterator<T> {
  private source?: StreamSource<T>;
  private isFinished = false;
  private released = false;
  private pulling = 0;
  private count = 0;

  /**
   * @param open Starts the transport call.
   * @param label Names the call in log output.
   */
  constructor(private readonly open: () => StreamSource<T>, private readonly label: string) {}

  /**
   * Number of items yielded so far.
   */
  get delivered(): number {
    return this.count;
  }

  /**
   * Whether the stream has ended, failed or been released.
   */
  get finished(): boolean {
    return this.isFinished;
  }

  async next(): Promise<IteratorResult<T, undefined>> {
    if (this.isFinished) {
      return { done: true, value: undefined };
    }
    if (!this.source) {
      debug('Opening %s', this.label);
      this.source = this.open();
    }

    let result: IteratorResult<T>;
    this.pulling++;
    try {
      result = await this.source.iterator.next();
    } catch (err) {
      if (this.released) {
        return { done: true, value: undefined };
      }
      this.isFinished = true;
      debug('%s failed after %d item(s)', this.label, this.count);
      if (this.count > 0 && !(err instanceof StreamError)) {
        throw new StreamError(this.count, err);
      }
      throw err;
    } finally {
      this.pulling--;
    }

    if (result.done || this.released) {
      this.isFinished = true;
      debug('%s ended after %d item(s)', this.label, this.count);
      return { done: true, value: undefined };
    }
    this.count++;
    return { done: false, value: result.value };
  }

  async return(): Promise<IteratorResult<T, undefined>> {
    if (this.isFinished) {
      return { done: true, value: undefined };
    }
    this.isFinished = true;
    this.released = true;
    const source = this.source;
    if (!source) {
      return { done: true, value: undefined };
    }

    debug('Releasing %s after %d item(s)', this.label, this.count);
    // A pending pull holds the iterator, so its return() would queue behind it.
    if (this.pulling > 0) {
      source.cancel();
    }
    try {
      await source.iterator.return?.();
    } catch (err) {
      debug('%s released with %s', this.label, err instanceof Error ? err.message : String(err));
    } finally {
      source.cancel();
    }
    return { done: true, value: undefined };
  }

  [Symbol.asyncIterator](): this {
    return this;
  }

  /**
   * Reads every remaining item into an array.
   */
  async collect(): Promise<T[]> {
    const items: T[] = [];
    for await (const item of this) {
      items.push(item);
    }
    return items;
  }
}
