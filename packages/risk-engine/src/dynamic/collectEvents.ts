import type { Logger } from 'pino';
import type { RawInstrumentationEvent } from '../schemas/event.js';
import { DynamicMetricAggregator, type DynamicIngestResult, type IngestOptions } from './ingestEvents.js';

export type InstrumentationSource =
  | Iterable<RawInstrumentationEvent>
  | AsyncIterable<RawInstrumentationEvent>;

export interface CollectOptions extends IngestOptions {
  /** Wall-clock budget for the whole stream */
  timeoutMs: number;
  /** The sandbox already cut the stream short */
  truncated?: boolean;
  /** Stop consuming early, as if the timeout had elapsed */
  signal?: AbortSignal;
}

const STOPPED = Symbol('stopped');

function toAsyncIterator<T>(source: Iterable<T> | AsyncIterable<T>): AsyncIterator<T> {
  if (Symbol.asyncIterator in source) {
    return source[Symbol.asyncIterator]();
  }
  const sync = source[Symbol.iterator]();
  return {
    next: () => Promise.resolve(sync.next()),
    return: () => Promise.resolve(sync.return?.() ?? { done: true, value: undefined }),
  };
}

function closeIterator(iterator: AsyncIterator<unknown>, logger: Logger | undefined): void {
  const closing = iterator.return?.();
  if (closing) {
    void closing.catch((error: unknown) => {
      logger?.warn({ err: error }, 'Instrumentation stream failed to close');
    });
  }
}

/**
 * Consume an instrumentation stream until it ends or the timeout elapses.
 *
 * On timeout the counts gathered so far are kept and the result is flagged
 * truncated; the stream is asked to close but not awaited. A stream that
 * errors is treated the same way.
 */
export async function collectInstrumentationEvents(
  source: InstrumentationSource,
  options: CollectOptions,
): Promise<DynamicIngestResult> {
  const { timeoutMs, logger, signal } = options;
  const aggregator = new DynamicMetricAggregator(options);
  const iterator = toAsyncIterator(source);
  const deadline = Date.now() + timeoutMs;

  // Each step races its own stop promise, released once the step settles
  let wake: (() => void) | undefined;
  const stopStep = (): void => wake?.();
  const timer = setTimeout(stopStep, timeoutMs);
  signal?.addEventListener('abort', stopStep, { once: true });

  let truncated = false;
  try {
    for (;;) {
      // Synchronous sources never yield to the timer, so check the clock too
      if (Date.now() >= deadline || signal?.aborted === true) {
        truncated = true;
        break;
      }
      const stopped = new Promise<typeof STOPPED>((resolve) => {
        wake = () => resolve(STOPPED);
      });
      const next = await Promise.race([iterator.next(), stopped]).finally(() => {
        wake = undefined;
      });
      if (next === STOPPED) {
        truncated = true;
        break;
      }
      if (next.done) {
        break;
      }
      aggregator.addRaw(next.value);
    }
  } catch (error) {
    logger?.warn({ err: error }, 'Instrumentation stream failed; keeping events received so far');
    truncated = true;
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', stopStep);
  }

  if (truncated) {
    closeIterator(iterator, logger);
  }

  return aggregator.finish(truncated || options.truncated === true);
}
