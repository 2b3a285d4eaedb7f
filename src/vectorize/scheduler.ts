import { VECTORIZE_CONFIG } from "./config.js";
import { ExecutionFault, VectorizationError } from "./errors.js";

type Settled<R> = { ok: true; value: R } | { ok: false; error: unknown };

/**
 * Runs units concurrently, at most `width` at a time, and yields their
 * results in dispatch order. A unit that finishes early waits behind every
 * unit dispatched before it.
 *
 * A failure is thrown when the failed unit's turn comes, so results before
 * it are still delivered. Stopping early closes the upstream iterator and
 * abandons whatever is still in flight.
 */
export class OrderedScheduler<T, R> {
  constructor(
    private readonly run: (unit: T, index: number) => Promise<R>,
    readonly width: number = VECTORIZE_CONFIG.concurrency,
  ) {
    if (!Number.isInteger(width) || width <= 0) {
      throw new RangeError(`Concurrency width must be a positive integer, got ${width}`);
    }
  }

  async *schedule(units: AsyncIterable<T>): AsyncGenerator<R> {
    const iterator = units[Symbol.asyncIterator]();
    const inFlight: Array<Promise<Settled<R>>> = [];
    let dispatched = 0;
    // Units dispatched whose result the consumer has not taken yet.
    let outstanding = 0;
    let exhausted = false;
    let filling: Promise<void> | undefined;
    let wake: (() => void) | undefined;

    const notify = () => {
      const resolve = wake;
      wake = undefined;
      resolve?.();
    };

    // Runs in the background: a settled head is yielded even while an
    // upstream read is pending.
    const fill = async (): Promise<void> => {
      try {
        while (!exhausted && outstanding < this.width) {
          let next: IteratorResult<T>;
          try {
            next = await iterator.next();
          } catch (error) {
            // Upstream failure waits its turn behind the units already running.
            exhausted = true;
            outstanding++;
            inFlight.push(Promise.resolve<Settled<R>>({ ok: false, error }));
            return;
          }
          if (exhausted) return;
          if (next.done) {
            exhausted = true;
            return;
          }
          outstanding++;
          inFlight.push(this.dispatch(next.value, dispatched++));
          notify();
        }
      } finally {
        filling = undefined;
        notify();
      }
    };

    const refill = () => {
      if (filling || exhausted || outstanding >= this.width) return;
      filling = fill();
    };

    try {
      refill();
      let turn = 0;
      for (;;) {
        const head = inFlight.shift();
        if (!head) {
          if (!filling) return;
          await new Promise<void>((resolve) => {
            wake = resolve;
          });
          continue;
        }
        const settled = await head;
        outstanding--;
        if (!settled.ok) {
          throw settled.error instanceof VectorizationError
            ? settled.error
            : new ExecutionFault(turn, settled.error);
        }
        refill();
        yield settled.value;
        turn++;
      }
    } finally {
      if (!exhausted) {
        exhausted = true;
        await iterator.return?.();
      }
    }
  }

  private dispatch(unit: T, index: number): Promise<Settled<R>> {
    // Settled promises never reject, so units waiting in the queue cannot
    // raise unhandled rejections.
    return Promise.resolve()
      .then(() => this.run(unit, index))
      .then(
        (value): Settled<R> => ({ ok: true, value }),
        (error: unknown): Settled<R> => ({ ok: false, error }),
      );
  }
}
