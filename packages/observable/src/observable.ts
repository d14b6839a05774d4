import {
  filter as filterOperator,
  map as mapOperator,
  take as takeOperator,
} from "./operators.js";
import {
  type Observable,
  type Observer,
  type ObserverLike,
  type Subscription,
  toObserver,
} from "./types.js";

export type OperatorFunction<T, R> = (
  source: SimpleObservable<T>,
) => SimpleObservable<R>;

/**
 * Runs when a subscriber attaches. May return a cleanup function that is
 * called once, on unsubscribe, error or complete (whichever comes first).
 */
export type Producer<T> = (observer: Observer<T>) => (() => void) | void;

const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

export class SimpleObservable<T> implements Observable<T> {
  private producer: Producer<T>;

  constructor(producer: Producer<T>) {
    this.producer = producer;
  }

  /**
   * Runs the producer against `observerLike`. Nothing reaches the observer
   * after it unsubscribes or after the producer signals `error`/`complete`.
   *
   * An error with no `error` handler to receive it is rethrown to whoever
   * signalled it.
   */
  subscribe(observerLike: ObserverLike<T>): Subscription {
    const observer = toObserver(observerLike);
    let closed = false;
    let cleanup: (() => void) | undefined;

    const teardown = () => {
      const fn = cleanup;
      cleanup = undefined;
      fn?.();
    };

    const safeObserver: Observer<T> = {
      next: (value: T) => {
        if (!closed) {
          observer.next(value);
        }
      },
      error: (error: unknown) => {
        if (closed) return;
        closed = true;
        teardown();
        if (observer.error) {
          observer.error(error);
        } else {
          throw error;
        }
      },
      complete: () => {
        if (closed) return;
        closed = true;
        teardown();
        observer.complete?.();
      },
    };

    try {
      const result = this.producer(safeObserver);
      if (typeof result === "function") {
        if (closed) {
          result();
        } else {
          cleanup = result;
        }
      }
    } catch (error) {
      // closed already: rethrow rather than signal a second time
      if (closed) throw error;
      safeObserver.error?.(toError(error));
    }

    return {
      unsubscribe: () => {
        closed = true;
        teardown();
      },
      get closed() {
        return closed;
      },
    };
  }

  static of<T>(...values: T[]): SimpleObservable<T> {
    return new SimpleObservable<T>((observer) => {
      for (const value of values) {
        observer.next(value);
      }
      observer.complete?.();
    });
  }

  static from<T>(values: Iterable<T>): SimpleObservable<T> {
    return SimpleObservable.of(...values);
  }

  static empty<T>(): SimpleObservable<T> {
    return new SimpleObservable<T>((observer) => {
      observer.complete?.();
    });
  }

  // Fluent Operators
  filter(predicate: (value: T) => boolean) {
    return filterOperator(predicate)(this);
  }

  map<U>(transform: (value: T) => U) {
    return mapOperator(transform)(this);
  }

  take(count: number) {
    return takeOperator<T>(count)(this);
  }

  pipe(): SimpleObservable<T>;
  pipe<A>(op1: OperatorFunction<T, A>): SimpleObservable<A>;
  pipe<A, B>(
    op1: OperatorFunction<T, A>,
    op2: OperatorFunction<A, B>,
  ): SimpleObservable<B>;
  pipe<A, B, C>(
    op1: OperatorFunction<T, A>,
    op2: OperatorFunction<A, B>,
    op3: OperatorFunction<B, C>,
  ): SimpleObservable<C>;
  pipe<A, B, C, D>(
    op1: OperatorFunction<T, A>,
    op2: OperatorFunction<A, B>,
    op3: OperatorFunction<B, C>,
    op4: OperatorFunction<C, D>,
  ): SimpleObservable<D>;
  // biome-ignore lint/suspicious/noExplicitAny: <unknown type produces bad DX>
  pipe(...operators: OperatorFunction<any, any>[]): SimpleObservable<any> {
    // biome-ignore lint/suspicious/noExplicitAny: <unknown type produces bad DX>
    return operators.reduce<SimpleObservable<any>>(
      (prev$, op) => op(prev$),
      this,
    );
  }
}

export const observable = <T>(producer: Producer<T>) =>
  new SimpleObservable(producer);
