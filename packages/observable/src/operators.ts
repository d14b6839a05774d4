import { SimpleObservable } from "./observable.js";
import type { Subscription } from "./types.js";

export function map<T, U>(transform: (value: T) => U) {
  return (input$: SimpleObservable<T>) =>
    new SimpleObservable<U>((observer) => {
      const subscription = input$.subscribe({
        next: (value) => observer.next(transform(value)),
        error: (err) => observer.error?.(err),
        complete: () => observer.complete?.(),
      });
      return () => subscription.unsubscribe();
    });
}

export function filter<T>(predicate: (value: T) => boolean) {
  return (input$: SimpleObservable<T>) =>
    new SimpleObservable<T>((observer) => {
      const subscription = input$.subscribe({
        next: (value) => {
          if (predicate(value)) {
            observer.next(value);
          }
        },
        error: (err) => observer.error?.(err),
        complete: () => observer.complete?.(),
      });
      return () => subscription.unsubscribe();
    });
}

/**
 * Passes through the first `count` values, then completes and detaches from
 * the source.
 */
export function take<T>(count: number) {
  return (input$: SimpleObservable<T>) =>
    new SimpleObservable<T>((observer) => {
      let taken = 0;
      let done = false;
      let subscription: Subscription | undefined;

      const finish = () => {
        done = true;
        observer.complete?.();
        subscription?.unsubscribe();
      };

      if (count <= 0) {
        finish();
        return;
      }

      subscription = input$.subscribe({
        next: (value) => {
          if (done) return;
          taken++;
          observer.next(value);
          if (taken >= count) {
            finish();
          }
        },
        error: (err) => observer.error?.(err),
        complete: () => {
          if (!done) {
            done = true;
            observer.complete?.();
          }
        },
      });

      // a synchronous source can hit the limit before subscribe returns
      if (done) {
        subscription.unsubscribe();
      }
      return () => subscription?.unsubscribe();
    });
}
