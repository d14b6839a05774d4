import { Observable as RxObservable } from "rxjs";
import type { Observable } from "./types.js";

/**
 * Exposes any `Observable` as an RxJS one so it can feed RxJS operators.
 * Unsubscribing from the result unsubscribes from `source`.
 */
export const toRx = <T>(source: Observable<T>): RxObservable<T> =>
  new RxObservable<T>((subscriber) => {
    const subscription = source.subscribe({
      next: (value) => subscriber.next(value),
      error: (error) => subscriber.error(error),
      complete: () => subscriber.complete(),
    });
    return () => subscription.unsubscribe();
  });
