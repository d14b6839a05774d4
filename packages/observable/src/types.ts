/**
 * A lazy, push-based source of values. Each call to `subscribe` attaches one
 * observer and hands back the handle that detaches it.
 */
export interface Observable<T> {
  subscribe(observer: Observer<T>): Subscription;
}

/**
 * Consumer side of a stream. Only `next` is required.
 */
export interface Observer<T> {
  next(value: T): void;
  error?(error: unknown): void;
  complete?(): void;
}

/**
 * Handle for one outstanding subscription
 */
export interface Subscription {
  unsubscribe(): void;
  readonly closed: boolean;
}

/**
 * Anything `subscribe` accepts: a full observer or just its `next` function.
 */
export type ObserverLike<T> = Observer<T> | ((value: T) => void);

export const toObserver = <T>(observer: ObserverLike<T>): Observer<T> =>
  typeof observer === "function" ? { next: observer } : observer;
