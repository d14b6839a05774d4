import {
  type Observable,
  type Observer,
  type ObserverLike,
  toObserver,
} from "@fanout/observable";
import { type CallbackKey, CallbackRegistry } from "./callback-registry.js";
import { ConfigurationManager } from "./config.js";
import { getDefaultLogger, Logger } from "./logger.js";
import { SubjectSubscription } from "./subscription.js";
import type { SubjectConfigOverrides } from "./types.js";

export interface SubjectOptions extends SubjectConfigOverrides {
  /** Used as is; `logging` is ignored when this is set. */
  logger?: Logger;
}

const resolveLogger = (options: SubjectOptions): Logger => {
  if (options.logger) return options.logger;
  if (options.logging) {
    return new Logger(ConfigurationManager.create(options).logging);
  }
  return getDefaultLogger();
};

/**
 * Broadcast node: every value passed to `next` goes to every observer
 * registered at that moment, synchronously and in registration order.
 *
 * `clone()` returns another handle over the same observers. Values pushed
 * through any handle reach observers registered through any handle.
 *
 * Each `next` works from a snapshot of the observers taken when it starts.
 * Observers added while it runs wait for the next value. Observers removed
 * while it runs are skipped if they have not been called yet. Calling `next`
 * from inside an observer finishes the nested delivery before the outer one
 * resumes.
 *
 * An observer that throws stops the current delivery; the error leaves
 * `next` as thrown.
 */
export class Subject<T> implements Observable<T>, Observer<T> {
  private readonly registry: CallbackRegistry<T>;
  private readonly logger: Logger;

  /**
   * @param registry Only passed by `clone()`; a new subject gets its own.
   */
  constructor(options: SubjectOptions = {}, registry?: CallbackRegistry<T>) {
    this.logger = resolveLogger(options);
    if (registry) {
      this.registry = registry;
      this.logger.log("SUBJECT_CLONED", () => ({
        observers: registry.size,
      }));
    } else {
      this.registry = new CallbackRegistry<T>();
      this.logger.log("SUBJECT_CREATED", "new subject");
    }
  }

  /**
   * Forks `stream`: the returned subject re-broadcasts every value the stream
   * emits from now on. The upstream subscription is not handed out; forwarding
   * lasts as long as the stream keeps emitting. Upstream `error` and `complete`
   * end forwarding and are only logged; observers of the subject never see them.
   */
  static fromStream<T>(
    stream: Observable<T>,
    options: SubjectOptions = {},
  ): Subject<T> {
    const broadcast = new Subject<T>(options);
    const relay = broadcast.clone();

    stream.subscribe({
      next: (value: T) => {
        relay.next(value);
      },
      error: (error: unknown) => {
        broadcast.logger.log("STREAM_ERRORED", () => ({ error }));
      },
      complete: () => {
        broadcast.logger.log("STREAM_COMPLETED", "upstream completed");
      },
    });

    broadcast.logger.log("STREAM_FORKED", "subscribed to upstream");
    return broadcast;
  }

  get observerCount(): number {
    return this.registry.size;
  }

  clone(): Subject<T> {
    return new Subject<T>({ logger: this.logger }, this.registry);
  }

  sharesRegistryWith(other: Subject<T>): boolean {
    return this.registry === other.registry;
  }

  subscribe(observer: ObserverLike<T>): SubjectSubscription<T> {
    const target = toObserver(observer);
    const key = this.registry.add((value) => target.next(value));

    this.logger.log("OBSERVER_SUBSCRIBED", () => ({
      key,
      observers: this.registry.size,
    }));
    return new SubjectSubscription(this, key);
  }

  next(value: T): this {
    for (const [key, callback] of this.registry.snapshot()) {
      if (!this.registry.has(key)) continue;

      try {
        callback(value);
      } catch (error) {
        this.logger.log("OBSERVER_THREW", () => ({ key, error }));
        throw error;
      }
      this.logger.log("VALUE_DELIVERED", () => ({ key, value }));
    }
    return this;
  }

  /**
   * Drops the observer registered under `key`. A key that is not (or no
   * longer) registered is ignored.
   *
   * @internal Called by {@link SubjectSubscription.unsubscribe}.
   */
  removeCallback(key: CallbackKey): boolean {
    const removed = this.registry.remove(key);
    this.logger.log(removed ? "OBSERVER_REMOVED" : "OBSERVER_NOT_FOUND", () => ({
      key,
      observers: this.registry.size,
    }));
    return removed;
  }

  /**
   * Drops every observer, on every handle. Outstanding subscriptions become
   * no-ops. Returns how many observers were removed.
   */
  unsubscribeAll(): number {
    const removed = this.registry.clear();
    this.logger.log("OBSERVERS_CLEARED", { removed });
    return removed;
  }
}
