import type { Subscription } from "@fanout/observable";
import type { CallbackKey } from "./callback-registry.js";
import type { Subject } from "./subject.js";

/**
 * One registration on a {@link Subject}. Only the first `unsubscribe` does
 * anything; the handle is spent after that.
 */
export class SubjectSubscription<T> implements Subscription {
  private unsubscribed = false;

  constructor(
    private readonly source: Subject<T>,
    readonly key: CallbackKey,
  ) {}

  get closed(): boolean {
    return this.unsubscribed;
  }

  unsubscribe(): void {
    if (this.unsubscribed) return;
    this.unsubscribed = true;
    this.source.removeCallback(this.key);
  }
}
