import type { BridgeError } from "../shared/errors.js";
import type { Value } from "../value/value.js";

export type SuccessReaction<Args extends unknown[]> = (...args: Args) => void;
export type FailureReaction = (message: string, error: BridgeError) => void;
export type CompleteReaction = () => void;

interface Reactions<Args extends unknown[]> {
  success?: SuccessReaction<Args>;
  failure?: FailureReaction;
  complete?: CompleteReaction;
}

export type DeferredState = "pending" | "succeeded" | "failed" | "completed";

/** Write side of a Deferred. Held only by the dispatch bridge; each call is one-shot. */
export interface DeferredResolver<Args extends unknown[]> {
  success(...args: Args): void;
  failure(error: BridgeError): void;
  complete(): void;
}

/**
 * Handle for the outcome of one operation.
 *
 * Each slot holds one reaction; registering again replaces it. Exactly one of success or
 * failure fires (or neither, for an unobserved operation), followed by completion.
 * Reactions registered after the Deferred resolved never fire.
 */
export class Deferred<Args extends unknown[] = []> {
  private successReaction?: SuccessReaction<Args>;
  private failureReaction?: FailureReaction;
  private completeReaction?: CompleteReaction;
  private current: DeferredState = "pending";

  private constructor() {}

  static create<Args extends unknown[] = []>(): [Deferred<Args>, DeferredResolver<Args>] {
    const deferred = new Deferred<Args>();
    const resolver: DeferredResolver<Args> = {
      success: (...args) => deferred.settle("succeeded", (r) => r.success?.(...args)),
      failure: (error) => deferred.settle("failed", (r) => r.failure?.(error.message, error)),
      complete: () => deferred.settle("completed", () => undefined),
    };
    return [deferred, resolver];
  }

  get state(): DeferredState {
    return this.current;
  }

  onSuccess(reaction: SuccessReaction<Args>): this {
    if (this.current === "pending") this.successReaction = reaction;
    return this;
  }

  onFailure(reaction: FailureReaction): this {
    if (this.current === "pending") this.failureReaction = reaction;
    return this;
  }

  onComplete(reaction: CompleteReaction): this {
    if (this.current === "pending") this.completeReaction = reaction;
    return this;
  }

  /** Whether anyone observes the outcome; when false the bridge skips the status round trip. */
  requiresStatus(): boolean {
    return this.successReaction !== undefined || this.failureReaction !== undefined;
  }

  private settle(
    state: Exclude<DeferredState, "pending">,
    fire: (reactions: Reactions<Args>) => void,
  ): void {
    if (this.current !== "pending") {
      throw new Error(`Deferred already resolved (${this.current})`);
    }
    this.current = state;
    const reactions: Reactions<Args> = {
      success: this.successReaction,
      failure: this.failureReaction,
      complete: this.completeReaction,
    };
    this.successReaction = undefined;
    this.failureReaction = undefined;
    this.completeReaction = undefined;
    try {
      fire(reactions);
    } finally {
      reactions.complete?.();
    }
  }
}

/** Queries and commands receive their decoded result. */
export type DeferredQuery = Deferred<[Value]>;
export type DeferredCommand = Deferred<[Value]>;
export type DeferredInsert = Deferred<[]>;
export type DeferredUpdate = Deferred<[]>;
export type DeferredRemove = Deferred<[]>;
export type DeferredConnect = Deferred<[]>;
