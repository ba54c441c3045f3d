import type { BridgeError } from "../shared/errors.js";
import type { Logger } from "../shared/logging.js";
import type { Deferred, DeferredResolver } from "./deferred.js";

/** Result of one operation as it crosses from the worker to the notifier. */
export type Outcome<Args extends unknown[]> =
  | { status: "success"; args: Args }
  | { status: "failure"; error: BridgeError }
  | { status: "complete" };

/** Node-style callback; result arguments are absent on failure. */
export type OperationCallback<Args extends unknown[]> = (
  error: BridgeError | null,
  ...args: Args | []
) => void;

/** How an outcome reaches the caller. */
export interface Delivery<Args extends unknown[]> {
  /** Evaluated on the worker right before the driver call. */
  observed(): boolean;
  /** Runs on the notifier. */
  deliver(outcome: Outcome<Args>): void;
}

export function deferredDelivery<Args extends unknown[]>(
  deferred: Deferred<Args>,
  resolver: DeferredResolver<Args>,
): Delivery<Args> {
  return {
    observed: () => deferred.requiresStatus(),
    deliver(outcome) {
      switch (outcome.status) {
        case "success":
          resolver.success(...outcome.args);
          break;
        case "failure":
          resolver.failure(outcome.error);
          break;
        case "complete":
          resolver.complete();
          break;
      }
    },
  };
}

export function callbackDelivery<Args extends unknown[]>(
  callback: OperationCallback<Args>,
): Delivery<Args> {
  return {
    observed: () => true,
    deliver(outcome) {
      switch (outcome.status) {
        case "success":
          callback(null, ...outcome.args);
          break;
        case "failure":
          callback(outcome.error);
          break;
        case "complete":
          callback(null);
          break;
      }
    },
  };
}

/** Fire-and-forget: nothing is reported; failures are logged and dropped. */
export function unacknowledgedDelivery(logger: Logger, operation: string): Delivery<[]> {
  return {
    observed: () => false,
    deliver(outcome) {
      if (outcome.status !== "failure") return;
      logger.warn(
        { operation, code: outcome.error.code, error: outcome.error.message },
        "unacknowledged operation failed",
      );
    },
  };
}
