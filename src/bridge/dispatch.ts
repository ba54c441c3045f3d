import { toBridgeError } from "../shared/errors.js";
import { genId } from "../shared/ids.js";
import type { Logger } from "../shared/logging.js";
import type { ExecutionContext } from "./context.js";
import type { Delivery, Outcome } from "./delivery.js";

/**
 * Body of an operation, run on the worker. `observed` is false when nobody watches the
 * outcome, in which case the body should skip status and result round trips.
 */
export type OperationBody<Args extends unknown[]> = (observed: boolean) => Outcome<Args>;

export function success<Args extends unknown[]>(...args: Args): Outcome<Args> {
  return { status: "success", args };
}

/**
 * Moves work between the two serial contexts of a connection: the body runs on the worker
 * inside a failure boundary, the outcome is delivered on the notifier. Nothing thrown by a
 * body ever reaches the notifier as an exception.
 */
export class DispatchBridge {
  constructor(
    private readonly worker: ExecutionContext,
    private readonly notifier: ExecutionContext,
    private readonly logger: Logger,
  ) {}

  dispatch<Args extends unknown[]>(
    operation: string,
    body: OperationBody<Args>,
    delivery: Delivery<Args>,
  ): void {
    const op = genId("op");
    this.logger.debug({ op, operation }, "operation submitted");
    this.worker.submit(() => {
      const observed = delivery.observed();
      let outcome: Outcome<Args>;
      try {
        outcome = body(observed);
      } catch (err) {
        outcome = { status: "failure", error: toBridgeError(err) };
      }
      this.logger.debug({ op, operation, observed, status: outcome.status }, "operation finished");
      this.notifier.submit(() => delivery.deliver(outcome));
    });
  }
}
