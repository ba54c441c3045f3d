import { getLogger, type Logger } from "../shared/logging.js";

export type Task = () => void;

/**
 * Serial execution context: tasks submitted to one context run strictly in submission
 * order, one at a time. `submit` may be called from any task, on any context.
 */
export interface ExecutionContext {
  submit(task: Task): void;
}

/**
 * Default context: a FIFO queue drained on a later turn of the event loop. A task that
 * throws is logged and the queue moves on.
 */
export class SerialContext implements ExecutionContext {
  private readonly queue: Task[] = [];
  private scheduled = false;
  private readonly logger: Logger;

  constructor(readonly name: string, logger?: Logger) {
    this.logger = (logger ?? getLogger()).child({ context: name });
  }

  submit(task: Task): void {
    this.queue.push(task);
    if (this.scheduled) return;
    this.scheduled = true;
    setImmediate(() => this.drain());
  }

  get pending(): number {
    return this.queue.length;
  }

  private drain(): void {
    for (;;) {
      const task = this.queue.shift();
      if (!task) break;
      try {
        task();
      } catch (err) {
        this.logger.error({ err }, "task failed");
      }
    }
    this.scheduled = false;
  }
}
