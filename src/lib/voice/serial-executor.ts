import { createLogger, type Logger } from "@/lib/logger";

/**
 * Runs tasks one at a time in submission order. Session and workflow state is only touched from
 * inside tasks, so callbacks from audio and recognition sources post work here instead of
 * mutating state directly.
 */
export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger("executor");
  }

  run<T>(task: () => T | Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  post(task: () => void | Promise<void>) {
    this.run(task).catch((error: unknown) => {
      this.logger.error("排队任务执行失败", error);
    });
  }

  /** Resolves once every task queued so far, including tasks they queue, has finished. */
  async drain() {
    let current: Promise<void>;
    do {
      current = this.tail;
      await current;
    } while (current !== this.tail);
  }
}
