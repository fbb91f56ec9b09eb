export type PoolConfig = {
  maxConcurrent: number;
  timeoutMs: number;
};

export type TaskOutcome<T> = { ok: true; value: T } | { ok: false; error: Error };

/** Receives a signal that aborts when the pool gives up on the task. */
export type PoolTask<T> = (signal: AbortSignal) => Promise<T>;

type Pending<T> = {
  label: string;
  task: PoolTask<T>;
  settle: (outcome: TaskOutcome<T>) => void;
};

export class PoolTimeoutError extends Error {
  constructor(label: string, timeoutMs: number) {
    super(`Task ${label} timed out after ${timeoutMs}ms`);
    this.name = "PoolTimeoutError";
  }
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Bounded-concurrency runner. Tasks start in submission order and every
 * submission settles to an outcome; a failing or timed-out task never
 * rejects, so one task cannot take its siblings down.
 */
export class WorkerPool<T> {
  private readonly config: PoolConfig;
  private running = 0;
  private finished = 0;
  private readonly waiting: Pending<T>[] = [];

  constructor(config: PoolConfig) {
    this.config = config;
  }

  get activeCount(): number {
    return this.running;
  }

  get queuedCount(): number {
    return this.waiting.length;
  }

  get completedCount(): number {
    return this.finished;
  }

  submit(label: string, task: PoolTask<T>): Promise<TaskOutcome<T>> {
    return new Promise<TaskOutcome<T>>((settle) => {
      this.waiting.push({ label, task, settle });
      this.pump();
    });
  }

  private pump(): void {
    while (this.running < this.config.maxConcurrent) {
      const next = this.waiting.shift();
      if (!next) return;
      this.start(next);
    }
  }

  private start(pending: Pending<T>): void {
    this.running++;
    const controller = new AbortController();
    let done = false;

    const finish = (outcome: TaskOutcome<T>): void => {
      if (done) return;
      done = true;
      clearTimeout(timer);
      this.running--;
      this.finished++;
      pending.settle(outcome);
      this.pump();
    };

    const timer = setTimeout(() => {
      const error = new PoolTimeoutError(pending.label, this.config.timeoutMs);
      controller.abort(error);
      finish({ ok: false, error });
    }, this.config.timeoutMs);
    timer.unref();

    let running: Promise<T>;
    try {
      running = pending.task(controller.signal);
    } catch (err) {
      finish({ ok: false, error: toError(err) });
      return;
    }
    running.then(
      (value) => finish({ ok: true, value }),
      (err: unknown) => finish({ ok: false, error: toError(err) }),
    );
  }
}
