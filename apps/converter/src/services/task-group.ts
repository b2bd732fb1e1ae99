interface RunningTask {
  startedAt: number;
  promise: Promise<void>;
}

/**
 * Tracks independently running units of work
 *
 * Units are not awaited by whoever spawns them; failures are reported
 * through the callback given to `spawn`.
 */
export class TaskGroup {
  private tasks: Map<number, RunningTask> = new Map();
  private nextId = 0;

  constructor(private now: () => number = () => Date.now()) {}

  spawn(task: () => Promise<void>, onError: (error: unknown) => void): void {
    const id = this.nextId++;
    const promise = Promise.resolve()
      .then(task)
      .catch(onError)
      .finally(() => {
        this.tasks.delete(id);
      });
    this.tasks.set(id, { startedAt: this.now(), promise });
  }

  get size(): number {
    return this.tasks.size;
  }

  /**
   * Start time of the longest running unit, or null when idle
   */
  oldestStartedAt(): number | null {
    for (const task of this.tasks.values()) {
      return task.startedAt;
    }
    return null;
  }

  /**
   * Wait until no unit is running, including units spawned while waiting
   */
  async settle(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.allSettled(Array.from(this.tasks.values(), (task) => task.promise));
    }
  }
}
