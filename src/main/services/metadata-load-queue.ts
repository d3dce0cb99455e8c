export type MetadataLoadResult<T> =
  | { ok: true; filePath: string; value: T }
  | { ok: false; filePath: string; error: unknown };

interface MetadataLoadTask<T> {
  filePath: string;
  resolve(result: MetadataLoadResult<T>): void;
}

interface MetadataLoadQueueOptions<T> {
  concurrency: number;
  runTask(filePath: string): Promise<T>;
}

/**
 * Runs tag reads with bounded concurrency. Every enqueued path settles with a
 * result object, never a rejection, so one bad file cannot fail a whole scan.
 */
export class MetadataLoadQueue<T> {
  private readonly queue: Array<MetadataLoadTask<T>> = [];
  private readonly inFlightByPath = new Map<string, Promise<MetadataLoadResult<T>>>();
  private readonly concurrency: number;
  private readonly runTask: (filePath: string) => Promise<T>;
  private workerCount = 0;
  private shuttingDown = false;

  public constructor(options: MetadataLoadQueueOptions<T>) {
    this.concurrency = Math.max(1, Math.floor(options.concurrency));
    this.runTask = options.runTask;
  }

  public enqueue(filePath: string): Promise<MetadataLoadResult<T>> {
    if (this.shuttingDown) {
      return Promise.resolve({ ok: false, filePath, error: new Error("Metadata queue is shut down.") });
    }

    const existing = this.inFlightByPath.get(filePath);
    if (existing) {
      return existing;
    }

    const taskPromise = new Promise<MetadataLoadResult<T>>((resolve) => {
      this.queue.push({ filePath, resolve });
      this.drain();
    }).finally(() => {
      this.inFlightByPath.delete(filePath);
    });

    this.inFlightByPath.set(filePath, taskPromise);
    return taskPromise;
  }

  public async loadAll(filePaths: string[]): Promise<Array<MetadataLoadResult<T>>> {
    return await Promise.all(filePaths.map((filePath) => this.enqueue(filePath)));
  }

  public shutdown(): void {
    this.shuttingDown = true;

    const pendingTasks = this.queue.splice(0, this.queue.length);
    for (const task of pendingTasks) {
      task.resolve({ ok: false, filePath: task.filePath, error: new Error("Metadata queue is shut down.") });
    }
  }

  private drain(): void {
    if (this.shuttingDown) {
      return;
    }

    while (this.workerCount < this.concurrency) {
      const task = this.queue.shift();
      if (!task) {
        return;
      }

      this.workerCount += 1;
      void this.runTask(task.filePath).then(
        (value) => task.resolve({ ok: true, filePath: task.filePath, value }),
        (error: unknown) => task.resolve({ ok: false, filePath: task.filePath, error })
      ).finally(() => {
        this.workerCount -= 1;
        this.drain();
      });
    }
  }
}
