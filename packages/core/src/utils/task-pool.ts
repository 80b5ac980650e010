/**
 * Bounded task pool
 *
 * Long-running blocking work (external extractor processes, synchronous
 * third-party searches) is submitted here. At most `maxConcurrent` tasks run
 * at once; the rest wait in FIFO order instead of spawning without bound.
 */

import { log } from '../services/log-service';

type Task<T> = () => Promise<T>;

interface QueuedTask {
  label: string;
  start: () => void;
}

export class TaskPool {
  private queue: QueuedTask[] = [];
  private active = 0;

  constructor(private readonly maxConcurrent: number, private readonly name = 'TaskPool') {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError(`${name}: maxConcurrent must be a positive integer, got ${maxConcurrent}`);
    }
  }

  /** Tasks currently running */
  get size(): number {
    return this.active;
  }

  /** Tasks waiting for a slot */
  get pending(): number {
    return this.queue.length;
  }

  run<T>(task: Task<T>, label = 'task'): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        label,
        start: () => {
          void Promise.resolve()
            .then(task)
            .then(resolve, reject)
            .finally(() => {
              this.active--;
              this.processQueue();
            });
        }
      });
      this.processQueue();
    });
  }

  private processQueue(): void {
    while (this.queue.length > 0 && this.active < this.maxConcurrent) {
      const next = this.queue.shift();
      if (!next) break;
      this.active++;
      log.debug(this.name, `Starting ${next.label}`, { active: this.active, queued: this.queue.length });
      next.start();
    }
  }
}
