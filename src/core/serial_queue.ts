/**
 * core/serial_queue.ts
 *
 * The coordinating context. Every piece of controller state is touched only
 * from tasks running here, one at a time, in the order they were posted.
 */

import { scopedLogger } from './logger';

const log = scopedLogger('core/serial_queue');

export type Task = () => void;

export class SerialTaskQueue {
  private tasks: Task[] = [];
  private running = false;
  private scheduled = false;
  private closed = false;

  /** Appends a task. Returns false once the queue is closed. */
  post(task: Task): boolean {
    if (this.closed) {
      log.debug('Task posted after close, dropped');
      return false;
    }
    this.tasks.push(task);
    this.schedule();
    return true;
  }

  /** True only while a posted task is executing. */
  isCurrent(): boolean {
    return this.running;
  }

  /** Runs every pending task (and those they post) synchronously. */
  flush(): void {
    this.drain();
  }

  /** Drops pending tasks and refuses new ones. */
  close(): void {
    this.closed = true;
    this.tasks = [];
  }

  get pending(): number {
    return this.tasks.length;
  }

  // -------------------------------------------------------------------------

  private schedule(): void {
    if (this.scheduled || this.running) return;
    this.scheduled = true;
    setImmediate(() => {
      this.scheduled = false;
      this.drain();
    });
  }

  private drain(): void {
    // flush() from inside a task must not re-enter
    if (this.running) return;

    let task = this.tasks.shift();
    while (task) {
      this.running = true;
      try {
        task();
      } catch (e) {
        log.error({ error: (e as Error).message, stack: (e as Error).stack }, 'Queued task failed');
      } finally {
        this.running = false;
      }
      task = this.tasks.shift();
    }
  }
}
