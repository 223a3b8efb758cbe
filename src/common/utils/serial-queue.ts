import { concatMap, defer, Subject } from 'rxjs';

type Job = () => Promise<void>;

/**
 * Runs async tasks one at a time in submission order.
 *
 * A failing task rejects its own promise only; the queue keeps going.
 */
export class SerialQueue {
  private readonly jobs$ = new Subject<Job>();
  private pending = 0;
  private closed = false;
  private idleWaiters: Array<() => void> = [];

  constructor() {
    this.jobs$
      .pipe(concatMap((job) => defer(job)))
      .subscribe();
  }

  get size(): number {
    return this.pending;
  }

  run<T>(task: () => Promise<T> | T): Promise<T> {
    if (this.closed) {
      return Promise.reject(new Error('Queue is closed'));
    }

    this.pending += 1;
    return new Promise<T>((resolve, reject) => {
      this.jobs$.next(async () => {
        try {
          resolve(await task());
        } catch (error) {
          reject(error);
        } finally {
          this.pending -= 1;
          if (this.pending === 0) this.notifyIdle();
        }
      });
    });
  }

  /** Resolves once every task submitted so far has settled. */
  drain(): Promise<void> {
    if (this.pending === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /** Rejects new tasks; tasks already queued still run. */
  close(): void {
    this.closed = true;
    this.jobs$.complete();
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((resolve) => resolve());
  }
}
