/**
 * @fileoverview
 *
 * 9.5 Jobs and Host Operations to Enqueue Jobs
 *
 * A Job is an Abstract Closure with no parameters that initiates an
 * ECMAScript computation when no other ECMAScript computation is
 * currently in progress.
 *
 * Once evaluation of a Job starts, it must run to completion before
 * evaluation of any other Job starts.  Promise jobs are treated as a
 * higher priority than timers: the microtask queue is always empty
 * before the next timer fires.  Timers run on a virtual clock that
 * jumps straight to the next due time, so a script that sleeps does
 * not keep the host waiting.
 */

export type Job = () => void;

interface Timer {
  readonly Due: number;
  readonly Job: Job;
}

export class JobQueue {
  private readonly microtasks: Job[] = [];
  private microtaskHead = 0;
  private timers: Timer[] = [];
  private now = 0;

  /** Current virtual time, in milliseconds. */
  get Now(): number {
    return this.now;
  }

  /** 9.5.5 HostEnqueuePromiseJob ( job, realm ) */
  enqueueMicrotask(job: Job): void {
    this.microtasks.push(job);
  }

  /**
   * Schedules a job to run once the virtual clock reaches now + delay.
   * Negative and NaN delays count as 0; an infinite one never fires.
   */
  enqueueTimer(delay: number, job: Job): void {
    if (delay === Infinity) return;
    const Due = this.now + Math.max(0, Number.isNaN(delay) ? 0 : delay);
    const timer = {Due, Job: job};
    // Keep timers sorted by due time, then by insertion order.
    let i = this.timers.length;
    while (i > 0 && this.timers[i - 1].Due > Due) i--;
    this.timers.splice(i, 0, timer);
  }

  hasPendingMicrotask(): boolean {
    return this.microtaskHead < this.microtasks.length;
  }

  hasPendingTask(): boolean {
    return this.hasPendingMicrotask() || this.timers.length > 0;
  }

  /**
   * Runs the next job, if any, advancing the clock for a timer.
   * Returns false once both queues are empty.
   */
  runNext(): boolean {
    if (this.hasPendingMicrotask()) {
      const job = this.microtasks[this.microtaskHead++];
      if (this.microtaskHead === this.microtasks.length) {
        this.microtasks.length = 0;
        this.microtaskHead = 0;
      }
      job();
      return true;
    }
    const timer = this.timers.shift();
    if (!timer) return false;
    this.now = Math.max(this.now, timer.Due);
    timer.Job();
    return true;
  }
}
