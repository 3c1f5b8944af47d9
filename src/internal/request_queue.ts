import { Assert } from './assert';
import { CR } from './completion_record';
import { Val } from './val';

/**
 * 27.6.3.1 AsyncGeneratorRequest Records
 *
 * An AsyncGeneratorRequest is a Record value used to store
 * information about how an async generator should be resumed and
 * contains the deferred used to fulfill or reject the corresponding
 * promise.
 *
 * [[Completion]], a Completion Record - The Completion Record which
 * should be used to resume the async generator: normal for next(),
 * return for return(), throw for throw().
 * [[Deferred]] - The promise-provider handle settled exactly once
 * when the request is consumed.
 */
export class ResumptionRequest<D> {
  private settled = false;

  constructor(
    readonly Completion: CR<Val>,
    readonly Deferred: D,
  ) {}

  get Settled(): boolean {
    return this.settled;
  }

  /**
   * Marks the request as consumed.  Every request reaches this point
   * exactly once, whichever of fulfill or reject ends up being used.
   */
  markSettled(): void {
    Assert(!this.settled, 'request settled twice');
    this.settled = true;
  }
}

/**
 * FIFO of pending resumption requests.  Requests are appended at the
 * tail and consumed from the head; a request stays at the head while
 * the body is executing on its behalf and is only popped once its
 * promise is settled.
 */
export class RequestQueue<D> {
  private items: Array<ResumptionRequest<D>|undefined> = [];
  private head = 0;

  get size(): number {
    return this.items.length - this.head;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  enqueue(request: ResumptionRequest<D>): void {
    this.items.push(request);
  }

  peekHead(): ResumptionRequest<D> {
    const request = this.items[this.head];
    Assert(request, 'peek on empty request queue');
    return request;
  }

  popHead(): ResumptionRequest<D> {
    const request = this.peekHead();
    this.items[this.head++] = undefined;
    // Compact once the consumed prefix dominates the backing array.
    if (this.head > 16 && this.head * 2 >= this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
    return request;
  }
}
