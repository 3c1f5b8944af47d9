import { Assert } from './assert';
import { CR } from './completion_record';
import { EMPTY, UNINITIALIZED } from './enums';
import { Val } from './val';
import type { AwaitSignal, EvalGen, EvalSignal, YieldSignal } from './vm';

/** The resumable evaluation of a generator body. */
export type BodyCoroutine = EvalGen<CR<Val>>;

/**
 * Produces the coroutine for a generator body.  The body reads the
 * value handed to each suspension point from the frame it is given.
 */
export type GeneratorBody = (frame: SuspensionFrame) => BodyCoroutine;

export type SlotValue = Val|UNINITIALIZED;

/**
 * Local execution state of one async generator body, kept across
 * suspensions.  Locals live in a flat slot arena indexed by the slot
 * numbers assigned during scope analysis; the continuation point is
 * the suspended body coroutine.  The frame also carries the one
 * completion that the paused yield or await will observe when the
 * body is resumed.
 */
export class SuspensionFrame {
  private continuation: BodyCoroutine|undefined = undefined;
  private resumption: CR<Val>|EMPTY = EMPTY;
  private started = false;

  private constructor(readonly Slots: SlotValue[]) {}

  /**
   * Snapshots the locals at generator creation and prepares (without
   * starting) the body.  Called once per generator.
   */
  static capture(slots: SlotValue[], body: GeneratorBody): SuspensionFrame {
    const frame = new SuspensionFrame(slots);
    frame.continuation = body(frame);
    return frame;
  }

  get Started(): boolean {
    return this.started;
  }

  get Released(): boolean {
    return this.continuation === undefined;
  }

  /**
   * Installs the completion the suspended expression will see.  Must
   * happen before each resumption.
   */
  writeResumptionValue(completion: CR<Val>): void {
    Assert(EMPTY.is(this.resumption), 'resumption value already pending');
    this.resumption = completion;
  }

  /** Called by the body at a suspension point after control returns. */
  takeResumptionValue(): CR<Val> {
    const completion = this.resumption;
    Assert(!EMPTY.is(completion), 'resumed without a resumption value');
    this.resumption = EMPTY;
    return completion;
  }

  /**
   * Transfers control into the body until its next step tick,
   * suspension or termination.  The value written before the first
   * resumption is discarded: there is no suspended expression yet to
   * receive it.
   */
  resume(): IteratorResult<EvalSignal, CR<Val>> {
    Assert(this.continuation, 'resumed a released frame');
    if (!this.started) {
      this.started = true;
      this.resumption = EMPTY;
    }
    return this.continuation.next();
  }

  /** Drops the continuation and locals once the body has terminated. */
  release(): void {
    this.continuation = undefined;
    this.resumption = EMPTY;
    this.Slots.length = 0;
  }
}

/**
 * Suspends the running body with the given signal and returns the
 * completion it is later resumed with.
 */
export function* SuspendBody(
  frame: SuspensionFrame,
  signal: YieldSignal|AwaitSignal,
): EvalGen<CR<Val>> {
  yield signal;
  return frame.takeResumptionValue();
}
