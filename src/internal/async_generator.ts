import { Assert } from './assert';
import { Abrupt, CR, CompletionType, IsThrowCompletion, NormalCompletion, ThrowCompletion } from './completion_record';
import { EMPTY } from './enums';
import { RequestQueue, ResumptionRequest } from './request_queue';
import { GeneratorBody, SlotValue, SuspensionFrame } from './suspension_frame';
import { Val } from './val';

/**
 * @fileoverview
 * 27.6 AsyncGenerator Objects: the suspend/resume control core.
 *
 * An AsyncGen owns its suspension frame and its request queue.
 * Requests are driven through an explicit work loop: pop (peek) the
 * head request, run the body on its behalf, settle it, and repeat
 * until the queue is empty or the body is parked on an await.
 */

/**
 * Table 83 [[AsyncGeneratorState]].  Executing doubles as the mutual
 * exclusion flag: the body is never entered while in this state,
 * including while it is parked on an await.
 */
export enum AsyncGeneratorState {
  SuspendedStart = 'suspendedStart',
  Executing = 'executing',
  AwaitingYield = 'suspendedYield',
  Completed = 'completed',
}

/** The {value, done} pair delivered to a request's fulfill path. */
export interface IterResult {
  readonly value: Val;
  readonly done: boolean;
}

/**
 * Classification of one run of the body.  `await` is not a settling
 * outcome: it leaves the head request pending until the awaited
 * value settles and the body is re-entered.
 */
export type BodyOutcome =
  {readonly Type: 'normal', readonly Value: Val}
  | {readonly Type: 'yield', readonly Value: Val}
  | {readonly Type: 'throw', readonly Value: Val}
  | {readonly Type: 'await', readonly Value: Val};

/** Creates and settles the promises handed back to requesters. */
export interface PromiseProvider<D> {
  createDeferred(): D;
  fulfill(deferred: D, result: IterResult): void;
  reject(deferred: D, reason: Val): void;
}

/**
 * Registers one-shot continuations for an awaited value.  Exactly one
 * of the callbacks must eventually be called, exactly once.
 */
export interface AwaitScheduler {
  awaitValue(
    value: Val,
    onFulfilled: (value: Val) => void,
    onRejected: (reason: Val) => void,
  ): void;
}

/**
 * How requests are settled once the generator has completed, either
 * because they were still queued or because they arrived afterwards.
 *
 *   'done'     - every request is fulfilled with {undefined, done: true};
 *                an error that completed the generator is surfaced once.
 *   'per-kind' - next() gives {undefined, true}, return(v) gives {v, true}
 *                and throw(e) is rejected with e.
 */
export type AfterCompletion = 'done'|'per-kind';

export interface GeneratorHost<D> {
  readonly promises: PromiseProvider<D>;
  readonly scheduler: AwaitScheduler;
  readonly afterCompletion: AfterCompletion;
  /** Called for every step tick the body reports while running. */
  tick(): void;
  trace?(message: string): void;
}

/**
 * Resumption Executor.
 *
 * Installs the completion into the frame, transfers control into the
 * body and classifies how it gave control back.  Step ticks are
 * forwarded to the host and do not end the run.
 */
export function ExecuteBody(
  frame: SuspensionFrame,
  completion: CR<Val>,
  tick: () => void,
): BodyOutcome {
  frame.writeResumptionValue(completion);
  while (true) {
    const step = frame.resume();
    if (step.done) return ClassifyTermination(step.value);
    const signal = step.value;
    if (signal) {
      return signal.type === 'yield' ?
        {Type: 'yield', Value: signal.yield} :
        {Type: 'await', Value: signal.await};
    }
    tick();
  }
}

/**
 * A body that terminates produces its return value as a normal
 * completion, or as a return completion when it unwound from a
 * suspension point because of return().
 */
function ClassifyTermination(result: CR<Val>): BodyOutcome {
  if (!(result instanceof Abrupt)) return {Type: 'normal', Value: result};
  if (IsThrowCompletion(result)) return {Type: 'throw', Value: result.Value};
  Assert(result.Type === CompletionType.Return,
         `${result.Type} completion escaped the generator body`);
  Assert(!EMPTY.is(result.Value));
  return {Type: 'normal', Value: result.Value};
}

export class AsyncGen<D> {
  private state = AsyncGeneratorState.SuspendedStart;
  private readonly queue = new RequestQueue<D>();
  private readonly frame: SuspensionFrame;
  /** Set while the work loop is on the stack. */
  private running = false;
  /** Settlement of an outstanding await, waiting for the work loop. */
  private awaitResult: CR<Val>|EMPTY = EMPTY;
  private awaiting = false;

  /**
   * 27.6.3.2 AsyncGeneratorStart ( generator, generatorBody )
   *
   * Captures the frame and leaves the generator in suspendedStart
   * with an empty queue.  The body does not run until the first
   * request is drained.
   */
  constructor(
    private readonly host: GeneratorHost<D>,
    slots: SlotValue[],
    body: GeneratorBody,
    readonly InternalName = '',
  ) {
    this.frame = SuspensionFrame.capture(slots, body);
  }

  get State(): AsyncGeneratorState {
    return this.state;
  }

  get QueueSize(): number {
    return this.queue.size;
  }

  get Frame(): SuspensionFrame {
    return this.frame;
  }

  /** 27.6.1.2 AsyncGenerator.prototype.next ( value ) */
  next(value: Val): D {
    return this.enqueue(NormalCompletion(value));
  }

  /** 27.6.1.3 AsyncGenerator.prototype.return ( value ) */
  return(value: Val): D {
    return this.enqueue(new Abrupt(CompletionType.Return, value, EMPTY));
  }

  /** 27.6.1.4 AsyncGenerator.prototype.throw ( exception ) */
  throw(exception: Val): D {
    return this.enqueue(ThrowCompletion(exception));
  }

  /**
   * 27.6.3.4 AsyncGeneratorEnqueue ( generator, completion, promiseCapability )
   *
   * Every request goes through the queue, even when the generator is
   * already completed, so that a request made from inside a
   * settlement callback can never overtake one queued before it.
   */
  private enqueue(completion: CR<Val>): D {
    const deferred = this.host.promises.createDeferred();
    this.queue.enqueue(new ResumptionRequest(completion, deferred));
    this.drain();
    return deferred;
  }

  /**
   * Work loop.  Reentrant calls (from a settlement or await callback
   * that fires synchronously) return immediately: the loop already on
   * the stack picks up whatever they added.
   */
  private drain(): void {
    if (this.running) return;
    this.running = true;
    try {
      while (this.step());
    } finally {
      this.running = false;
    }
  }

  /** Performs one unit of work.  Returns false when there is none. */
  private step(): boolean {
    if (this.state === AsyncGeneratorState.Executing) {
      if (EMPTY.is(this.awaitResult)) return false; // parked on an await
      const completion = this.awaitResult;
      this.awaitResult = EMPTY;
      this.run(completion);
      return true;
    }
    if (this.queue.isEmpty()) return false;
    const head = this.queue.peekHead();
    if (this.state === AsyncGeneratorState.Completed) {
      this.settleAfterCompletion(this.queue.popHead());
      return true;
    }
    if (this.state === AsyncGeneratorState.SuspendedStart &&
        head.Completion instanceof Abrupt) {
      // return() or throw() before the body ever ran: complete without
      // entering it, using the value the request carries.
      const {Type, Value} = head.Completion;
      Assert(!EMPTY.is(Value));
      this.transition(AsyncGeneratorState.Completed);
      this.frame.release();
      this.completeStep(Type === CompletionType.Throw ?
        {Type: 'throw', Value} : {Type: 'normal', Value});
      return true;
    }
    this.transition(AsyncGeneratorState.Executing);
    this.run(head.Completion);
    return true;
  }

  /**
   * Runs the body on behalf of the head request.  A host error thrown
   * out of the body (an exceeded step budget, a failed assertion)
   * leaves no coroutine to resume, so the generator is completed and
   * every request still queued is settled before the error propagates.
   */
  private run(completion: CR<Val>): void {
    let outcome: BodyOutcome;
    try {
      outcome = ExecuteBody(this.frame, completion, () => this.host.tick());
    } catch (err) {
      this.abandon();
      throw err;
    }
    this.dispatch(outcome);
  }

  private abandon(): void {
    this.awaitResult = EMPTY;
    this.awaiting = false;
    this.transition(AsyncGeneratorState.Completed);
    this.frame.release();
    // Settlement callbacks may enqueue more; they land in this loop.
    while (!this.queue.isEmpty()) this.settleAfterCompletion(this.queue.popHead());
  }

  /** Completion Dispatcher: acts on one classified run of the body. */
  private dispatch(outcome: BodyOutcome): void {
    switch (outcome.Type) {
      case 'await':
        this.parkOnAwait(outcome.Value);
        return;
      case 'yield':
        this.transition(AsyncGeneratorState.AwaitingYield);
        this.completeStep(outcome);
        return;
      case 'normal':
      case 'throw':
        this.transition(AsyncGeneratorState.Completed);
        this.frame.release();
        this.completeStep(outcome);
        return;
    }
  }

  /**
   * Hands control to the await scheduler.  The body is re-entered by
   * the work loop once exactly one of the callbacks has fired.
   */
  private parkOnAwait(value: Val): void {
    Assert(!this.awaiting, 'await registered while another is outstanding');
    this.awaiting = true;
    let fired = false;
    const resume = (completion: CR<Val>) => {
      Assert(!fired, 'await continuation invoked twice');
      Assert(this.state === AsyncGeneratorState.Executing,
             `await resumed in state ${this.state}`);
      fired = true;
      this.awaiting = false;
      this.awaitResult = completion;
      this.drain();
    };
    this.host.scheduler.awaitValue(
      value,
      (v) => resume(NormalCompletion(v)),
      (reason) => resume(ThrowCompletion(reason)));
  }

  /**
   * 27.6.3.5 AsyncGeneratorCompleteStep ( generator, completion, done )
   *
   * Removes the head request and settles it: a throw rejects, a yield
   * fulfills with done: false, a normal completion with done: true.
   */
  private completeStep(outcome: BodyOutcome): void {
    const request = this.queue.popHead();
    request.markSettled();
    if (outcome.Type === 'throw') {
      this.host.promises.reject(request.Deferred, outcome.Value);
    } else {
      this.host.promises.fulfill(
        request.Deferred, {value: outcome.Value, done: outcome.Type !== 'yield'});
    }
  }

  /**
   * 27.6.3.10 AsyncGeneratorDrainQueue ( generator ), for one request.
   * The body is never entered again.
   */
  private settleAfterCompletion(request: ResumptionRequest<D>): void {
    request.markSettled();
    const completion = request.Completion;
    if (this.host.afterCompletion === 'per-kind' && completion instanceof Abrupt) {
      Assert(!EMPTY.is(completion.Value));
      if (completion.Type === CompletionType.Throw) {
        this.host.promises.reject(request.Deferred, completion.Value);
      } else {
        this.host.promises.fulfill(request.Deferred, {value: completion.Value, done: true});
      }
      return;
    }
    this.host.promises.fulfill(request.Deferred, {value: undefined, done: true});
  }

  private transition(to: AsyncGeneratorState): void {
    const from = this.state;
    Assert(from !== AsyncGeneratorState.Completed, `transition out of completed to ${to}`);
    Assert(from !== to, `redundant transition to ${to}`);
    this.host.trace?.(`${this.InternalName || '<anonymous>'}: ${from} -> ${to}`);
    this.state = to;
  }
}
