import { ToNumber } from './abstract_conversion';
import { Assert } from './assert';
import { IsAbrupt } from './completion_record';
import { errorObject } from './error_object';
import { method } from './func';
import { Obj } from './obj';
import { RealmRecord, defineGlobals } from './realm_record';
import { Val } from './val';
import { ECR, Plugin, VM } from './vm';

/**
 * 27.2 Promise Objects
 *
 * A Promise is an object that is used as a placeholder for the
 * eventual results of a deferred (and possibly asynchronous)
 * computation.
 *
 * Any Promise is in one of three mutually exclusive states:
 * fulfilled, rejected, and pending.  A promise is said to be settled
 * if it is not pending, i.e. if it is either fulfilled or rejected.
 *
 * A promise is resolved if it is settled or if it has been "locked
 * in" to match the state of another promise. Attempting to resolve or
 * reject a resolved promise has no effect.
 *
 * Reactions are host closures: promises are consumed by the await
 * machinery and by the embedding program, never by script callbacks.
 * Only promise objects are adopted as thenables.
 */
export const promises: Plugin = {
  id: 'promises',
  deps: () => [errorObject],
  realm: {
    CreateIntrinsics(realm) {
      realm.Intrinsics.set('%Promise.prototype%',
                           new Obj(realm.getIntrinsic('%Object.prototype%'), '%Promise.prototype%'));
      defineGlobals(realm, {
        'resolve': method(PromiseCtorResolve, 1),
        'reject': method(PromiseCtorReject, 1),
        'sleep': method(Sleep, 2),
      });
    },
  },
};

export type PromiseState = 'pending'|'fulfilled'|'rejected';

/**
 * 27.2.6 Properties of Promise Instances
 *
 * [[PromiseState]], pending, fulfilled, or rejected - Governs how a
 * promise will react to incoming calls to its then method.
 *
 * [[PromiseResult]], an ECMAScript language value - The value with
 * which the promise has been fulfilled or rejected, if any. Only
 * meaningful if [[PromiseState]] is not pending.
 *
 * [[PromiseIsHandled]] a Boolean Indicates whether the promise has
 * ever had a fulfillment or rejection handler; used in unhandled
 * rejection tracking.
 */
export class Prom extends Obj {
  PromiseState: PromiseState = 'pending';
  PromiseResult: Val = undefined;
  PromiseFulfillReactions: PromiseReaction[] = [];
  PromiseRejectReactions: PromiseReaction[] = [];
  PromiseIsHandled = false;
}

export function IsPromise(x: Val): x is Prom {
  return x instanceof Prom;
}

export type ReactionHandler = (argument: Val) => void;

/**
 * 27.2.1.2 PromiseReaction Records
 *
 * [[Type]], Fulfill or Reject.
 * [[Handler]] - The closure that should be applied to the incoming
 * value.
 */
export class PromiseReaction {
  constructor(
    readonly Type: 'fulfill'|'reject',
    readonly Handler: ReactionHandler,
  ) {}
}

/**
 * 27.2.1.1 PromiseCapability Records
 *
 * [[Promise]], an Object - An object that is usable as a promise.
 * [[Resolve]] - The function that is used to resolve the given promise.
 * [[Reject]] - The function that is used to reject the given promise.
 */
export class PromiseCapability {
  constructor(
    readonly Promise: Prom,
    readonly Resolve: (resolution: Val) => void,
    readonly Reject: (reason: Val) => void,
  ) {}
}

/**
 * 27.2.1.3 CreateResolvingFunctions ( promise )
 *
 * 1. Let alreadyResolved be the Record { [[Value]]: false }.
 * ...
 * 12. Return the Record { [[Resolve]]: resolve, [[Reject]]: reject }.
 */
export function CreateResolvingFunctions($: VM, promise: Prom): {
  Resolve: (resolution: Val) => void,
  Reject: (reason: Val) => void,
} {
  const alreadyResolved = {Value: false};
  return {
    /** 27.2.1.3.2 Promise Resolve Functions */
    Resolve(resolution: Val) {
      if (alreadyResolved.Value) return;
      alreadyResolved.Value = true;
      if (resolution === promise) {
        RejectPromise($, promise, $.makeError('TypeError', 'Chaining cycle detected for promise'));
        return;
      }
      if (!IsPromise(resolution)) {
        FulfillPromise($, promise, resolution);
        return;
      }
      $.jobs.enqueueMicrotask(NewPromiseResolveThenableJob($, promise, resolution));
    },
    /** 27.2.1.3.1 Promise Reject Functions */
    Reject(reason: Val) {
      if (alreadyResolved.Value) return;
      alreadyResolved.Value = true;
      RejectPromise($, promise, reason);
    },
  };
}

/**
 * 27.2.2.2 NewPromiseResolveThenableJob ( promiseToResolve, thenable, then )
 *
 * Resolving with another promise takes an extra job before the
 * reaction is even registered.
 */
function NewPromiseResolveThenableJob($: VM, promiseToResolve: Prom, thenable: Prom): () => void {
  return () => {
    const {Resolve, Reject} = CreateResolvingFunctions($, promiseToResolve);
    PerformPromiseThen($, thenable, Resolve, Reject);
  };
}

/**
 * 27.2.1.4 FulfillPromise ( promise, value )
 */
export function FulfillPromise($: VM, promise: Prom, value: Val): void {
  Assert(promise.PromiseState === 'pending');
  const reactions = promise.PromiseFulfillReactions;
  promise.PromiseResult = value;
  promise.PromiseFulfillReactions = [];
  promise.PromiseRejectReactions = [];
  promise.PromiseState = 'fulfilled';
  TriggerPromiseReactions($, reactions, value);
}

/**
 * 27.2.1.7 RejectPromise ( promise, reason )
 */
export function RejectPromise($: VM, promise: Prom, reason: Val): void {
  Assert(promise.PromiseState === 'pending');
  const reactions = promise.PromiseRejectReactions;
  promise.PromiseResult = reason;
  promise.PromiseFulfillReactions = [];
  promise.PromiseRejectReactions = [];
  promise.PromiseState = 'rejected';
  if (!promise.PromiseIsHandled) HostPromiseRejectionTracker($, promise, 'reject');
  TriggerPromiseReactions($, reactions, reason);
}

/**
 * 27.2.1.8 TriggerPromiseReactions ( reactions, argument )
 */
export function TriggerPromiseReactions($: VM, reactions: PromiseReaction[], argument: Val): void {
  for (const reaction of reactions) {
    $.jobs.enqueueMicrotask(() => reaction.Handler(argument));
  }
}

/**
 * 27.2.1.9 HostPromiseRejectionTracker ( promise, operation )
 *
 * Keeps the set of rejected promises nobody has reacted to yet, so
 * the host can report them once the job queue is idle.
 */
export function HostPromiseRejectionTracker($: VM, promise: Prom, operation: 'reject'|'handle'): void {
  if (operation === 'reject') {
    $.unhandledRejections.add(promise);
  } else {
    $.unhandledRejections.delete(promise);
  }
}

/**
 * 27.2.1.5 NewPromiseCapability ( C ), for the intrinsic %Promise%.
 */
export function NewPromiseCapability($: VM, realm: RealmRecord = $.getRealm()): PromiseCapability {
  const promise = new Prom(realm.getIntrinsic('%Promise.prototype%'), 'Promise');
  const {Resolve, Reject} = CreateResolvingFunctions($, promise);
  return new PromiseCapability(promise, Resolve, Reject);
}

/**
 * 27.2.4.7.1 PromiseResolve ( C, x )
 *
 * 1. If IsPromise(x) is true, return x.
 * 2. Let promiseCapability be ? NewPromiseCapability(C).
 * 3. Perform ? Call(promiseCapability.[[Resolve]], undefined, « x »).
 * 4. Return promiseCapability.[[Promise]].
 */
export function PromiseResolve($: VM, x: Val, realm?: RealmRecord): Prom {
  if (IsPromise(x)) return x;
  const capability = NewPromiseCapability($, realm);
  capability.Resolve(x);
  return capability.Promise;
}

/**
 * 27.2.5.4.1 PerformPromiseThen ( promise, onFulfilled, onRejected [ , resultCapability ] )
 */
export function PerformPromiseThen(
  $: VM,
  promise: Prom,
  onFulfilled: ReactionHandler,
  onRejected: ReactionHandler,
): void {
  const fulfillReaction = new PromiseReaction('fulfill', onFulfilled);
  const rejectReaction = new PromiseReaction('reject', onRejected);
  if (promise.PromiseState === 'pending') {
    promise.PromiseFulfillReactions.push(fulfillReaction);
    promise.PromiseRejectReactions.push(rejectReaction);
  } else if (promise.PromiseState === 'fulfilled') {
    TriggerPromiseReactions($, [fulfillReaction], promise.PromiseResult);
  } else {
    if (!promise.PromiseIsHandled) HostPromiseRejectionTracker($, promise, 'handle');
    TriggerPromiseReactions($, [rejectReaction], promise.PromiseResult);
  }
  promise.PromiseIsHandled = true;
}

/** 27.2.4.7 Promise.resolve ( x ), exposed as the global `resolve`. */
function* PromiseCtorResolve($: VM, _thisArg: Val, x: Val): ECR<Val> {
  return PromiseResolve($, x);
}

/** 27.2.4.6 Promise.reject ( r ), exposed as the global `reject`. */
function* PromiseCtorReject($: VM, _thisArg: Val, r: Val): ECR<Val> {
  const capability = NewPromiseCapability($);
  capability.Reject(r);
  return capability.Promise;
}

/**
 * `sleep(ms, value)` returns a promise fulfilled with value once the
 * virtual clock has advanced by ms.
 */
function* Sleep($: VM, _thisArg: Val, ms: Val, value: Val): ECR<Val> {
  const delay = ToNumber($, ms);
  if (IsAbrupt(delay)) return delay;
  const capability = NewPromiseCapability($);
  $.jobs.enqueueTimer(delay, () => capability.Resolve(value));
  return capability.Promise;
}

