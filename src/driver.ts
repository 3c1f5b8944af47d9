import { AsyncGeneratorInstance } from './internal/async_generator_function';
import { ToBoolean, ToPrimitive } from './internal/abstract_conversion';
import { ErrorObject } from './internal/error_object';
import { Obj } from './internal/obj';
import { Prom } from './internal/promise';
import { Val } from './internal/val';
import { DebugString, VM } from './internal/vm';

/** What became of a promise once the job queue went idle. */
export type Settlement =
  {readonly kind: 'fulfilled', readonly value: Val, readonly done: boolean}
  | {readonly kind: 'rejected', readonly reason: Val}
  | {readonly kind: 'pending'};

export function SettlementOf(promise: Prom): Settlement {
  switch (promise.PromiseState) {
    case 'pending':
      return {kind: 'pending'};
    case 'rejected':
      return {kind: 'rejected', reason: promise.PromiseResult};
    case 'fulfilled': {
      const result = promise.PromiseResult;
      if (!(result instanceof Obj)) return {kind: 'fulfilled', value: result, done: true};
      return {
        kind: 'fulfilled',
        value: result.Get('value'),
        done: ToBoolean(result.Get('done')),
      };
    }
  }
}

/** Renders a settlement the way the CLI prints it. */
export function FormatSettlement(settlement: Settlement): string {
  switch (settlement.kind) {
    case 'pending':
      return 'pending';
    case 'rejected':
      return `rejected: ${DescribeReason(settlement.reason)}`;
    case 'fulfilled':
      return `{value: ${DebugString(settlement.value, 1)}, done: ${settlement.done}}`;
  }
}

/** Errors print as `Name: message`, without their stack. */
function DescribeReason(reason: Val): string {
  if (reason instanceof ErrorObject) return String(ToPrimitive(reason));
  return DebugString(reason);
}

export interface DriveOptions {
  /** Stop after this many requests even if the generator is not done. */
  maxRequests?: number;
}

/**
 * Calls next() on the generator, runs jobs until idle, and reports
 * the settlement, repeating until a result is done, rejected or
 * still pending.
 */
export function DriveGenerator(
  $: VM,
  generator: AsyncGeneratorInstance,
  onResult: (settlement: Settlement) => void,
  {maxRequests = Infinity}: DriveOptions = {},
): void {
  for (let i = 0; i < maxRequests; i++) {
    const capability = $.hostCall(() => generator.Generator.next(undefined));
    $.runJobs();
    const settlement = SettlementOf(capability.Promise);
    onResult(settlement);
    if (settlement.kind !== 'fulfilled' || settlement.done) return;
  }
}
