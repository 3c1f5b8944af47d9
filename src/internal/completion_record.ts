import { EMPTY } from './enums';
import { Assert } from './assert';
import type { Val } from './val';

/**
 * 6.2.4 The Completion Record Specification Type
 *
 * The Completion Record specification type is used to explain the
 * runtime propagation of values and control flow such as the
 * behaviour of statements (break, continue, return and throw) that
 * perform nonlocal transfers of control.
 *
 * Normal completions are represented by the bare value; only abrupt
 * completions are boxed.
 */
export type CR<T> = T|Abrupt;

/**
 * Abrupt completion refers to any Completion Record with a [[Type]]
 * value other than normal.
 */
export class Abrupt {
  constructor(
    /** The type of completion that occurred. */
    readonly Type: Exclude<CompletionType, CompletionType.Normal>,
    /** The value that was produced. */
    readonly Value: Val|EMPTY,
    /** The target label for directed control transfers. */
    readonly Target: string|EMPTY,
  ) {}
}

export enum CompletionType {
  Normal = 'normal',
  Return = 'return',
  Throw = 'throw',
  Continue = 'continue',
  Break = 'break',
}

export type NotGen<T> = T extends Generator ? [never] : [];

function looksLikeGenerator(x: unknown): boolean {
  return typeof x === 'object' && x !== null && 'next' in x &&
    typeof x.next === 'function';
}

/**
 * NOTE: we do some type shenanigans to give a type checking error if
 * an ECR is passed in without yielding, as well as a runtime check,
 * since this is a common error that is hard to debug.
 */
export function IsAbrupt<T>(x: CR<T>, ..._: NotGen<T>): x is Abrupt {
  if (looksLikeGenerator(x)) {
    throw new Error('IsAbrupt on generator: forgot to yield?');
  }
  return x instanceof Abrupt;
}

/**
 * 6.2.4.1 NormalCompletion ( value )
 */
export function NormalCompletion<T>(value: T): CR<T> {
  return value;
}

/**
 * 6.2.4.2 ThrowCompletion ( value )
 */
export function ThrowCompletion(value: Val): CR<never> {
  return new Abrupt(CompletionType.Throw, value, EMPTY);
}

type ThrowCompletion = Abrupt & {Type: CompletionType.Throw, Value: Val};
export function IsThrowCompletion<T>(
  completion: CR<T>,
  ...rest: NotGen<T>
): completion is ThrowCompletion {
  return IsAbrupt(completion, ...rest) && completion.Type === CompletionType.Throw;
}

export function ReturnCompletion(value: Val): CR<never> {
  return new Abrupt(CompletionType.Return, value, EMPTY);
}

export function BreakCompletion(): CR<never> {
  return new Abrupt(CompletionType.Break, EMPTY, EMPTY);
}

export function ContinueCompletion(): CR<never> {
  return new Abrupt(CompletionType.Continue, EMPTY, EMPTY);
}

/**
 * 6.2.4.3 UpdateEmpty ( completionRecord, value )
 *
 * The abstract operation UpdateEmpty takes arguments completionRecord
 * (a Completion Record) and value (any value except a Completion
 * Record) and returns a Completion Record.
 */
export function UpdateEmpty<T>(
  completionRecord: CR<T|EMPTY>,
  value: Val|EMPTY,
): CR<T|Val|EMPTY> {
  if (!(completionRecord instanceof Abrupt)) {
    return EMPTY.is(completionRecord) ? value : completionRecord;
  }
  if (!EMPTY.is(completionRecord.Value)) return completionRecord;
  Assert(completionRecord.Type !== CompletionType.Return &&
    completionRecord.Type !== CompletionType.Throw);
  return new Abrupt(completionRecord.Type, value, completionRecord.Target);
}
