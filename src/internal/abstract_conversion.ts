/**
 * @fileoverview
 * 7.1 Type Conversion and 7.2 Testing and Comparison Operations
 *
 * Objects have no user-definable conversion methods in this
 * interpreter (the only script-defined functions are async
 * generators), so ToPrimitive is total and synchronous.
 */

import { CR } from './completion_record';
import { Func } from './func';
import { Obj } from './obj';
import { LanguageType, Prim, Val } from './val';
import type { VM } from './vm';

/** 6.1 Type(x), with the typeof spelling for functions folded in. */
export function Type(v: Val): LanguageType {
  if (v === null) return 'null';
  if (v instanceof Obj) return 'object';
  switch (typeof v) {
    case 'undefined': return 'undefined';
    case 'boolean': return 'boolean';
    case 'string': return 'string';
    case 'number': return 'number';
    default: return 'bigint';
  }
}

/**
 * 13.5.3.1 Runtime Semantics: Evaluation of typeof, on a value.
 */
export function TypeOf(v: Val): string {
  if (v instanceof Func) return 'function';
  return Type(v);
}

/**
 * 7.1.1 ToPrimitive ( input [ , preferredType ] )
 */
export function ToPrimitive(input: Val): Prim {
  if (!(input instanceof Obj)) return input;
  if (input instanceof Func) return `function ${input.InitialName}() { [native code] }`;
  if (input.HasProperty('message') && input.HasProperty('name')) {
    const name = String(ToPrimitive(input.Get('name')));
    const message = String(ToPrimitive(input.Get('message')));
    return message ? `${name}: ${message}` : name;
  }
  return '[object Object]';
}

/**
 * 7.1.2 ToBoolean ( argument )
 */
export function ToBoolean(argument: Val): boolean {
  if (argument instanceof Obj) return true;
  return Boolean(argument);
}

/**
 * 7.1.3 ToNumeric ( value )
 */
export function ToNumeric(value: Val): number|bigint {
  const prim = ToPrimitive(value);
  if (typeof prim === 'bigint') return prim;
  return Number(prim);
}

/**
 * 7.1.4 ToNumber ( argument )
 */
export function ToNumber($: VM, argument: Val): CR<number> {
  const prim = ToPrimitive(argument);
  if (typeof prim === 'bigint') {
    return $.throw('TypeError', 'Cannot convert a BigInt value to a number');
  }
  return Number(prim);
}

/**
 * 7.1.17 ToString ( argument )
 */
export function ToString(_$: VM, argument: Val): CR<string> {
  return String(ToPrimitive(argument));
}

/**
 * 7.2.14 IsStrictlyEqual ( x, y )
 */
export function IsStrictlyEqual(x: Val, y: Val): boolean {
  return x === y;
}

/**
 * 7.2.13 IsLooselyEqual ( x, y )
 */
export function IsLooselyEqual(x: Val, y: Val): boolean {
  if (Type(x) === Type(y)) return x === y;
  if (x == null && y == null) return true;
  if (x == null || y == null) return false;
  if (x instanceof Obj && y instanceof Obj) return false;
  const px = ToPrimitive(x);
  const py = ToPrimitive(y);
  if (px == null || py == null) return false;
  // Host loose equality on primitives implements the remaining steps.
  return px == py;
}
