import type { Obj } from './obj';

/**
 * 6.1 ECMAScript Language Types
 *
 * An ECMAScript language type corresponds to values that are directly
 * manipulated by an ECMAScript programmer using the ECMAScript
 * language. Symbols are not modelled; every other primitive is
 * represented by the matching host primitive.
 */

export type Prim = undefined|null|boolean|string|number|bigint;
export type Val = Prim|Obj;

export type PropertyKey = string;

export type LanguageType =
  'undefined'|'null'|'boolean'|'string'|'number'|'bigint'|'object';
