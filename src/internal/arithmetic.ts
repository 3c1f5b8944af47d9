import { BinaryExpression, Expression, UnaryExpression, UpdateExpression } from 'estree';
import { IsLooselyEqual, IsStrictlyEqual, ToBoolean, ToNumber, ToNumeric, ToPrimitive, ToString, TypeOf } from './abstract_conversion';
import { Assert } from './assert';
import { CR, IsAbrupt } from './completion_record';
import { EMPTY } from './enums';
import { Obj } from './obj';
import { BindingReference, GetValue, IsReference, PutValue } from './reference_record';
import { Val } from './val';
import { DebugString, ECR, Plugin, VM, when } from './vm';

export const arithmetic: Plugin = {
  id: 'arithmetic',

  syntax: {
    Evaluation(on) {
      on('UnaryExpression',
         when(n => UNARY_OPS.has(n.operator),
              Evaluate_UnaryExpression));
      on('UpdateExpression', Evaluate_UpdateExpression);
      on('BinaryExpression',
         when(n => n.operator !== 'instanceof',
              Evaluate_BinaryExpression));
    },
  },
};

export const UNARY_OPS = new Set(['!', '-', '+', 'typeof', 'void']);

export const STRNUM_OPS = new Set([
  '+', '-', '*', '**', '/', '%', '<<', '>>', '>>>', '&', '^', '|',
]);

/**
 * 13.4 Update Expressions
 *
 * UpdateExpression : LeftHandSideExpression ++
 * 1. Let lhs be ? Evaluation of LeftHandSideExpression.
 * 2. Let oldValue be ? ToNumeric(? GetValue(lhs)).
 * 3. If oldValue is a Number, then
 *     a. Let newValue be Number::add(oldValue, 1𝔽).
 * 4. Else,
 *     a. Assert: oldValue is a BigInt.
 *     b. Let newValue be BigInt::add(oldValue, 1ℤ).
 * 5. Perform ? PutValue(lhs, newValue).
 * 6. Return oldValue.
 *
 * The prefix forms return newValue instead; the -- forms subtract.
 */
export function* Evaluate_UpdateExpression($: VM, n: UpdateExpression): ECR<Val> {
  const lhs = yield* $.Evaluation(n.argument);
  if (IsAbrupt(lhs)) return lhs;
  Assert(IsReference(lhs), 'Invalid update target');
  const value = GetValue($, lhs);
  if (IsAbrupt(value)) return value;
  const oldValue = ToNumeric(value);
  const delta = n.operator === '++' ? 1 : -1;
  const newValue = typeof oldValue === 'bigint' ? oldValue + BigInt(delta) : oldValue + delta;
  const status = PutValue($, lhs, newValue);
  if (IsAbrupt(status)) return status;
  return n.prefix ? newValue : oldValue;
}

export function Evaluate_UnaryExpression($: VM, n: UnaryExpression): ECR<Val> {
  switch (n.operator) {
    case 'typeof': return EvaluateUnaryTypeof($, n.argument);
    case 'void': return EvaluateUnaryVoid($, n.argument);
    case '!': return EvaluateUnaryNot($, n.argument);
    case '-': return EvaluateUnaryMinus($, n.argument);
    case '+': return EvaluateUnaryPlus($, n.argument);
  }
  throw new Error(`Unexpected unary operator ${n.operator}`);
}

/**
 * 13.5.2 The void Operator
 *
 * UnaryExpression : void UnaryExpression
 * 1. Let expr be ? Evaluation of UnaryExpression.
 * 2. Perform ? GetValue(expr).
 * 3. Return undefined.
 */
export function* EvaluateUnaryVoid($: VM, n: Expression): ECR<undefined> {
  const value = yield* $.evaluateValue(n);
  if (IsAbrupt(value)) return value;
  return undefined;
}

/**
 * 13.5.3 The typeof Operator
 *
 * UnaryExpression : typeof UnaryExpression
 * 1. Let val be ? Evaluation of UnaryExpression.
 * 2. If val is a Reference Record, then
 *     a. If IsUnresolvableReference(val) is true, return "undefined".
 * 3. Set val to ? GetValue(val).
 * ...
 */
export function* EvaluateUnaryTypeof($: VM, n: Expression): ECR<string> {
  const val = yield* $.Evaluation(n);
  if (IsAbrupt(val)) return val;
  if (val instanceof BindingReference && 'Global' in val.Resolution &&
      !$.getRealm().GlobalBindings.has(val.Resolution.Global)) {
    return 'undefined';
  }
  const value = IsReference(val) ? GetValue($, val) : val;
  if (IsAbrupt(value)) return value;
  if (value === null) return 'object';
  return TypeOf(EMPTY.is(value) ? undefined : value);
}

/**
 * 13.5.4 Unary + Operator
 *
 * UnaryExpression : + UnaryExpression
 * 1. Let expr be ? Evaluation of UnaryExpression.
 * 2. Return ? ToNumber(? GetValue(expr)).
 */
export function* EvaluateUnaryPlus($: VM, n: Expression): ECR<number> {
  const value = yield* $.evaluateValue(n);
  if (IsAbrupt(value)) return value;
  return ToNumber($, value);
}

/**
 * 13.5.5 Unary - Operator
 *
 * UnaryExpression : - UnaryExpression
 * 1. Let expr be ? Evaluation of UnaryExpression.
 * 2. Let oldValue be ? ToNumeric(? GetValue(expr)).
 * 3. If oldValue is a Number, then
 *     a. Return Number::unaryMinus(oldValue).
 * 4. Else,
 *     a. Assert: oldValue is a BigInt.
 *     b. Return BigInt::unaryMinus(oldValue).
 */
export function* EvaluateUnaryMinus($: VM, n: Expression): ECR<bigint|number> {
  const value = yield* $.evaluateValue(n);
  if (IsAbrupt(value)) return value;
  const oldValue = ToNumeric(value);
  return -oldValue;
}

/**
 * 13.5.7 Logical NOT Operator ( ! )
 *
 * UnaryExpression : ! UnaryExpression
 * 1. Let expr be ? Evaluation of UnaryExpression.
 * 2. Let oldValue be ToBoolean(? GetValue(expr)).
 * 3. If oldValue is true, return false.
 * 4. Return true.
 */
export function* EvaluateUnaryNot($: VM, n: Expression): ECR<boolean> {
  const value = yield* $.evaluateValue(n);
  if (IsAbrupt(value)) return value;
  return !ToBoolean(value);
}

export function* Evaluate_BinaryExpression($: VM, n: BinaryExpression): ECR<Val> {
  const lval = yield* $.evaluateValue(n.left);
  if (IsAbrupt(lval)) return lval;
  const rval = yield* $.evaluateValue(n.right);
  if (IsAbrupt(rval)) return rval;
  if (STRNUM_OPS.has(n.operator)) {
    return ApplyStringOrNumericBinaryOperator($, lval, n.operator, rval);
  }
  return ApplyComparisonOperator($, lval, n.operator, rval);
}

/**
 * 13.10 Relational Operators
 * 13.11 Equality Operators
 */
export function ApplyComparisonOperator(
  $: VM,
  lval: Val,
  opText: string,
  rval: Val,
): CR<boolean> {
  switch (opText) {
    case '===': return IsStrictlyEqual(lval, rval);
    case '!==': return !IsStrictlyEqual(lval, rval);
    case '==': return IsLooselyEqual(lval, rval);
    case '!=': return !IsLooselyEqual(lval, rval);
    case '<': return IsLessThan(lval, rval) ?? false;
    case '>': return IsLessThan(rval, lval) ?? false;
    case '<=': {
      const r = IsLessThan(rval, lval);
      return r === undefined ? false : !r;
    }
    case '>=': {
      const r = IsLessThan(lval, rval);
      return r === undefined ? false : !r;
    }
    case 'in': {
      if (!(rval instanceof Obj)) {
        return $.throw('TypeError', `Cannot use 'in' operator to search for '${
                     DebugString(lval)}' in ${DebugString(rval)}`);
      }
      const propertyKey = ToString($, lval);
      if (IsAbrupt(propertyKey)) return propertyKey;
      return rval.HasProperty(propertyKey);
    }
  }
  throw new Error(`Unexpected comparison operator ${opText}`);
}

/**
 * 7.2.13 IsLessThan ( x, y, LeftFirst )
 *
 * Returns undefined when either operand converts to NaN.  Conversions
 * have no side effects here, so LeftFirst is not needed.
 */
export function IsLessThan(x: Val, y: Val): boolean|undefined {
  const px = ToPrimitive(x);
  const py = ToPrimitive(y);
  if (typeof px === 'string' && typeof py === 'string') return px < py;
  const nx = ToNumeric(px);
  const ny = ToNumeric(py);
  if (typeof nx === 'number' && Number.isNaN(nx)) return undefined;
  if (typeof ny === 'number' && Number.isNaN(ny)) return undefined;
  return nx < ny;
}

/**
 * 13.15.3 ApplyStringOrNumericBinaryOperator ( lval, opText, rval )
 *
 * 1. If opText is +, then
 *     a. Let lprim be ? ToPrimitive(lval).
 *     b. Let rprim be ? ToPrimitive(rval).
 *     c. If lprim is a String or rprim is a String, then
 *         i. Let lstr be ? ToString(lprim).
 *         ii. Let rstr be ? ToString(rprim).
 *         iii. Return the string-concatenation of lstr and rstr.
 *     d. Set lval to lprim.
 *     e. Set rval to rprim.
 * 2. NOTE: At this point, it must be a numeric operation.
 * 3. Let lnum be ? ToNumeric(lval).
 * 4. Let rnum be ? ToNumeric(rval).
 * 5. If Type(lnum) is not Type(rnum), throw a TypeError exception.
 * 6. If lnum is a BigInt, then
 *     a. If opText is **, return ? BigInt::exponentiate(lnum, rnum).
 *     b. If opText is /, return ? BigInt::divide(lnum, rnum).
 *     c. If opText is %, return ? BigInt::remainder(lnum, rnum).
 *     d. If opText is >>>, return ? BigInt::unsignedRightShift(lnum, rnum).
 * 7. Let operation be the abstract operation associated with opText
 *    and Type(lnum)
 * 8. Return operation(lnum, rnum).
 */
export function ApplyStringOrNumericBinaryOperator(
  $: VM,
  lval: Val,
  opText: string,
  rval: Val,
): CR<Val> {
  if (opText === '+') {
    const lprim = ToPrimitive(lval);
    const rprim = ToPrimitive(rval);
    if (typeof lprim === 'string' || typeof rprim === 'string') {
      return String(lprim) + String(rprim);
    }
    lval = lprim;
    rval = rprim;
  }
  const lnum = ToNumeric(lval);
  const rnum = ToNumeric(rval);
  if (typeof lnum === 'number' && typeof rnum === 'number') {
    return NumberOperation(lnum, opText, rnum);
  }
  if (typeof lnum === 'bigint' && typeof rnum === 'bigint') {
    return BigIntOperation($, lnum, opText, rnum);
  }
  return $.throw('TypeError', 'Cannot mix BigInt and other types, use explicit conversions');
}

/** 6.1.6.1 The Number Type */
function NumberOperation(l: number, opText: string, r: number): number {
  switch (opText) {
    case '+': return l + r;
    case '-': return l - r;
    case '*': return l * r;
    case '**': return l ** r;
    case '/': return l / r;
    case '%': return l % r;
    case '<<': return l << r;
    case '>>': return l >> r;
    case '>>>': return l >>> r;
    case '&': return l & r;
    case '^': return l ^ r;
    case '|': return l | r;
  }
  throw new Error(`Unexpected operator ${opText}`);
}

/** 6.1.6.2 The BigInt Type */
function BigIntOperation($: VM, l: bigint, opText: string, r: bigint): CR<bigint> {
  switch (opText) {
    case '+': return l + r;
    case '-': return l - r;
    case '*': return l * r;
    case '**':
      if (r < 0n) return $.throw('RangeError', 'Exponent must be non-negative');
      return l ** r;
    case '/':
      if (r === 0n) return $.throw('RangeError', 'Division by zero');
      return l / r;
    case '%':
      if (r === 0n) return $.throw('RangeError', 'Division by zero');
      return l % r;
    case '<<': return l << r;
    case '>>': return l >> r;
    case '>>>':
      return $.throw('TypeError', 'BigInts have no unsigned right shift, use >> instead');
    case '&': return l & r;
    case '^': return l ^ r;
    case '|': return l | r;
  }
  throw new Error(`Unexpected operator ${opText}`);
}
