/**
 * @fileoverview
 * 6.2.1 The Enum Specification Type
 *
 * Enums are values which are internal to the specification and not
 * directly observable from ECMAScript code. Enums have no
 * characteristics other than their name.
 */

class EnumSym<const S extends string> {
  constructor(readonly Symbol: S) {}
  is<T>(this: T, arg: unknown): arg is T {
    return arg === this;
  }
  toString(): string {
    return this.Symbol;
  }
}

export const UNUSED: UNUSED = new EnumSym('unused');
export interface UNUSED extends EnumSym<'unused'> {}

export const EMPTY: EMPTY = new EnumSym('empty');
export interface EMPTY extends EnumSym<'empty'> {}

// Indicates that a syntax operation implementation is not applicable
export const NOT_APPLICABLE: NOT_APPLICABLE = new EnumSym('not applicable');
export interface NOT_APPLICABLE extends EnumSym<'not applicable'> {}

// Value of a lexical slot or global binding between scope entry and
// its declaration being evaluated (the "temporal dead zone").
export const UNINITIALIZED: UNINITIALIZED = new EnumSym('uninitialized');
export interface UNINITIALIZED extends EnumSym<'uninitialized'> {}
