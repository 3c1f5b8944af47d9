import { CR } from './completion_record';
import { UNINITIALIZED, UNUSED } from './enums';
import { Obj } from './obj';
import type { Resolution } from './static/scope';
import { PropertyKey, Val } from './val';
import type { VM } from './vm';

/**
 * 6.2.5 The Reference Record Specification Type
 *
 * The Reference Record type is used to explain the behaviour of such
 * operators as delete, typeof, the assignment operators, the super
 * keyword and other language features. For example, the left-hand
 * operand of an assignment is expected to produce a Reference Record.
 *
 * Identifier references are resolved ahead of time, so a binding
 * reference points straight at a slot of the running context or at a
 * global name rather than at an environment record.
 */
export class BindingReference {
  constructor(
    readonly ReferencedName: string,
    readonly Resolution: Resolution,
  ) {}
}

export class PropertyReference {
  constructor(
    readonly Base: Val,
    readonly ReferencedName: PropertyKey,
  ) {}
}

export type ReferenceRecord = BindingReference|PropertyReference;

export function IsReference(v: unknown): v is ReferenceRecord {
  return v instanceof BindingReference || v instanceof PropertyReference;
}

function TDZError($: VM, name: string): CR<never> {
  return $.throw('ReferenceError', `Cannot access '${name}' before initialization`);
}

/**
 * 6.2.5.5 GetValue ( V )
 */
export function GetValue($: VM, V: ReferenceRecord): CR<Val> {
  if (V instanceof PropertyReference) {
    const {Base, ReferencedName} = V;
    if (Base instanceof Obj) return Base.Get(ReferencedName);
    if (Base == null) {
      return $.throw('TypeError', `Cannot read properties of ${Base} (reading '${ReferencedName}')`);
    }
    if (typeof Base === 'string') {
      if (ReferencedName === 'length') return Base.length;
      if (/^(0|[1-9][0-9]*)$/.test(ReferencedName)) return Base[Number(ReferencedName)];
    }
    return undefined;
  }
  const resolution = V.Resolution;
  if ('Slot' in resolution) {
    const value = $.getRunningContext().Slots[resolution.Slot];
    return UNINITIALIZED.is(value) ? TDZError($, V.ReferencedName) : value;
  }
  const binding = $.getRealm().GlobalBindings.get(resolution.Global);
  if (!binding) return $.throw('ReferenceError', `${resolution.Global} is not defined`);
  return UNINITIALIZED.is(binding.Value) ? TDZError($, V.ReferencedName) : binding.Value;
}

/**
 * 6.2.5.6 PutValue ( V, W )
 *
 * Scripts are always strict: assignment to an undeclared name, to a
 * constant, or to a property of a primitive is an error.
 */
export function PutValue($: VM, V: ReferenceRecord, W: Val): CR<UNUSED> {
  if (V instanceof PropertyReference) {
    const {Base, ReferencedName} = V;
    if (Base instanceof Obj) {
      Base.Set(ReferencedName, W);
      return UNUSED;
    }
    if (Base == null) {
      return $.throw('TypeError', `Cannot set properties of ${Base} (setting '${ReferencedName}')`);
    }
    return $.throw('TypeError', `Cannot create property '${ReferencedName}' on ${typeof Base}`);
  }
  const resolution = V.Resolution;
  if ('Slot' in resolution) {
    const context = $.getRunningContext();
    if (UNINITIALIZED.is(context.Slots[resolution.Slot])) return TDZError($, V.ReferencedName);
    if (context.Layout.Slots[resolution.Slot].Kind === 'const') {
      return $.throw('TypeError', 'Assignment to constant variable.');
    }
    context.Slots[resolution.Slot] = W;
    return UNUSED;
  }
  const binding = $.getRealm().GlobalBindings.get(resolution.Global);
  if (!binding) return $.throw('ReferenceError', `${resolution.Global} is not defined`);
  if (UNINITIALIZED.is(binding.Value)) return TDZError($, V.ReferencedName);
  if (!binding.Mutable) return $.throw('TypeError', 'Assignment to constant variable.');
  binding.Value = W;
  return UNUSED;
}

/**
 * 9.1.1.1.4 InitializeBinding ( N, V ), for a reference produced by
 * a declaration.  Constants and TDZ checks do not apply.
 */
export function InitializeReferencedBinding($: VM, V: BindingReference, W: Val): UNUSED {
  const resolution = V.Resolution;
  if ('Slot' in resolution) {
    $.getRunningContext().Slots[resolution.Slot] = W;
    return UNUSED;
  }
  const binding = $.getRealm().GlobalBindings.get(resolution.Global);
  if (binding) binding.Value = W;
  return UNUSED;
}
