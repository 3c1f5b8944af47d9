import { Assert } from './assert';
import { Obj } from './obj';
import type { SlotValue } from './suspension_frame';
import type { Val } from './val';
import type { VM } from './vm';

/**
 * A single global binding.  Lexical bindings start out uninitialized
 * and may not be redeclared by a later script.
 */
export interface GlobalBinding {
  Value: SlotValue;
  readonly Mutable: boolean;
  readonly Lexical: boolean;
}

/**
 * 9.3 Realms
 *
 * Before it is evaluated, all ECMAScript code must be associated with
 * a realm. Conceptually, a realm consists of a set of intrinsic
 * objects, an ECMAScript global environment, all of the ECMAScript
 * code that is loaded within the scope of that global environment,
 * and other associated state and resources.
 *
 * The global environment is reduced to a flat table of bindings:
 * there is no global object.
 */
export class RealmRecord {
  /**
   * The intrinsic values used by code associated with this realm,
   * keyed by their %Name%.
   */
  readonly Intrinsics = new Map<string, Obj>();

  readonly GlobalBindings = new Map<string, GlobalBinding>();

  getIntrinsic(name: string): Obj {
    const intrinsic = this.Intrinsics.get(name);
    Assert(intrinsic, `No intrinsic: ${name}`);
    return intrinsic;
  }
}

export interface RealmAdvice {
  /**
   * Called once per realm, in plugin installation order, so a
   * plugin may rely on the intrinsics of its dependencies.
   */
  CreateIntrinsics?(realm: RealmRecord, $: VM): void;
}

/**
 * 9.6 InitializeHostDefinedRealm ( )
 *
 * Creates %Object.prototype% and %Function.prototype%, which every
 * other intrinsic hangs off, then lets each installed plugin populate
 * the realm.
 */
export function InitializeHostDefinedRealm($: VM, realm: RealmRecord): void {
  const objectPrototype = new Obj(null, '%Object.prototype%');
  realm.Intrinsics.set('%Object.prototype%', objectPrototype);
  realm.Intrinsics.set('%Function.prototype%', new Obj(objectPrototype, '%Function.prototype%'));

  defineGlobal(realm, 'undefined', undefined, false);
  defineGlobal(realm, 'NaN', NaN, false);
  defineGlobal(realm, 'Infinity', Infinity, false);

  for (const plugin of $.plugins.values()) {
    plugin.realm?.CreateIntrinsics?.(realm, $);
  }
}

export function defineGlobal(realm: RealmRecord, name: string, value: Val, mutable = true): void {
  realm.GlobalBindings.set(name, {Value: value, Mutable: mutable, Lexical: false});
}

/** A property value built once the realm it belongs to is known. */
export type LazyProp = (realm: RealmRecord, name: string) => Val;

export function defineProperties(
  realm: RealmRecord,
  obj: Obj,
  props: Record<string, Val|LazyProp>,
): void {
  for (const [key, value] of Object.entries(props)) {
    obj.OwnProps.set(key, typeof value === 'function' ? value(realm, key) : value);
  }
}

export function defineGlobals(realm: RealmRecord, props: Record<string, Val|LazyProp>): void {
  for (const [name, value] of Object.entries(props)) {
    defineGlobal(realm, name, typeof value === 'function' ? value(realm, name) : value);
  }
}
