import { Obj } from './obj';
import type { LazyProp, RealmRecord } from './realm_record';
import { Val } from './val';
import type { ECR, VM } from './vm';

export type FunctionBehavior =
  ($: VM, thisArgument: Val, argumentsList: Val[]) => ECR<Val>;
export type ConstructBehavior = ($: VM, argumentsList: Val[]) => ECR<Obj>;

/**
 * 10.2 Function Objects, reduced to what builtins and async
 * generator functions need: a behavior to run on [[Call]], an
 * optional [[Construct]], and the realm the function was created in.
 */
export class Func extends Obj {
  constructor(
    Prototype: Obj|null,
    readonly Realm: RealmRecord,
    readonly Behavior: FunctionBehavior,
    readonly InitialName: string,
    length: number,
    readonly ConstructBehavior: ConstructBehavior|null = null,
  ) {
    super(Prototype, InitialName);
    this.OwnProps.set('name', InitialName);
    this.OwnProps.set('length', length);
  }
}

export function IsCallable(v: Val): v is Func {
  return v instanceof Func;
}

/**
 * 10.3.4 CreateBuiltinFunction ( behaviour, length, name, additionalInternalSlotsList [ , realm [ , prototype [ , prefix ] ] ] )
 */
export function CreateBuiltinFunction(
  realm: RealmRecord,
  behavior: FunctionBehavior,
  length: number,
  name: string,
  construct: ConstructBehavior|null = null,
): Func {
  return new Func(realm.getIntrinsic('%Function.prototype%'), realm, behavior, name, length, construct);
}

/**
 * Defines a builtin method.  For use with `defineProperties`, which
 * fills in the realm and the property name.
 */
export function method(
  fn: ($: VM, thisValue: Val, ...params: Val[]) => ECR<Val>,
  length = fn.length - 2,
  specifiedName?: string,
): LazyProp {
  return (realm, name) => CreateBuiltinFunction(
    realm, ($, thisArg, argumentsList) => fn($, thisArg, ...argumentsList),
    Math.max(length, 0), specifiedName ?? name);
}

/**
 * 7.3.14 Call ( F, V [ , argumentsList ] )
 *
 * 1. If argumentsList is not present, set argumentsList to a new empty List.
 * 2. If IsCallable(F) is false, throw a TypeError exception.
 * 3. Return ? F.[[Call]](V, argumentsList).
 */
export function* Call($: VM, F: Val, V: Val, argumentsList: Val[] = []): ECR<Val> {
  if (!IsCallable(F)) return $.throw('TypeError', `${DescribeCallee(F)} is not a function`);
  return yield* F.Behavior($, V, argumentsList);
}

/**
 * 7.3.15 Construct ( F [ , argumentsList [ , newTarget ] ] )
 */
export function* Construct($: VM, F: Val, argumentsList: Val[] = []): ECR<Obj> {
  if (!IsCallable(F) || !F.ConstructBehavior) {
    return $.throw('TypeError', `${DescribeCallee(F)} is not a constructor`);
  }
  return yield* F.ConstructBehavior($, argumentsList);
}

function DescribeCallee(v: Val): string {
  if (v instanceof Obj) return v.InternalName || 'object';
  return typeof v === 'string' ? JSON.stringify(v) : String(v);
}
