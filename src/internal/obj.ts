import type { PropertyKey, Val } from './val';

/**
 * 6.1.7 The Object Type
 *
 * An Object is logically a collection of properties.  Only data
 * properties are modelled: every property is writable, enumerable and
 * configurable, which is all that iterator results, error objects and
 * the builtin namespaces need.
 */
export class Obj {
  readonly OwnProps = new Map<PropertyKey, Val>();

  constructor(
    public Prototype: Obj|null = null,
    /** Name used by DebugString; not observable from scripts. */
    public InternalName = '',
  ) {}

  /** 10.1.8 [[Get]], restricted to data properties. */
  Get(key: PropertyKey): Val {
    for (let o: Obj|null = this; o; o = o.Prototype) {
      if (o.OwnProps.has(key)) return o.OwnProps.get(key);
    }
    return undefined;
  }

  /** 10.1.9 [[Set]], restricted to data properties on the receiver. */
  Set(key: PropertyKey, value: Val): void {
    this.OwnProps.set(key, value);
  }

  HasProperty(key: PropertyKey): boolean {
    for (let o: Obj|null = this; o; o = o.Prototype) {
      if (o.OwnProps.has(key)) return true;
    }
    return false;
  }
}

/**
 * 10.1.12 OrdinaryObjectCreate ( proto [ , additionalInternalSlotsList ] )
 */
export function OrdinaryObjectCreate(
  Prototype: Obj|null,
  props: Record<PropertyKey, Val> = {},
): Obj {
  const obj = new Obj(Prototype);
  for (const [key, value] of Object.entries(props)) {
    obj.OwnProps.set(key, value);
  }
  return obj;
}

/**
 * 7.4.11 CreateIterResultObject ( value, done )
 *
 * 1. Let obj be OrdinaryObjectCreate(%Object.prototype%).
 * 2. Perform ! CreateDataPropertyOrThrow(obj, "value", value).
 * 3. Perform ! CreateDataPropertyOrThrow(obj, "done", done).
 * 4. Return obj.
 */
export function CreateIterResultObject(
  objectPrototype: Obj|null,
  value: Val,
  done: boolean,
): Obj {
  return OrdinaryObjectCreate(objectPrototype, {value, done});
}
