import { IsAbrupt } from './completion_record';
import { ToString } from './abstract_conversion';
import { CreateBuiltinFunction, method } from './func';
import { Obj } from './obj';
import { RealmRecord, defineGlobal, defineProperties } from './realm_record';
import { Val } from './val';
import { ECR, Plugin, VM } from './vm';

/**
 * 20.5 Error Objects
 *
 * Instances of Error objects are thrown as exceptions when runtime
 * errors occur. The Error objects may also serve as base objects for
 * user-defined exception classes.
 */
export class ErrorObject extends Obj {
  /** Rendered `Name: message` plus stack frames. */
  ErrorData = '';
}

export const NATIVE_ERRORS = ['TypeError', 'RangeError', 'ReferenceError', 'SyntaxError'] as const;
export type ErrorName = 'Error'|typeof NATIVE_ERRORS[number];

export const errorObject: Plugin = {
  id: 'errorObject',
  realm: {CreateIntrinsics},
};

function CreateIntrinsics(realm: RealmRecord): void {
  const errorPrototype = makePrototype(realm, 'Error', realm.getIntrinsic('%Object.prototype%'));
  defineProperties(realm, errorPrototype, {
    'toString': method(ErrorPrototypeToString),
  });
  for (const name of NATIVE_ERRORS) {
    makePrototype(realm, name, errorPrototype);
  }
}

function makePrototype(realm: RealmRecord, name: ErrorName, parent: Obj): Obj {
  const prototype = new Obj(parent, `%${name}.prototype%`);
  prototype.OwnProps.set('name', name);
  prototype.OwnProps.set('message', '');
  realm.Intrinsics.set(`%${name}.prototype%`, prototype);

  /**
   * 20.5.1.1 Error ( message [ , options ] ) and
   * 20.5.6.1.1 NativeError ( message [ , options ] )
   *
   * Calling as a function and constructing behave the same.
   */
  function* construct($: VM, [message]: Val[]): ECR<Obj> {
    const O = new ErrorObject(prototype, name);
    if (message !== undefined) {
      const msg = ToString($, message);
      if (IsAbrupt(msg)) return msg;
      O.OwnProps.set('message', msg);
    }
    $.captureStackTrace(O);
    return O;
  }
  const ctor = CreateBuiltinFunction(realm, ($, _thisArg, args) => construct($, args), 1, name, construct);
  ctor.OwnProps.set('prototype', prototype);
  prototype.OwnProps.set('constructor', ctor);
  realm.Intrinsics.set(`%${name}%`, ctor);
  defineGlobal(realm, name, ctor);
  return prototype;
}

/**
 * 20.5.3.4 Error.prototype.toString ( )
 */
function* ErrorPrototypeToString($: VM, O: Val): ECR<Val> {
  if (!(O instanceof Obj)) {
    return $.throw('TypeError', 'Error.prototype.toString called on non-object');
  }
  const name = O.Get('name');
  const msg = O.Get('message');
  const nameStr = name === undefined ? 'Error' : ToString($, name);
  if (IsAbrupt(nameStr)) return nameStr;
  const msgStr = msg === undefined ? '' : ToString($, msg);
  if (IsAbrupt(msgStr)) return msgStr;
  if (!nameStr) return msgStr;
  if (!msgStr) return nameStr;
  return `${nameStr}: ${msgStr}`;
}

/** Creates an error object for a runtime error raised by the interpreter. */
export function MakeError($: VM, realm: RealmRecord, name: ErrorName, message: string): ErrorObject {
  const O = new ErrorObject(realm.getIntrinsic(`%${name}.prototype%`), name);
  O.OwnProps.set('message', message);
  $.captureStackTrace(O);
  return O;
}
