import { method } from './func';
import { Obj } from './obj';
import { defineGlobals, defineProperties } from './realm_record';
import { DebugString, Plugin } from './vm';

export const consoleObject: Plugin = {
  id: 'consoleObject',
  realm: {
    CreateIntrinsics(realm) {
      const ns = new Obj(realm.getIntrinsic('%Object.prototype%'), 'console');
      defineGlobals(realm, {'console': ns});

      defineProperties(realm, ns, {
        'log': method(function*(_$, _, ...args) {
          const passThroughArgs = args.map((arg) => {
            if (arg instanceof Obj) {
              return DebugString(arg, 1);
            } else {
              return arg;
            }
          });
          console.log(...passThroughArgs);
          return undefined;
        }, 0),
      });
    },
  },
};
