import { syntax } from './internal/syntax';
import { arithmetic } from './internal/arithmetic';
import { errorObject } from './internal/error_object';
import { consoleObject } from './internal/console';
import { conditionals, controlFlow, loops, tryStatement } from './internal/control_flow';
import { Plugin } from './internal/vm';
import { promises } from './internal/promise';
import { asyncGenerators } from './internal/async_generator_function';

export const full: Plugin = {
  id: 'full',
  deps: () => [
    syntax,
    arithmetic,
    errorObject,
    consoleObject,
    controlFlow,
    promises,
    asyncGenerators,
  ],
};

export {
  syntax,
  arithmetic,
  errorObject,
  consoleObject,
  controlFlow,
  conditionals,
  loops,
  tryStatement,
  promises,
  asyncGenerators,
};
