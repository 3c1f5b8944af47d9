import type { Func } from './func';
import type { RealmRecord } from './realm_record';
import type { ScopeLayout } from './static/scope';
import type { SlotValue, SuspensionFrame } from './suspension_frame';
import type { Node } from './tree';

/**
 * 9.4 Execution Contexts
 *
 * An execution context is a specification device that is used to
 * track the runtime evaluation of code by an ECMAScript
 * implementation. At any point in time, there is at most one
 * execution context per agent that is actually executing code. This
 * is known as the agent's running execution context.
 *
 * The value of the Realm component of the running execution context
 * is also called the current Realm Record. The value of the Function
 * component of the running execution context is also called the
 * active function object.
 *
 * Code contexts carry the slot arena their identifiers resolve into.
 * A generator body's context additionally carries its suspension
 * frame, and is popped off the stack for as long as the body is
 * suspended.
 */
export class ExecutionContext {
  /** Node most recently evaluated, for stack traces. */
  currentNode: Node|undefined = undefined;

  constructor(
    readonly Realm: RealmRecord,
    readonly Layout: ScopeLayout,
    readonly Slots: SlotValue[],
    readonly Function: Func|null,
    readonly Frame: SuspensionFrame|null,
  ) {}
}
