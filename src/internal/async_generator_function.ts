import * as ESTree from 'estree';
import { Assert } from './assert';
import { AsyncGen } from './async_generator';
import { CR, CompletionType, IsAbrupt, ReturnCompletion } from './completion_record';
import { EMPTY, UNINITIALIZED } from './enums';
import { ExecutionContext } from './execution_context';
import { Func, method } from './func';
import { Obj } from './obj';
import { PromiseCapability, promises } from './promise';
import { RealmRecord, defineProperties } from './realm_record';
import { GetLayout } from './static/scope';
import { BodyCoroutine, SlotValue, SuspendBody, SuspensionFrame } from './suspension_frame';
import { Val } from './val';
import { AwaitSignal, ECR, Plugin, VM, YieldSignal, just } from './vm';

/**
 * 27.6 AsyncGenerator Objects
 *
 * An AsyncGenerator is an instance of an async generator function.
 * Its internal state lives in the AsyncGen it wraps; this object is
 * what scripts hold and call next, return and throw on.
 */
export class AsyncGeneratorInstance extends Obj {
  constructor(
    Prototype: Obj|null,
    readonly Generator: AsyncGen<PromiseCapability>,
  ) {
    super(Prototype, 'AsyncGenerator');
  }
}

export const asyncGenerators: Plugin = {
  id: 'asyncGenerators',
  deps: () => [promises],
  syntax: {
    InstantiateFunctionObject(on) {
      on('FunctionDeclaration', InstantiateAsyncGeneratorFunctionObject);
    },
    Evaluation(on) {
      on('FunctionExpression',
         ($, n) => just(InstantiateAsyncGeneratorFunctionObject($, n, $.getRealm())));
      on('YieldExpression', Evaluation_YieldExpression);
      on('AwaitExpression', function*($, n) {
        // 15.8.5 Runtime Semantics: Evaluation
        //
        // AwaitExpression : await UnaryExpression
        // 1. Let exprRef be ? Evaluation of UnaryExpression.
        // 2. Let value be ? GetValue(exprRef).
        // 3. Return ? Await(value).
        const value = yield* $.evaluateValue(n.argument);
        if (IsAbrupt(value)) return value;
        return yield* Await($, value);
      });
    },
  },
  realm: {CreateIntrinsics},
};

/**
 * 27.4.3 Properties of the AsyncGeneratorFunction Prototype Object
 * 27.6.1 The %AsyncGeneratorFunction.prototype.prototype% Object
 */
function CreateIntrinsics(realm: RealmRecord) {
  const asyncGeneratorFunctionPrototype = new Obj(
    realm.getIntrinsic('%Function.prototype%'), '%AsyncGeneratorFunction.prototype%');
  realm.Intrinsics.set('%AsyncGeneratorFunction.prototype%', asyncGeneratorFunctionPrototype);

  const asyncGeneratorPrototype = new Obj(
    realm.getIntrinsic('%Object.prototype%'), '%AsyncGeneratorFunction.prototype.prototype%');
  realm.Intrinsics.set('%AsyncGeneratorFunction.prototype.prototype%', asyncGeneratorPrototype);
  asyncGeneratorFunctionPrototype.OwnProps.set('prototype', asyncGeneratorPrototype);

  defineProperties(realm, asyncGeneratorPrototype, {
    /** 27.6.1.2 AsyncGenerator.prototype.next ( value ) */
    'next': method(function*($, thisValue, value) {
      return AsyncGeneratorRequest($, thisValue, 'next', (g) => g.next(value));
    }, 1),
    /** 27.6.1.3 AsyncGenerator.prototype.return ( value ) */
    'return': method(function*($, thisValue, value) {
      return AsyncGeneratorRequest($, thisValue, 'return', (g) => g.return(value));
    }, 1),
    /** 27.6.1.4 AsyncGenerator.prototype.throw ( exception ) */
    'throw': method(function*($, thisValue, exception) {
      return AsyncGeneratorRequest($, thisValue, 'throw', (g) => g.throw(exception));
    }, 1),
  });
}

/**
 * 27.6.3.3 AsyncGeneratorValidate ( generator, generatorBrand )
 *
 * 1. Perform ? RequireInternalSlot(generator, [[AsyncGeneratorContext]]).
 * ...
 *
 * An incompatible receiver is not thrown synchronously: per
 * IfAbruptRejectPromise the caller gets a rejected promise instead.
 */
function AsyncGeneratorRequest(
  $: VM,
  generator: Val,
  name: string,
  request: (g: AsyncGen<PromiseCapability>) => PromiseCapability,
): Val {
  if (!(generator instanceof AsyncGeneratorInstance)) {
    const capability = $.generatorHost($.getRealm()).promises.createDeferred();
    capability.Reject($.makeError(
      'TypeError', `AsyncGenerator.prototype.${name} called on incompatible receiver`));
    return capability.Promise;
  }
  return request(generator.Generator).Promise;
}

/**
 * 15.6.3 Runtime Semantics: InstantiateAsyncGeneratorFunctionObject
 *
 * AsyncGeneratorDeclaration :
 *   async function * BindingIdentifier ( FormalParameters ) { AsyncGeneratorBody }
 * 1. Let name be StringValue of BindingIdentifier.
 * 2. Let sourceText be the source text matched by AsyncGeneratorDeclaration.
 * 3. Let F be OrdinaryFunctionCreate(%AsyncGeneratorFunction.prototype%,
 *    sourceText, FormalParameters, AsyncGeneratorBody, non-lexical-this, env, privateEnv).
 * 4. Perform SetFunctionName(F, name).
 * 5. Let prototype be OrdinaryObjectCreate(%AsyncGeneratorFunction.prototype.prototype%).
 * 6. Perform ! DefinePropertyOrThrow(F, "prototype", ...).
 * 7. Return F.
 *
 * Function expressions are instantiated the same way, in the realm of
 * the running context.  A named expression binds its own name in the
 * self slot its layout reserves.
 */
export function InstantiateAsyncGeneratorFunctionObject(
  _$: VM,
  node: ESTree.FunctionDeclaration|ESTree.FunctionExpression,
  realm: RealmRecord,
): Func {
  const name = node.id?.name ?? '';
  const F: Func = new Func(
    realm.getIntrinsic('%AsyncGeneratorFunction.prototype%'),
    realm,
    ($, _thisArgument, argumentsList) => EvaluateAsyncGeneratorBody($, F, node, argumentsList),
    name,
    ExpectedArgumentCount(node.params));
  const prototype = new Obj(realm.getIntrinsic('%AsyncGeneratorFunction.prototype.prototype%'));
  F.OwnProps.set('prototype', prototype);
  return F;
}

/** 15.1.5 Static Semantics: ExpectedArgumentCount */
function ExpectedArgumentCount(params: ESTree.Pattern[]): number {
  let count = 0;
  for (const param of params) {
    if (param.type !== 'Identifier') break;
    count++;
  }
  return count;
}

/**
 * 15.6.2 Runtime Semantics: EvaluateAsyncGeneratorBody
 *
 * AsyncGeneratorBody : FunctionBody
 * 1. Perform ? FunctionDeclarationInstantiation(functionObject, argumentsList).
 * 2. Let generator be ? OrdinaryCreateFromConstructor(functionObject,
 *    "%AsyncGeneratorFunction.prototype.prototype%", « ... »).
 * 3. Set generator.[[AsyncGeneratorState]] to suspendedStart.
 * 4. Perform AsyncGeneratorStart(generator, FunctionBody).
 * 5. Return Completion Record { [[Type]]: return, [[Value]]:
 *    generator, [[Target]]: empty }.
 *
 * FunctionDeclarationInstantiation fills a fresh slot arena: var
 * slots and parameters start as undefined, lexical slots in their
 * temporal dead zone.
 */
function* EvaluateAsyncGeneratorBody(
  $: VM,
  F: Func,
  node: ESTree.FunctionDeclaration|ESTree.FunctionExpression,
  argumentsList: Val[],
): ECR<Val> {
  const layout = GetLayout(node);
  const slots = layout.Slots.map(({Kind}): SlotValue =>
    Kind === 'var' || Kind === 'param' ? undefined : UNINITIALIZED);
  layout.Params.forEach((slot, i) => {
    slots[slot] = argumentsList[i];
  });
  if (layout.SelfSlot !== undefined) slots[layout.SelfSlot] = F;

  const proto = F.Get('prototype');
  const prototype = proto instanceof Obj ?
    proto : F.Realm.getIntrinsic('%AsyncGeneratorFunction.prototype.prototype%');
  const generator = new AsyncGen<PromiseCapability>(
    $.generatorHost(F.Realm),
    slots,
    (frame) => AsyncGeneratorBody($, F, node, frame),
    F.InitialName);
  return new AsyncGeneratorInstance(prototype, generator);
}

/**
 * 27.6.3.2 AsyncGeneratorStart ( generator, generatorBody ), steps
 * 4.a-4.j: the closure that runs the body in its own execution
 * context.  A normal completion of the statement list returns
 * undefined; a return completion carries the returned value.
 */
function* AsyncGeneratorBody(
  $: VM,
  F: Func,
  node: ESTree.FunctionDeclaration|ESTree.FunctionExpression,
  frame: SuspensionFrame,
): BodyCoroutine {
  const context = new ExecutionContext(F.Realm, GetLayout(node), frame.Slots, F, frame);
  $.enterContext(context);
  const result = yield* $.Evaluation(node.body);
  $.popContext(context);
  if (IsAbrupt(result)) {
    Assert(result.Type === CompletionType.Return || result.Type === CompletionType.Throw,
           `${result.Type} completion escaped the generator body`);
    return result;
  }
  return undefined;
}

/**
 * Suspends the running generator body.  Its execution context comes
 * off the stack until the executor resumes the frame, and the
 * completion the frame is resumed with is returned.
 */
export function* Suspend($: VM, signal: YieldSignal|AwaitSignal): ECR<Val> {
  const context = $.getRunningContext();
  const frame = context.Frame;
  Assert(frame, `${signal.type} outside of an async generator body`);
  $.popContext(context);
  const completion = yield* SuspendBody(frame, signal);
  $.enterContext(context);
  return completion;
}

/**
 * 27.7.5.3 Await ( value )
 *
 * 1. Let asyncContext be the running execution context.
 * 2. Let promise be ? PromiseResolve(%Promise%, value).
 * ...
 * 9. Remove asyncContext from the execution context stack and restore
 *    the execution context that is at the top of the execution context
 *    stack as the running execution context.
 * ...
 *
 * PromiseResolve and the reactions are registered by the executor's
 * await scheduler once the body has given up control.
 */
export function* Await($: VM, value: Val): ECR<Val> {
  return yield* Suspend($, {type: 'await', await: value});
}

/**
 * 15.5.5 Runtime Semantics: Evaluation
 *
 * YieldExpression : yield AssignmentExpression
 * 1. Let exprRef be ? Evaluation of AssignmentExpression.
 * 2. Let value be ? GetValue(exprRef).
 * 3. If generatorKind is async, return ? AsyncGeneratorYield(? Await(value)).
 */
function* Evaluation_YieldExpression($: VM, n: ESTree.YieldExpression): ECR<Val> {
  let value: CR<Val> = undefined;
  if (n.argument) value = yield* $.evaluateValue(n.argument);
  if (IsAbrupt(value)) return value;
  const awaited = yield* Await($, value);
  if (IsAbrupt(awaited)) return awaited;
  return yield* AsyncGeneratorYield($, awaited);
}

/**
 * 27.6.3.8 AsyncGeneratorYield ( value )
 *
 * Hands the value to the executor, which settles the head request
 * with {value, done: false}.  The body stays suspended here until
 * the next request resumes it.
 */
function* AsyncGeneratorYield($: VM, value: Val): ECR<Val> {
  const resumptionValue = yield* Suspend($, {type: 'yield', yield: value});
  return yield* AsyncGeneratorUnwrapYieldResumption($, resumptionValue);
}

/**
 * 27.6.3.7 AsyncGeneratorUnwrapYieldResumption ( resumptionValue )
 *
 * 1. If resumptionValue is not a return completion, return ? resumptionValue.
 * 2. Let awaited be Completion(Await(resumptionValue.[[Value]])).
 * 3. If awaited is a throw completion, return ? awaited.
 * 4. Assert: awaited is a normal completion.
 * 5. Return Completion Record { [[Type]]: return, [[Value]]:
 *    awaited.[[Value]], [[Target]]: empty }.
 */
function* AsyncGeneratorUnwrapYieldResumption(
  $: VM,
  resumptionValue: CR<Val>,
): ECR<Val> {
  if (!IsAbrupt(resumptionValue) || resumptionValue.Type !== CompletionType.Return) {
    return resumptionValue;
  }
  const returned = resumptionValue.Value;
  Assert(!EMPTY.is(returned));
  const awaited = yield* Await($, returned);
  if (IsAbrupt(awaited)) return awaited;
  return ReturnCompletion(awaited);
}
