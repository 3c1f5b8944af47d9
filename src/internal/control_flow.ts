/** @fileoverview Evaluation for control flow operators. */

import * as ESTree from 'estree';
import { ToBoolean } from './abstract_conversion';
import { Await } from './async_generator_function';
import { Assert } from './assert';
import { BreakCompletion, CR, CompletionType, ContinueCompletion, IsAbrupt, IsThrowCompletion, ReturnCompletion, UpdateEmpty } from './completion_record';
import { EMPTY } from './enums';
import { InitializeReferencedBinding } from './reference_record';
import { BlockDeclarationInstantiation, EvaluateStatement, ResolveBinding } from './syntax';
import { Val } from './val';
import { ECR, Plugin, VM, just } from './vm';

export const controlFlow: Plugin = {
  id: 'controlFlow',
  deps: () => [loops, conditionals, tryStatement],
  syntax: {
    Evaluation(on) {
      on('ReturnStatement', Evaluation_ReturnStatement);
      on('BreakStatement', () => just(BreakCompletion()));
      on('ContinueStatement', () => just(ContinueCompletion()));
    },
  },
};

export const conditionals: Plugin = {
  id: 'conditionals',
  syntax: {
    Evaluation(on) {
      on('IfStatement', Evaluation_IfStatement);
      on('ConditionalExpression', Evaluation_ConditionalExpression);
      on('LogicalExpression', Evaluation_ShortCircuitExpression);
    },
  },
};

export const loops: Plugin = {
  id: 'loops',
  syntax: {
    Evaluation(on) {
      on('DoWhileStatement', DoWhileLoopEvaluation);
      on('WhileStatement', WhileLoopEvaluation);
      on('ForStatement', ForLoopEvaluation);
    },
  },
};

export const tryStatement: Plugin = {
  id: 'tryStatement',
  syntax: {
    Evaluation(on) {
      on('TryStatement', Evaluation_TryStatement);
    },
  },
};

/**
 * 14.6.2 Runtime Semantics: Evaluation
 *
 * IfStatement : if ( Expression ) Statement else Statement
 * 1. Let exprRef be ? Evaluation of Expression.
 * 2. Let exprValue be ToBoolean(? GetValue(exprRef)).
 * 3. If exprValue is true, then
 *     a. Let stmtCompletion be Completion(Evaluation of the first Statement).
 * 4. Else,
 *     a. Let stmtCompletion be Completion(Evaluation of the second Statement).
 * 5. Return ? UpdateEmpty(stmtCompletion, undefined).
 */
export function* Evaluation_IfStatement($: VM, n: ESTree.IfStatement): ECR<Val|EMPTY> {
  const exprValue = yield* $.evaluateValue(n.test);
  if (IsAbrupt(exprValue)) return exprValue;
  const branch = ToBoolean(exprValue) ? n.consequent : n.alternate;
  if (!branch) return undefined;
  const stmtCompletion = yield* EvaluateStatement($, branch);
  return UpdateEmpty<Val>(stmtCompletion, undefined);
}

/**
 * 13.14.1 Runtime Semantics: Evaluation
 *
 * ConditionalExpression : ShortCircuitExpression ? AssignmentExpression : AssignmentExpression
 * 1. Let lref be ? Evaluation of ShortCircuitExpression.
 * 2. Let lval be ToBoolean(? GetValue(lref)).
 * 3. If lval is true, then
 *     a. Let trueRef be ? Evaluation of the first AssignmentExpression.
 *     b. Return ? GetValue(trueRef).
 * 4. Else,
 *     a. Let falseRef be ? Evaluation of the second AssignmentExpression.
 *     b. Return ? GetValue(falseRef).
 */
export function* Evaluation_ConditionalExpression(
  $: VM,
  n: ESTree.ConditionalExpression,
): ECR<Val> {
  const lval = yield* $.evaluateValue(n.test);
  if (IsAbrupt(lval)) return lval;
  return yield* $.evaluateValue(ToBoolean(lval) ? n.consequent : n.alternate);
}

/** 13.13 Binary Logical Operators */
export function* Evaluation_ShortCircuitExpression(
  $: VM,
  n: ESTree.LogicalExpression,
): ECR<Val> {
  const lval = yield* $.evaluateValue(n.left);
  if (IsAbrupt(lval)) return lval;
  if (n.operator === '||' && ToBoolean(lval)) return lval;
  if (n.operator === '&&' && !ToBoolean(lval)) return lval;
  if (n.operator === '??' && lval != null) return lval;
  return yield* $.evaluateValue(n.right);
}

/**
 * 14.10.1 Runtime Semantics: Evaluation
 *
 * ReturnStatement : return Expression ;
 * 1. Let exprRef be ? Evaluation of Expression.
 * 2. Let exprValue be ? GetValue(exprRef).
 * 3. If GetGeneratorKind() is async, set exprValue to ? Await(exprValue).
 * 4. Return Completion Record { [[Type]]: return, [[Value]]:
 *    exprValue, [[Target]]: empty }.
 */
export function* Evaluation_ReturnStatement($: VM, n: ESTree.ReturnStatement): ECR<never> {
  if (!n.argument) return ReturnCompletion(undefined);
  let exprValue = yield* $.evaluateValue(n.argument);
  if (IsAbrupt(exprValue)) return exprValue;
  if ($.getRunningContext().Frame) {
    exprValue = yield* Await($, exprValue);
    if (IsAbrupt(exprValue)) return exprValue;
  }
  return ReturnCompletion(exprValue);
}

/**
 * 14.7.1.1 LoopContinues ( completion, labelSet )
 *
 * 1. If completion.[[Type]] is normal, return true.
 * 2. If completion.[[Type]] is not continue, return false.
 * 3. If completion.[[Target]] is empty, return true.
 * 4. If labelSet contains completion.[[Target]], return true.
 * 5. Return false.
 *
 * Labels are not supported, so the label set is always empty.
 */
function LoopContinues(completion: CR<unknown>): boolean {
  if (!IsAbrupt(completion)) return true;
  if (completion.Type !== CompletionType.Continue) return false;
  return EMPTY.is(completion.Target);
}

/**
 * 14.1.1 Runtime Semantics: LabelledEvaluation
 *
 * BreakableStatement : IterationStatement
 * 1. Let stmtResult be Completion(LoopEvaluation of IterationStatement
 *    with argument labelSet).
 * 2. If stmtResult.[[Type]] is break, then
 *     a. If stmtResult.[[Target]] is empty, then
 *         i. If stmtResult.[[Value]] is empty, set stmtResult to
 *            NormalCompletion(undefined).
 *         ii. Else, set stmtResult to NormalCompletion(stmtResult.[[Value]]).
 * 3. Return ? stmtResult.
 */
function BreakableStatement(completion: CR<Val|EMPTY>): CR<Val|EMPTY> {
  if (IsAbrupt(completion) &&
      completion.Type === CompletionType.Break &&
      EMPTY.is(completion.Target)) {
    return EMPTY.is(completion.Value) ? undefined : completion.Value;
  }
  return completion;
}

/**
 * 14.7.2.2 Runtime Semantics: DoWhileLoopEvaluation
 *
 * DoWhileStatement : do Statement while ( Expression ) ;
 * 1. Let V be undefined.
 * 2. Repeat,
 *     a. Let stmtResult be Completion(Evaluation of Statement).
 *     b. If LoopContinues(stmtResult, labelSet) is false, return ? UpdateEmpty(stmtResult, V).
 *     c. If stmtResult.[[Value]] is not empty, set V to stmtResult.[[Value]].
 *     d. Let exprRef be ? Evaluation of Expression.
 *     e. Let exprValue be ? GetValue(exprRef).
 *     f. If ToBoolean(exprValue) is false, return V.
 */
export function* DoWhileLoopEvaluation($: VM, n: ESTree.DoWhileStatement): ECR<Val|EMPTY> {
  let V: Val = undefined;
  while (true) {
    yield;  // pause before repeating to avoid infinite loops
    const stmtResult = yield* EvaluateStatement($, n.body);
    if (!LoopContinues(stmtResult)) {
      return BreakableStatement(UpdateEmpty<Val>(stmtResult, V));
    }
    V = CompletionValueOr(stmtResult, V);
    const exprValue = yield* $.evaluateValue(n.test);
    if (IsAbrupt(exprValue)) return exprValue;
    if (!ToBoolean(exprValue)) return V;
  }
}

/**
 * 14.7.3.2 Runtime Semantics: WhileLoopEvaluation
 *
 * WhileStatement : while ( Expression ) Statement
 * 1. Let V be undefined.
 * 2. Repeat,
 *     a. Let exprRef be ? Evaluation of Expression.
 *     b. Let exprValue be ? GetValue(exprRef).
 *     c. If ToBoolean(exprValue) is false, return V.
 *     d. Let stmtResult be Completion(Evaluation of Statement).
 *     e. If LoopContinues(stmtResult, labelSet) is false, return ? UpdateEmpty(stmtResult, V).
 *     f. If stmtResult.[[Value]] is not empty, set V to stmtResult.[[Value]].
 */
export function* WhileLoopEvaluation($: VM, n: ESTree.WhileStatement): ECR<Val|EMPTY> {
  let V: Val = undefined;
  while (true) {
    yield;  // pause before repeating to avoid infinite loops
    const exprValue = yield* $.evaluateValue(n.test);
    if (IsAbrupt(exprValue)) return exprValue;
    if (!ToBoolean(exprValue)) return V;
    const stmtResult = yield* EvaluateStatement($, n.body);
    if (!LoopContinues(stmtResult)) {
      return BreakableStatement(UpdateEmpty<Val>(stmtResult, V));
    }
    V = CompletionValueOr(stmtResult, V);
  }
}

/**
 * 14.7.4.2 Runtime Semantics: ForLoopEvaluation
 *
 * Lexical declarations in the head live in slots of their own, which
 * are put back into their temporal dead zone before the head runs.
 * Since no closure can capture them, one binding serves every
 * iteration.
 */
export function* ForLoopEvaluation($: VM, n: ESTree.ForStatement): ECR<Val|EMPTY> {
  BlockDeclarationInstantiation($, n);
  if (n.init) {
    const status = n.init.type === 'VariableDeclaration' ?
      yield* EvaluateStatement($, n.init) :
      yield* $.evaluateValue(n.init);
    if (IsAbrupt(status)) return status;
  }
  return BreakableStatement(yield* ForBodyEvaluation($, n));
}

/**
 * 14.7.4.3 ForBodyEvaluation ( test, increment, stmt, perIterationBindings, labelSet )
 *
 * 1. Let V be undefined.
 * 2. Perform ? CreatePerIterationEnvironment(perIterationBindings).
 * 3. Repeat,
 *     a. If test is not empty, then
 *         i. Let testRef be ? Evaluation of test.
 *         ii. Let testValue be ? GetValue(testRef).
 *         iii. If ToBoolean(testValue) is false, return V.
 *     b. Let result be Completion(Evaluation of stmt).
 *     c. If LoopContinues(result, labelSet) is false, return ? UpdateEmpty(result, V).
 *     d. If result.[[Value]] is not empty, set V to result.[[Value]].
 *     e. Perform ? CreatePerIterationEnvironment(perIterationBindings).
 *     f. If increment is not empty, then
 *         i. Let incRef be ? Evaluation of increment.
 *         ii. Perform ? GetValue(incRef).
 */
function* ForBodyEvaluation($: VM, n: ESTree.ForStatement): ECR<Val|EMPTY> {
  let V: Val = undefined;
  while (true) {
    yield;  // pause before repeating to avoid infinite loops
    if (n.test) {
      const testValue = yield* $.evaluateValue(n.test);
      if (IsAbrupt(testValue)) return testValue;
      if (!ToBoolean(testValue)) return V;
    }
    const result = yield* EvaluateStatement($, n.body);
    if (!LoopContinues(result)) return UpdateEmpty<Val>(result, V);
    V = CompletionValueOr(result, V);
    if (n.update) {
      const status = yield* $.evaluateValue(n.update);
      if (IsAbrupt(status)) return status;
    }
  }
}

function CompletionValueOr(completion: CR<Val|EMPTY>, V: Val): Val {
  const value = IsAbrupt(completion) ? completion.Value : completion;
  return EMPTY.is(value) ? V : value;
}

/**
 * 14.15.2 Runtime Semantics: CatchClauseEvaluation
 *
 * Catch : catch ( CatchParameter ) Block
 * ...
 * 5. Let status be Completion(BindingInitialization of CatchParameter
 *    with arguments thrownValue and catchEnv).
 * ...
 * 7. Let B be Completion(Evaluation of Block).
 * ...
 * 9. Return ? B.
 *
 * Catch : catch Block
 * 1. Return ? Evaluation of Block.
 */
function* CatchClauseEvaluation(
  $: VM,
  n: ESTree.CatchClause,
  thrownValue: Val,
): ECR<Val|EMPTY> {
  if (n.param) {
    Assert(n.param.type === 'Identifier');
    InitializeReferencedBinding($, ResolveBinding($, n.param), thrownValue);
  }
  return yield* EvaluateStatement($, n.body);
}

/**
 * 14.15.3 Runtime Semantics: Evaluation
 *
 * TryStatement : try Block Catch Finally
 * 1. Let B be Completion(Evaluation of Block).
 * 2. If B.[[Type]] is throw, let C be Completion(CatchClauseEvaluation
 *    of Catch with argument B.[[Value]]).
 * 3. Else, let C be B.
 * 4. Let F be Completion(Evaluation of Finally).
 * 5. If F.[[Type]] is normal, set F to C.
 * 6. Return ? UpdateEmpty(F, undefined).
 *
 * A yield or await inside any of the three blocks suspends the body
 * like anywhere else; return() resumes it with a return completion
 * that still runs the finally block.
 */
export function* Evaluation_TryStatement($: VM, n: ESTree.TryStatement): ECR<Val|EMPTY> {
  let C: CR<Val|EMPTY> = yield* EvaluateStatement($, n.block);
  if (IsThrowCompletion(C) && n.handler) {
    C = yield* CatchClauseEvaluation($, n.handler, C.Value);
  }
  if (n.finalizer) {
    const F = yield* EvaluateStatement($, n.finalizer);
    if (IsAbrupt(F)) C = F;
  }
  return UpdateEmpty<Val>(C, undefined);
}
