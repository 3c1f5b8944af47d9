import * as ESTree from 'estree';
import { ToString } from './abstract_conversion';
import { ApplyStringOrNumericBinaryOperator } from './arithmetic';
import { Assert } from './assert';
import { CR, IsAbrupt, ThrowCompletion, UpdateEmpty } from './completion_record';
import { EMPTY, NOT_APPLICABLE, UNINITIALIZED, UNUSED } from './enums';
import { Call, Construct, IsCallable } from './func';
import { Obj } from './obj';
import { BindingReference, GetValue, InitializeReferencedBinding, IsReference, PropertyReference, PutValue, ReferenceRecord } from './reference_record';
import { GetLayout } from './static/scope';
import { Node } from './tree';
import { Val } from './val';
import { ECR, Plugin, VM, just } from './vm';

export const syntax: Plugin = {
  id: 'syntax',

  syntax: {
    Evaluation(on) {
      on('Program', Evaluation_Script);
      on('ExpressionStatement', ($, n) => $.evaluateValue(n.expression));
      on(['EmptyStatement', 'FunctionDeclaration'], () => just(EMPTY));
      // Primary elements
      on('Literal', (_$, n) => {
        if (n.value instanceof RegExp) return NOT_APPLICABLE;
        return just(n.value);
      });
      on('Identifier', ($, n) => just(ResolveBinding($, n)));
      on('ObjectExpression', Evaluation_ObjectExpression);
      on('MemberExpression', Evaluation_MemberExpression);
      on('BlockStatement', Evaluation_BlockStatement);
      on('VariableDeclaration', Evaluation_VariableDeclaration);
      on('AssignmentExpression', Evaluation_AssignmentExpression);
      on('ThrowStatement', function*($, n) {
        // 14.14.1 Runtime Semantics: Evaluation
        //
        // ThrowStatement : throw Expression ;
        // 1. Let exprRef be ? Evaluation of Expression.
        // 2. Let exprValue be ? GetValue(exprRef).
        // 3. Return ThrowCompletion(exprValue).
        const exprValue = yield* $.evaluateValue(n.argument);
        if (IsAbrupt(exprValue)) return exprValue;
        return ThrowCompletion(exprValue);
      });
      on('CallExpression', Evaluation_CallExpression);
      on('NewExpression', Evaluation_NewExpression);
      on('SequenceExpression', Evaluation_SequenceExpression);
    },
  },
};

/**
 * 9.4.2 ResolveBinding ( name [ , env ] ), against the layout
 * computed by scope analysis.
 */
export function ResolveBinding($: VM, n: ESTree.Identifier): BindingReference {
  return new BindingReference(n.name, $.getRunningContext().Layout.resolve(n));
}

/**
 * Evaluates a statement.  Statements never produce references.
 */
export function* EvaluateStatement($: VM, n: Node): ECR<Val|EMPTY> {
  const result = yield* $.Evaluation(n);
  if (IsAbrupt(result)) return result;
  Assert(!IsReference(result), `${n.type} produced a reference`);
  return result;
}

/**
 * 16.1.6 ScriptEvaluation ( scriptRecord )
 *
 * 12. Let result be Completion(GlobalDeclarationInstantiation(script, globalEnv)).
 * 13. If result is a normal completion, then
 *     a. Set result to Completion(Evaluation of script).
 *     b. If result is a normal completion and result.[[Value]] is
 *        empty, then set result to NormalCompletion(undefined).
 */
function* Evaluation_Script($: VM, n: ESTree.Program): ECR<Val|EMPTY> {
  const status = GlobalDeclarationInstantiation($, n);
  if (IsAbrupt(status)) return status;
  return yield* Evaluation_StatementList($, n.body);
}

/**
 * 16.1.7 GlobalDeclarationInstantiation ( script, env )
 *
 * Validates every declaration against the existing global bindings
 * before creating any of them, so a failed script leaves no trace.
 */
export function GlobalDeclarationInstantiation($: VM, script: ESTree.Program): CR<UNUSED> {
  const realm = $.getRealm();
  const declarations = GetLayout(script).GlobalDeclarations;
  for (const {Name, Kind} of declarations) {
    const existing = realm.GlobalBindings.get(Name);
    if (!existing) continue;
    if (Kind === 'let' || Kind === 'const' || existing.Lexical) {
      return $.throw('SyntaxError', `Identifier '${Name}' has already been declared`);
    }
  }
  for (const {Name, Kind, Node: decl} of declarations) {
    switch (Kind) {
      case 'var':
        if (!realm.GlobalBindings.has(Name)) {
          realm.GlobalBindings.set(Name, {Value: undefined, Mutable: true, Lexical: false});
        }
        break;
      case 'function':
        realm.GlobalBindings.set(Name, {
          Value: $.InstantiateFunctionObject(decl, realm),
          Mutable: true,
          Lexical: false,
        });
        break;
      default:
        realm.GlobalBindings.set(Name, {
          Value: UNINITIALIZED,
          Mutable: Kind === 'let',
          Lexical: true,
        });
    }
  }
  return UNUSED;
}

/**
 * 14.2.2 Runtime Semantics: Evaluation
 *
 * StatementList : StatementList StatementListItem
 * 1. Let sl be ? Evaluation of StatementList.
 * 2. Let s be Completion(Evaluation of StatementListItem).
 * 3. Return ? UpdateEmpty(s, sl).
 */
export function* Evaluation_StatementList($: VM, body: Node[]): ECR<Val|EMPTY> {
  let sl: Val|EMPTY = EMPTY;
  for (const item of body) {
    const s = yield* EvaluateStatement($, item);
    if (IsAbrupt(s)) return UpdateEmpty<Val>(s, sl);
    if (!EMPTY.is(s)) sl = s;
  }
  return sl;
}

/**
 * 14.2.2 Runtime Semantics: Evaluation
 *
 * Block : { StatementList }
 * 1. Let oldEnv be the running execution context's LexicalEnvironment.
 * 2. Let blockEnv be NewDeclarativeEnvironment(oldEnv).
 * 3. Perform BlockDeclarationInstantiation(StatementList, blockEnv).
 * ...
 *
 * The block's lexical slots are put back into their temporal dead
 * zone rather than allocating a new environment.
 */
export function* Evaluation_BlockStatement($: VM, n: ESTree.BlockStatement): ECR<Val|EMPTY> {
  BlockDeclarationInstantiation($, n);
  return yield* Evaluation_StatementList($, n.body);
}

export function BlockDeclarationInstantiation($: VM, n: Node): void {
  const context = $.getRunningContext();
  for (const slot of context.Layout.lexicalsOf(n)) {
    context.Slots[slot] = UNINITIALIZED;
  }
}

/**
 * 14.3.1.2 Runtime Semantics: Evaluation (LexicalDeclaration) and
 * 14.3.2.1 Runtime Semantics: Evaluation (VariableStatement)
 *
 * `let x;` initializes x to undefined; `var x;` leaves it alone.
 */
function* Evaluation_VariableDeclaration($: VM, n: ESTree.VariableDeclaration): ECR<EMPTY> {
  for (const decl of n.declarations) {
    Assert(decl.id.type === 'Identifier');
    const lhs = ResolveBinding($, decl.id);
    if (n.kind === 'var') {
      if (!decl.init) continue;
      const value = yield* $.evaluateValue(decl.init);
      if (IsAbrupt(value)) return value;
      const status = PutValue($, lhs, value);
      if (IsAbrupt(status)) return status;
    } else {
      let value: CR<Val> = undefined;
      if (decl.init) value = yield* $.evaluateValue(decl.init);
      if (IsAbrupt(value)) return value;
      InitializeReferencedBinding($, lhs, value);
    }
  }
  return EMPTY;
}

/**
 * 13.2.5.4 Runtime Semantics: Evaluation
 *
 * ObjectLiteral : { PropertyDefinitionList }
 * 1. Let obj be OrdinaryObjectCreate(%Object.prototype%).
 * 2. Perform ? PropertyDefinitionEvaluation of PropertyDefinitionList with argument obj.
 * 3. Return obj.
 */
function* Evaluation_ObjectExpression($: VM, n: ESTree.ObjectExpression): ECR<Obj> {
  const obj = new Obj($.getIntrinsic('%Object.prototype%'));
  for (const prop of n.properties) {
    Assert(prop.type === 'Property');
    const key = yield* EvaluatePropertyKey($, prop.key, prop.computed);
    if (IsAbrupt(key)) return key;
    const value = yield* $.evaluateValue(prop.value);
    if (IsAbrupt(value)) return value;
    obj.Set(key, value);
  }
  return obj;
}

/**
 * 13.2.5.3 Runtime Semantics: PropertyDefinitionEvaluation, for the
 * key: a plain name, a literal, or a computed expression.
 */
function* EvaluatePropertyKey(
  $: VM,
  key: ESTree.Expression|ESTree.PrivateIdentifier,
  computed: boolean,
): ECR<string> {
  if (!computed) {
    if (key.type === 'Identifier') return key.name;
    Assert(key.type === 'Literal', `Unexpected property key ${key.type}`);
    return String(key.value);
  }
  const value = yield* $.evaluateValue(key);
  if (IsAbrupt(value)) return value;
  return ToString($, value);
}

/**
 * 13.3.2.1 Runtime Semantics: Evaluation
 *
 * MemberExpression : MemberExpression [ Expression ]
 * 1. Let baseReference be ? Evaluation of MemberExpression.
 * 2. Let baseValue be ? GetValue(baseReference).
 * 3. If the source text matched by this MemberExpression is strict
 *    mode code, let strict be true; else let strict be false.
 * 4. Return ? EvaluatePropertyAccessWithExpressionKey(baseValue, Expression, strict).
 */
function* Evaluation_MemberExpression(
  $: VM,
  n: ESTree.MemberExpression,
): ECR<ReferenceRecord> {
  const baseValue = yield* $.evaluateValue(n.object);
  if (IsAbrupt(baseValue)) return baseValue;
  const propertyKey = yield* EvaluatePropertyKey($, n.property, n.computed);
  if (IsAbrupt(propertyKey)) return propertyKey;
  return new PropertyReference(baseValue, propertyKey);
}

/**
 * 13.15.2 Runtime Semantics: Evaluation
 *
 * AssignmentExpression : LeftHandSideExpression = AssignmentExpression
 * 1. Let lref be ? Evaluation of LeftHandSideExpression.
 * 2. Let rval be ? Evaluation of AssignmentExpression, then GetValue.
 * 3. Perform ? PutValue(lref, rval).
 * 4. Return rval.
 *
 * AssignmentExpression : LeftHandSideExpression AssignmentOperator AssignmentExpression
 * 1. Let lref be ? Evaluation of LeftHandSideExpression.
 * 2. Let lval be ? GetValue(lref).
 * 3. Let rref be ? Evaluation of AssignmentExpression.
 * 4. Let rval be ? GetValue(rref).
 * 5. Let assignmentOpText be the source text matched by AssignmentOperator.
 * 6. Let opText be the sequence of Unicode code points associated
 *    with assignmentOpText in the following table: ...
 * 7. Let r be ? ApplyStringOrNumericBinaryOperator(lval, opText, rval).
 * 8. Perform ? PutValue(lref, r).
 * 9. Return r.
 */
function* Evaluation_AssignmentExpression(
  $: VM,
  n: ESTree.AssignmentExpression,
): ECR<Val> {
  const lref = yield* $.Evaluation(n.left);
  if (IsAbrupt(lref)) return lref;
  Assert(IsReference(lref), 'Invalid assignment target');
  let r: CR<Val>;
  if (n.operator === '=') {
    r = yield* $.evaluateValue(n.right);
  } else {
    const lval = GetValue($, lref);
    if (IsAbrupt(lval)) return lval;
    const rval = yield* $.evaluateValue(n.right);
    if (IsAbrupt(rval)) return rval;
    r = ApplyStringOrNumericBinaryOperator($, lval, n.operator.slice(0, -1), rval);
  }
  if (IsAbrupt(r)) return r;
  const status = PutValue($, lref, r);
  if (IsAbrupt(status)) return status;
  return r;
}

/**
 * 13.3.6.1 Runtime Semantics: Evaluation
 *
 * CallExpression : CoverCallExpressionAndAsyncArrowHead
 * 1. Let memberExpr be the MemberExpression of expr.
 * 2. Let arguments be the Arguments of expr.
 * 3. Let ref be ? Evaluation of memberExpr.
 * 4. Let func be ? GetValue(ref).
 * ...
 * 6. Return ? EvaluateCall(func, ref, arguments, tailCall).
 */
function* Evaluation_CallExpression($: VM, n: ESTree.SimpleCallExpression): ECR<Val> {
  Assert(n.callee.type !== 'Super');
  const ref = yield* $.Evaluation(n.callee);
  if (IsAbrupt(ref)) return ref;
  let func: CR<Val>;
  let thisValue: Val = undefined;
  if (IsReference(ref)) {
    func = GetValue($, ref);
    if (ref instanceof PropertyReference) thisValue = ref.Base;
  } else {
    func = EMPTY.is(ref) ? undefined : ref;
  }
  if (IsAbrupt(func)) return func;
  const argList = yield* ArgumentListEvaluation($, n.arguments);
  if (IsAbrupt(argList)) return argList;
  if (!IsCallable(func)) return $.throw('TypeError', `${CalleeText(n.callee)} is not a function`);
  return yield* Call($, func, thisValue, argList);
}

/**
 * 13.3.5.1.1 EvaluateNew ( constructExpr, arguments )
 */
function* Evaluation_NewExpression($: VM, n: ESTree.NewExpression): ECR<Val> {
  Assert(n.callee.type !== 'Super');
  const constructor = yield* $.evaluateValue(n.callee);
  if (IsAbrupt(constructor)) return constructor;
  const argList = yield* ArgumentListEvaluation($, n.arguments);
  if (IsAbrupt(argList)) return argList;
  return yield* Construct($, constructor, argList);
}

/**
 * 13.3.8.1 Runtime Semantics: ArgumentListEvaluation
 */
function* ArgumentListEvaluation(
  $: VM,
  args: Array<ESTree.Expression|ESTree.SpreadElement>,
): ECR<Val[]> {
  const values: Val[] = [];
  for (const arg of args) {
    const value = yield* $.evaluateValue(arg);
    if (IsAbrupt(value)) return value;
    values.push(value);
  }
  return values;
}

/**
 * 13.16.1 Runtime Semantics: Evaluation
 *
 * Expression : Expression , AssignmentExpression
 * 1. Let lref be ? Evaluation of Expression.
 * 2. Perform ? GetValue(lref).
 * 3. Let rref be ? Evaluation of AssignmentExpression.
 * 4. Return ? GetValue(rref).
 */
function* Evaluation_SequenceExpression($: VM, n: ESTree.SequenceExpression): ECR<Val> {
  let result: Val = undefined;
  for (const expr of n.expressions) {
    const value = yield* $.evaluateValue(expr);
    if (IsAbrupt(value)) return value;
    result = value;
  }
  return result;
}

function CalleeText(n: ESTree.Node): string {
  if (n.type === 'Identifier') return n.name;
  if (n.type === 'MemberExpression' && !n.computed && n.property.type === 'Identifier') {
    return `${CalleeText(n.object)}.${n.property.name}`;
  }
  return 'expression';
}
