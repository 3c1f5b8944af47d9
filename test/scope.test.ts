import * as acorn from 'acorn';
import * as ESTree from 'estree';
import { analyze } from '../src/internal/static/errors';
import { AnalyzeScript, GetLayout } from '../src/internal/static/scope';
import { IsProgram } from '../src/internal/tree';

function parse(source: string): ESTree.Program {
  const tree: unknown = acorn.parse(source, {ecmaVersion: 'latest', sourceType: 'script'});
  if (!IsProgram(tree)) throw new Error('not a program');
  return tree;
}

/**
 * Concatenates separately parsed scripts.  The parser rejects a
 * conflicting redeclaration on its own, so this is how a tree that
 * contains one reaches the analysis.
 */
function joined(...sources: string[]): ESTree.Program {
  const [first, ...rest] = sources.map(parse);
  for (const program of rest) first.body.push(...program.body);
  return first;
}

function statement(list: {readonly body: readonly ESTree.Node[]}, index: number): ESTree.Node {
  const stmt = list.body[index];
  if (!stmt) throw new Error(`no statement ${index}`);
  return stmt;
}

function functionAt(program: ESTree.Program, index: number): ESTree.FunctionDeclaration {
  const stmt = statement(program, index);
  if (stmt.type !== 'FunctionDeclaration') throw new Error(`statement ${index} is a ${stmt.type}`);
  return stmt;
}

function identifierStatement(stmt: ESTree.Node): ESTree.Identifier {
  if (stmt.type === 'ExpressionStatement' && stmt.expression.type === 'Identifier') {
    return stmt.expression;
  }
  throw new Error(`not an identifier statement: ${stmt.type}`);
}

describe('AnalyzeScript', () => {
  it('lays out parameters, vars and block-scoped names in one arena', () => {
    const program = parse(`
      async function* g(a, b) {
        var v;
        let l = 1;
        { const c = 2; }
        try {} catch (e) {}
      }`);
    expect(AnalyzeScript(program)).toEqual([]);
    const fn = functionAt(program, 0);
    const layout = GetLayout(fn);
    expect(layout.Slots).toEqual([
      {Name: 'a', Kind: 'param'},
      {Name: 'b', Kind: 'param'},
      {Name: 'v', Kind: 'var'},
      {Name: 'l', Kind: 'let'},
      {Name: 'c', Kind: 'const'},
      {Name: 'e', Kind: 'catch'},
    ]);
    expect(layout.Params).toEqual([0, 1]);
    expect(layout.lexicalsOf(fn.body)).toEqual([3]);
    expect(layout.lexicalsOf(statement(fn.body, 2))).toEqual([4]);
  });

  it('records the lexical slots of a for loop head', () => {
    const program = parse('async function* f() { for (let i = 0; i < 2; i++) {} }');
    expect(AnalyzeScript(program)).toEqual([]);
    const fn = functionAt(program, 0);
    const layout = GetLayout(fn);
    expect(layout.Slots).toEqual([{Name: 'i', Kind: 'let'}]);
    expect(layout.lexicalsOf(statement(fn.body, 0))).toEqual([0]);
  });

  it('makes top-level declarations globals', () => {
    const program = parse('var x; let y; const z = 1; async function* f() {}');
    expect(AnalyzeScript(program)).toEqual([]);
    const layout = GetLayout(program);
    expect(layout.Slots).toEqual([]);
    expect(layout.GlobalDeclarations.map(({Name, Kind}) => [Name, Kind])).toEqual([
      ['f', 'function'],
      ['x', 'var'],
      ['y', 'let'],
      ['z', 'const'],
    ]);
  });

  it('resolves identifiers to slots or global names', () => {
    const program = parse('let top = 1; async function* f(p) { p; top; undeclared; }');
    expect(AnalyzeScript(program)).toEqual([]);
    const fn = functionAt(program, 1);
    const layout = GetLayout(fn);
    const [p, top, undeclared] = fn.body.body.map(identifierStatement);
    expect(layout.resolve(p)).toEqual({Slot: 0});
    expect(layout.resolve(top)).toEqual({Global: 'top'});
    expect(layout.resolve(undeclared)).toEqual({Global: 'undeclared'});
  });

  it('gives a named function expression a slot for its own name', () => {
    const program = parse('var h = async function* named(x) { named; };');
    expect(AnalyzeScript(program)).toEqual([]);
    const decl = statement(program, 0);
    if (decl.type !== 'VariableDeclaration') throw new Error(decl.type);
    const fn = decl.declarations[0].init;
    if (fn?.type !== 'FunctionExpression') throw new Error('expected a function expression');
    const layout = GetLayout(fn);
    expect(layout.SelfSlot).toBe(0);
    expect(layout.Params).toEqual([1]);
    expect(layout.resolve(identifierStatement(statement(fn.body, 0)))).toEqual({Slot: 0});
  });

  it.each([
    [['let a;', 'let a;'], "Identifier 'a' has already been declared"],
    [['let x;', '{ var x; }'], "Identifier 'x' has already been declared"],
  ])('reports a conflicting redeclaration in %j', (sources, message) => {
    expect(AnalyzeScript(joined(...sources))).toEqual([message]);
  });

  it('reports a lexical and var declaration of the same name in a body', () => {
    const program = parse('async function* f() { let a; }');
    const decl = statement(parse('var a;'), 0);
    if (decl.type !== 'VariableDeclaration') throw new Error(decl.type);
    functionAt(program, 0).body.body.push(decl);
    expect(AnalyzeScript(program)).toEqual(["Identifier 'a' has already been declared"]);
  });

  it.each([
    ['function f() {}', 'Only async generator functions are supported'],
    ['async function* f() { async function* g() {} }',
     'Async generator functions must be declared at the top level'],
    ['async function* f() { yield* g; }', 'yield* is not supported'],
    ['var f = (x) => x;', 'Arrow functions are not supported'],
    ['var {a} = o;', 'Unsupported binding pattern: ObjectPattern'],
    ['async function* f(...rest) {}', 'Unsupported parameter pattern: RestElement'],
    ['try {} catch ({a}) {}', 'Unsupported catch parameter pattern: ObjectPattern'],
    ['a: for (;;) {}', 'Labeled statements are not supported'],
    ['{ using x = null; }', 'using declarations are not supported'],
  ])('reports an early error for %s', (source, message) => {
    expect(AnalyzeScript(parse(source))).toEqual([message]);
  });
});

describe('analyze', () => {
  const everything = () => true;

  it('reports node types without an evaluation handler', () => {
    const program = parse('while (true) { x; }');
    expect(analyze(program, (type) => type !== 'WhileStatement')).toEqual([
      'Unsupported syntax: WhileStatement',
    ]);
  });

  it.each([
    ['x **= 2;', 'Unsupported assignment operator: **='],
    ['delete o.x;', 'Unsupported unary operator: delete'],
    ['a instanceof b;', 'instanceof is not supported'],
    ['/re/;', 'Regular expressions are not supported'],
    ['({get a() { return 1; }});', 'Only data properties are supported in object literals'],
  ])('rejects %s', (source, message) => {
    expect(analyze(parse(source), everything)).toEqual([message]);
  });
});
