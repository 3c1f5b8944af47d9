/**
 * @fileoverview 8.2 Scope Analysis
 *
 * Every async generator body gets a flat slot arena: parameters,
 * `var`, `let`, `const` and catch parameters each receive a slot
 * index, and every identifier reference is resolved ahead of time to
 * either a slot or a global name.  Blocks nested in a script get a
 * script-level arena of their own.  Top-level declarations of a
 * script are globals.
 */

import * as ESTree from 'estree';
import { Assert } from '../assert';
import { Node, children } from '../tree';

export type DeclarationKind = 'var'|'let'|'const'|'param'|'catch'|'function';

export interface SlotInfo {
  readonly Name: string;
  readonly Kind: DeclarationKind;
}

export type Resolution = {readonly Slot: number} | {readonly Global: string};

export interface GlobalDeclaration {
  readonly Name: string;
  readonly Kind: 'var'|'let'|'const'|'function';
  readonly Node: ESTree.Node;
}

export class ScopeLayout {
  readonly Slots: SlotInfo[] = [];
  readonly References = new Map<ESTree.Identifier, Resolution>();
  /** Slots that must be reset to uninitialized on entry to a block. */
  readonly BlockLexicals = new Map<ESTree.Node, number[]>();
  readonly Params: number[] = [];
  /** Slot holding a named function expression's own name. */
  SelfSlot: number|undefined = undefined;
  readonly GlobalDeclarations: GlobalDeclaration[] = [];

  newSlot(Name: string, Kind: DeclarationKind): number {
    this.Slots.push({Name, Kind});
    return this.Slots.length - 1;
  }

  resolve(id: ESTree.Identifier): Resolution {
    const resolution = this.References.get(id);
    Assert(resolution, `unresolved identifier ${id.name}`);
    return resolution;
  }

  lexicalsOf(node: ESTree.Node): readonly number[] {
    return this.BlockLexicals.get(node) ?? [];
  }
}

const layouts = new WeakMap<ESTree.Node, ScopeLayout>();

export function GetLayout(node: ESTree.Node): ScopeLayout {
  const layout = layouts.get(node);
  Assert(layout, `no scope layout for ${node.type}`);
  return layout;
}

/**
 * 8.2.1 Static Semantics: BoundNames
 *
 * Only plain identifiers bind names: destructuring patterns are
 * reported as early errors during analysis.
 */
export function BoundNames(node: Node, names: string[] = []): string[] {
  switch (node.type) {
    case 'Identifier':
      names.push(node.name);
      break;
    case 'VariableDeclaration':
      for (const d of node.declarations) BoundNames(d, names);
      break;
    case 'VariableDeclarator':
      BoundNames(node.id, names);
      break;
    case 'FunctionDeclaration':
      if (node.id) names.push(node.id.name);
      break;
  }
  return names;
}

/**
 * 8.2.6 Static Semantics: VarDeclaredNames
 *
 * Names declared with `var` anywhere in the body, not descending
 * into nested functions.
 */
export function VarDeclaredNames(node: Node): string[] {
  const names: string[] = [];
  function visit(n: Node) {
    switch (n.type) {
      case 'FunctionDeclaration':
      case 'FunctionExpression':
      case 'ArrowFunctionExpression':
        return;
      case 'VariableDeclaration':
        if (n.kind === 'var') BoundNames(n, names);
        break;
    }
    for (const c of children(n)) visit(c);
  }
  for (const c of children(node)) visit(c);
  return names;
}

interface Declared {
  readonly Resolution: Resolution;
  readonly Kind: DeclarationKind;
}

function isLexical(kind: DeclarationKind): boolean {
  return kind === 'let' || kind === 'const';
}

class Scope {
  private readonly names = new Map<string, Declared>();

  constructor(
    readonly Parent: Scope|null,
    readonly Layout: ScopeLayout,
    readonly Kind: 'global'|'function'|'block',
  ) {}

  lookup(name: string): Declared|undefined {
    return this.names.get(name) ?? this.Parent?.lookup(name);
  }

  /** Returns an error message on a conflicting redeclaration. */
  declare(name: string, kind: DeclarationKind, node: ESTree.Node): Declared|string {
    const existing = this.names.get(name);
    if (existing) {
      if (isLexical(kind) || isLexical(existing.Kind) ||
          existing.Kind === 'catch' || kind === 'catch') {
        return `Identifier '${name}' has already been declared`;
      }
      return existing;
    }
    let resolution: Resolution;
    if (this.Kind === 'global') {
      Assert(kind === 'var' || kind === 'let' || kind === 'const' || kind === 'function');
      this.Layout.GlobalDeclarations.push({Name: name, Kind: kind, Node: node});
      resolution = {Global: name};
    } else {
      resolution = {Slot: this.Layout.newSlot(name, kind)};
    }
    const declared = {Resolution: resolution, Kind: kind};
    this.names.set(name, declared);
    return declared;
  }
}

type FunctionNode = ESTree.FunctionDeclaration|ESTree.FunctionExpression;

class Analyzer {
  readonly errors: string[] = [];

  constructor(private readonly global: Scope) {}

  declare(scope: Scope, name: string, kind: DeclarationKind, node: ESTree.Node): number|undefined {
    const declared = scope.declare(name, kind, node);
    if (typeof declared === 'string') {
      this.errors.push(declared);
      return undefined;
    }
    return 'Slot' in declared.Resolution ? declared.Resolution.Slot : undefined;
  }

  resolve(scope: Scope, id: ESTree.Identifier): void {
    const declared = scope.lookup(id.name);
    scope.Layout.References.set(id, declared ? declared.Resolution : {Global: id.name});
  }

  /** `let` or `const`, or undefined after reporting anything else. */
  lexicalKind(decl: ESTree.VariableDeclaration): 'let'|'const'|undefined {
    const kind = decl.kind;
    if (kind === 'let' || kind === 'const') return kind;
    this.errors.push('using declarations are not supported');
    return undefined;
  }

  statementList(owner: ESTree.Node, body: ESTree.Node[], scope: Scope): void {
    const slots: number[] = [];
    for (const stmt of body) {
      if (stmt.type !== 'VariableDeclaration' || stmt.kind === 'var') continue;
      const kind = this.lexicalKind(stmt);
      if (!kind) continue;
      for (const name of BoundNames(stmt)) {
        const slot = this.declare(scope, name, kind, stmt);
        if (slot !== undefined) slots.push(slot);
      }
    }
    scope.Layout.BlockLexicals.set(owner, slots);
    for (const stmt of body) this.visit(stmt, scope);
  }

  func(fn: FunctionNode, enclosing: Scope): void {
    if (!fn.async || !fn.generator) {
      this.errors.push('Only async generator functions are supported');
      return;
    }
    if (enclosing.Kind !== 'global') {
      this.errors.push('Async generator functions must be declared at the top level');
      return;
    }
    const layout = new ScopeLayout();
    layouts.set(fn, layout);
    let outer = this.global;
    if (fn.type === 'FunctionExpression' && fn.id) {
      // The name of a function expression is visible inside it only,
      // and is shadowed by parameters and locals of the same name.
      outer = new Scope(this.global, layout, 'block');
      const declared = outer.declare(fn.id.name, 'const', fn);
      if (typeof declared !== 'string' && 'Slot' in declared.Resolution) {
        layout.SelfSlot = declared.Resolution.Slot;
      }
    }
    const scope = new Scope(outer, layout, 'function');
    for (const param of fn.params) {
      if (param.type !== 'Identifier') {
        this.errors.push(`Unsupported parameter pattern: ${param.type}`);
        continue;
      }
      const slot = this.declare(scope, param.name, 'param', param);
      if (slot !== undefined) layout.Params.push(slot);
      this.resolve(scope, param);
    }
    for (const name of VarDeclaredNames(fn.body)) {
      this.declare(scope, name, 'var', fn.body);
    }
    this.statementList(fn.body, fn.body.body, scope);
  }

  visit(n: ESTree.Node, scope: Scope): void {
    switch (n.type) {
      case 'BlockStatement':
        this.statementList(n, n.body, new Scope(scope, scope.Layout, 'block'));
        return;
      case 'ForStatement': {
        const inner = new Scope(scope, scope.Layout, 'block');
        const slots: number[] = [];
        const init = n.init;
        const kind = init?.type === 'VariableDeclaration' && init.kind !== 'var' ?
          this.lexicalKind(init) : undefined;
        if (init && kind) {
          for (const name of BoundNames(init)) {
            const slot = this.declare(inner, name, kind, init);
            if (slot !== undefined) slots.push(slot);
          }
        }
        scope.Layout.BlockLexicals.set(n, slots);
        for (const c of children(n)) this.visit(c, inner);
        return;
      }
      case 'CatchClause': {
        const inner = new Scope(scope, scope.Layout, 'block');
        if (n.param?.type === 'Identifier') {
          this.declare(inner, n.param.name, 'catch', n.param);
          this.resolve(inner, n.param);
        } else if (n.param) {
          this.errors.push(`Unsupported catch parameter pattern: ${n.param.type}`);
        }
        this.visit(n.body, inner);
        return;
      }
      case 'VariableDeclaration':
        for (const decl of n.declarations) {
          if (decl.id.type !== 'Identifier') {
            this.errors.push(`Unsupported binding pattern: ${decl.id.type}`);
            continue;
          }
          this.resolve(scope, decl.id);
          if (decl.init) this.visit(decl.init, scope);
        }
        return;
      case 'FunctionDeclaration':
      case 'FunctionExpression':
        this.func(n, scope);
        return;
      case 'ArrowFunctionExpression':
        this.errors.push('Arrow functions are not supported');
        return;
      case 'YieldExpression':
        if (n.delegate) {
          this.errors.push('yield* is not supported');
          return;
        }
        break;
      case 'LabeledStatement':
        this.errors.push('Labeled statements are not supported');
        return;
      case 'Identifier':
        this.resolve(scope, n);
        return;
      case 'MemberExpression':
        this.visit(n.object, scope);
        if (n.computed) this.visit(n.property, scope);
        return;
      case 'Property':
        if (n.computed) this.visit(n.key, scope);
        this.visit(n.value, scope);
        return;
    }
    for (const c of children(n)) this.visit(c, scope);
  }
}

/**
 * Lays out a script and every function in it.  Returns the list of
 * early errors found; the layouts are only usable when it is empty.
 */
export function AnalyzeScript(program: ESTree.Program): string[] {
  const layout = new ScopeLayout();
  layouts.set(program, layout);
  const global = new Scope(null, layout, 'global');
  const analyzer = new Analyzer(global);
  for (const stmt of program.body) {
    if (stmt.type === 'FunctionDeclaration' && stmt.id) {
      analyzer.declare(global, stmt.id.name, 'function', stmt);
    }
  }
  for (const name of VarDeclaredNames(program)) {
    analyzer.declare(global, name, 'var', program);
  }
  analyzer.statementList(program, program.body, global);
  return analyzer.errors;
}
