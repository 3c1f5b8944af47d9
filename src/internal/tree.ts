import type { Node, Program } from 'estree';

export type { Node, Program };

export type NodeType = Node['type'];
export type NodeMap = {[K in NodeType]: Extract<Node, {type: K}>};

const childProps: ReadonlySet<string> = new Set([
  'body',
  'params',
  'expression',
  'test',
  'consequent',
  'alternate',
  'label',
  'object',
  'argument',
  'block',
  'handler',
  'finalizer',
  'init',
  'update',
  'left',
  'right',
  'id',
  'declarations',
  'elements',
  'properties',
  'key',
  'value',
  'callee',
  'arguments',
  'property',
  'param',
  'expressions',
  'quasi',
  'quasis',
  'discriminant',
  'cases',
]);

function isNode(v: unknown): v is Node {
  return typeof v === 'object' && v !== null && 'type' in v && typeof v.type === 'string';
}

export function IsProgram(v: unknown): v is Program {
  return isNode(v) && v.type === 'Program';
}

export function IsNodeType<N extends NodeType>(n: Node, type: N): n is NodeMap[N] {
  return n.type === type;
}

/** Direct child nodes, in source order. */
export function children(n: Node): Node[] {
  const out: Node[] = [];
  for (const [k, v] of Object.entries(n)) {
    if (!childProps.has(k)) continue;
    for (const c of Array.isArray(v) ? v : [v]) {
      if (isNode(c)) out.push(c);
    }
  }
  return out;
}

export function traversePreorder(n: Node, fn: (n: Node) => boolean|void): void {
  if (fn(n) === false) return;
  for (const c of children(n)) traversePreorder(c, fn);
}

/** Renders `file:line:col` for stack traces, or '' when unknown. */
export function SourcePosition(n: Node): string {
  const loc = n.loc;
  if (!loc) return '';
  return `${loc.source ?? '<anonymous>'}:${loc.start.line}:${loc.start.column}`;
}
