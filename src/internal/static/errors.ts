/**
 * @fileoverview Look for syntax the installed plugins cannot evaluate.
 */

import { Node } from 'estree';
import { NodeType, traversePreorder } from '../tree';

/** Nodes only ever evaluated through their parent. */
const STRUCTURAL = new Set<NodeType>([
  'Program',
  'VariableDeclarator',
  'Property',
  'CatchClause',
]);

const ASSIGNMENT_OPERATORS = new Set(['=', '+=', '-=', '*=']);
const UNARY_OPERATORS = new Set(['!', '-', '+', 'typeof', 'void']);

export function analyze(n: Node, hasEvaluation: (type: NodeType) => boolean): string[] {
  const errors: string[] = [];
  const check = (node: Node): boolean|undefined => {
    if (!STRUCTURAL.has(node.type) && !hasEvaluation(node.type)) {
      errors.push(`Unsupported syntax: ${node.type}`);
      return false;
    }
    switch (node.type) {
      case 'AssignmentExpression':
        if (!ASSIGNMENT_OPERATORS.has(node.operator)) {
          errors.push(`Unsupported assignment operator: ${node.operator}`);
        }
        if (node.left.type !== 'Identifier' && node.left.type !== 'MemberExpression') {
          errors.push(`Unsupported assignment target: ${node.left.type}`);
          return false;
        }
        break;
      case 'UnaryExpression':
        if (!UNARY_OPERATORS.has(node.operator)) {
          errors.push(`Unsupported unary operator: ${node.operator}`);
        }
        break;
      case 'BinaryExpression':
        if (node.operator === 'instanceof') errors.push('instanceof is not supported');
        break;
      case 'UpdateExpression':
        if (node.argument.type !== 'Identifier' && node.argument.type !== 'MemberExpression') {
          errors.push('Invalid update target');
        }
        break;
      case 'Literal':
        if ('regex' in node) errors.push('Regular expressions are not supported');
        break;
      case 'Property':
        if (node.kind !== 'init' || node.method) {
          errors.push('Only data properties are supported in object literals');
        }
        break;
      case 'MemberExpression':
        if (node.object.type === 'Super') {
          errors.push('super is not supported');
          return false;
        }
        break;
      case 'CallExpression':
      case 'NewExpression':
        if (node.callee.type === 'Super') {
          errors.push('super is not supported');
          return false;
        }
        break;
      case 'VariableDeclaration':
        if (node.declarations.some((d) => d.id.type !== 'Identifier')) return false;
        break;
      case 'FunctionDeclaration':
      case 'FunctionExpression':
        // Parameters are binding patterns, not expressions.
        traversePreorder(node.body, check);
        return false;
    }
    return undefined;
  };
  traversePreorder(n, check);
  return errors;
}
