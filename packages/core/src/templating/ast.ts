/**
 * Template directive AST
 *
 * Closed set of node and expression variants produced by the template parser.
 *
 * @module core/templating/ast
 */

import type { TemplateLiteral } from '@lineagekit/types';

export type BinaryOperator = 'and' | 'or' | '==' | '!=' | '~';

export interface KeywordArgument {
  name: string;
  value: TemplateExpr;
}

export type TemplateExpr =
  | { kind: 'literal'; value: TemplateLiteral }
  | { kind: 'name'; path: string[] }
  | { kind: 'call'; callee: string[]; args: TemplateExpr[]; kwargs: KeywordArgument[] }
  | { kind: 'not'; operand: TemplateExpr }
  | { kind: 'binary'; operator: BinaryOperator; left: TemplateExpr; right: TemplateExpr };

export interface ConditionalBranch {
  condition: TemplateExpr;
  body: TemplateNode[];
}

export interface MacroParameterNode {
  name: string;
  default: TemplateExpr | undefined;
}

export type TemplateNode =
  | { kind: 'text'; value: string }
  | { kind: 'output'; expr: TemplateExpr; offset: number }
  | { kind: 'set'; name: string; value: TemplateExpr; offset: number }
  | { kind: 'if'; branches: ConditionalBranch[]; otherwise: TemplateNode[] }
  | {
      kind: 'macro';
      name: string;
      parameters: MacroParameterNode[];
      body: TemplateNode[];
      /** Body text between the opening and closing tags */
      source: string;
    };

/**
 * True when the template contains nothing but text
 */
export function isPlainText(nodes: readonly TemplateNode[]): boolean {
  return nodes.every((node) => node.kind === 'text');
}
