/**
 * Template directive parser
 *
 * Splits raw model text into text and directive segments (`{{ }}`, `{% %}`,
 * `{# #}`) and parses directives into the closed AST of `./ast.ts`.
 *
 * @module core/templating/parser
 */

import type { TemplateLiteral } from '@lineagekit/types';

import { TemplateSyntaxError } from '../errors.js';

import type {
  BinaryOperator,
  ConditionalBranch,
  KeywordArgument,
  MacroParameterNode,
  TemplateExpr,
  TemplateNode,
} from './ast.js';

// =============================================================================
// SEGMENTS
// =============================================================================

type TagType = 'output' | 'statement' | 'comment';

type RawSegment =
  | { kind: 'text'; value: string }
  | {
      kind: 'tag';
      type: TagType;
      content: string;
      offset: number;
      /** Index of the first non-blank character of the content */
      contentOffset: number;
      /** Index just past the closing delimiter */
      end: number;
      trimBefore: boolean;
      trimAfter: boolean;
    };

const TAG_OPEN = /\{[{%#]/g;

const CLOSERS: Record<TagType, string> = {
  output: '}}',
  statement: '%}',
  comment: '#}',
};

function tagTypeOf(marker: string | undefined): TagType {
  switch (marker) {
    case '{':
      return 'output';
    case '%':
      return 'statement';
    default:
      return 'comment';
  }
}

/**
 * Find the closing delimiter, skipping over quoted strings
 */
function findClose(source: string, start: number, close: string): number {
  let quote: string | null = null;
  for (let j = start; j < source.length; j++) {
    const ch = source[j];
    if (quote) {
      if (ch === '\\') {
        j++;
      } else if (ch === quote) {
        quote = null;
      }
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (source.startsWith(close, j)) {
      return j;
    }
  }
  return -1;
}

function scanSegments(source: string, model: string): RawSegment[] {
  const segments: RawSegment[] = [];
  let position = 0;

  while (position < source.length) {
    TAG_OPEN.lastIndex = position;
    const match = TAG_OPEN.exec(source);
    if (!match) {
      segments.push({ kind: 'text', value: source.slice(position) });
      break;
    }

    const open = match.index;
    if (open > position) {
      segments.push({ kind: 'text', value: source.slice(position, open) });
    }

    const type = tagTypeOf(source[open + 1]);
    let start = open + 2;
    const trimBefore = source[start] === '-';
    if (trimBefore) {
      start++;
    }

    const close =
      type === 'comment'
        ? source.indexOf(CLOSERS.comment, start)
        : findClose(source, start, CLOSERS[type]);
    if (close === -1) {
      throw new TemplateSyntaxError(model, `unterminated '${match[0]}' tag`, open);
    }

    const trimAfter = close > start && source[close - 1] === '-';
    const contentEnd = trimAfter ? close - 1 : close;
    const raw = source.slice(start, contentEnd);

    segments.push({
      kind: 'tag',
      type,
      content: raw.trim(),
      offset: open,
      contentOffset: start + raw.length - raw.trimStart().length,
      end: close + 2,
      trimBefore,
      trimAfter,
    });
    position = close + 2;
  }

  // Apply whitespace control markers to neighbouring text
  for (let i = 0; i < segments.length; i++) {
    const segment = segments[i];
    if (segment?.kind !== 'tag') {
      continue;
    }
    const before = segments[i - 1];
    if (segment.trimBefore && before?.kind === 'text') {
      before.value = before.value.trimEnd();
    }
    const after = segments[i + 1];
    if (segment.trimAfter && after?.kind === 'text') {
      after.value = after.value.trimStart();
    }
  }

  return segments;
}

// =============================================================================
// EXPRESSIONS
// =============================================================================

type ExprToken =
  | { type: 'string'; value: string; offset: number }
  | { type: 'number'; value: number; offset: number }
  | { type: 'name'; value: string; offset: number }
  | { type: 'punct'; value: string; offset: number }
  | { type: 'eof'; offset: number };

const PUNCTUATION = ['==', '!=', '(', ')', ',', '.', '=', '~', '[', ']'];

function tokenizeExpression(text: string, baseOffset: number, model: string): ExprToken[] {
  const tokens: ExprToken[] = [];
  let i = 0;

  while (i < text.length) {
    const ch = text[i] ?? '';
    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    const offset = baseOffset + i;

    if (ch === '"' || ch === "'") {
      let value = '';
      let j = i + 1;
      let closed = false;
      while (j < text.length) {
        const c = text[j] ?? '';
        if (c === '\\') {
          value += text[j + 1] ?? '';
          j += 2;
          continue;
        }
        if (c === ch) {
          closed = true;
          break;
        }
        value += c;
        j++;
      }
      if (!closed) {
        throw new TemplateSyntaxError(model, 'unterminated string literal', offset);
      }
      tokens.push({ type: 'string', value, offset });
      i = j + 1;
      continue;
    }

    const number = /^\d+(\.\d+)?/.exec(text.slice(i));
    if (number) {
      tokens.push({ type: 'number', value: Number(number[0]), offset });
      i += number[0].length;
      continue;
    }

    const name = /^[A-Za-z_][A-Za-z0-9_]*/.exec(text.slice(i));
    if (name) {
      tokens.push({ type: 'name', value: name[0], offset });
      i += name[0].length;
      continue;
    }

    const punct = PUNCTUATION.find((p) => text.startsWith(p, i));
    if (punct) {
      tokens.push({ type: 'punct', value: punct, offset });
      i += punct.length;
      continue;
    }

    throw new TemplateSyntaxError(model, `unsupported character '${ch}' in expression`, offset);
  }

  tokens.push({ type: 'eof', offset: baseOffset + text.length });
  return tokens;
}

const LITERAL_NAMES: Record<string, TemplateLiteral> = {
  true: true,
  True: true,
  false: false,
  False: false,
  none: null,
  None: null,
};

/**
 * Recursive-descent parser over one directive's tokens
 */
class ExpressionParser {
  private index = 0;

  constructor(
    private readonly tokens: ExprToken[],
    private readonly model: string
  ) {}

  private peek(): ExprToken {
    return this.tokens[this.index] ?? { type: 'eof', offset: 0 };
  }

  private next(): ExprToken {
    const token = this.peek();
    this.index++;
    return token;
  }

  private fail(message: string, token: ExprToken = this.peek()): never {
    throw new TemplateSyntaxError(this.model, message, token.offset);
  }

  isPunct(value: string): boolean {
    const token = this.peek();
    return token.type === 'punct' && token.value === value;
  }

  isName(value?: string): boolean {
    const token = this.peek();
    return token.type === 'name' && (value === undefined || token.value === value);
  }

  expectPunct(value: string): void {
    if (!this.isPunct(value)) {
      this.fail(`expected '${value}'`);
    }
    this.index++;
  }

  expectName(): string {
    const token = this.next();
    if (token.type !== 'name') {
      return this.fail('expected a name', token);
    }
    return token.value;
  }

  expectEnd(): void {
    if (this.peek().type !== 'eof') {
      this.fail('unexpected trailing tokens');
    }
  }

  parseExpression(): TemplateExpr {
    return this.parseOr();
  }

  private parseBinary(
    operators: readonly BinaryOperator[],
    operand: () => TemplateExpr
  ): TemplateExpr {
    let left = operand();
    for (;;) {
      const token = this.peek();
      const operator = operators.find(
        (op) => (token.type === 'name' || token.type === 'punct') && token.value === op
      );
      if (!operator) {
        return left;
      }
      this.index++;
      left = { kind: 'binary', operator, left, right: operand() };
    }
  }

  private parseOr(): TemplateExpr {
    return this.parseBinary(['or'], () => this.parseAnd());
  }

  private parseAnd(): TemplateExpr {
    return this.parseBinary(['and'], () => this.parseNot());
  }

  private parseNot(): TemplateExpr {
    if (this.isName('not')) {
      this.index++;
      return { kind: 'not', operand: this.parseNot() };
    }
    return this.parseBinary(['==', '!='], () => this.parseConcat());
  }

  private parseConcat(): TemplateExpr {
    return this.parseBinary(['~'], () => this.parsePrimary());
  }

  private parsePrimary(): TemplateExpr {
    const token = this.next();

    switch (token.type) {
      case 'string':
      case 'number':
        return { kind: 'literal', value: token.value };
      case 'punct':
        if (token.value === '(') {
          const inner = this.parseExpression();
          this.expectPunct(')');
          return inner;
        }
        return this.fail(`unexpected '${token.value}'`, token);
      case 'eof':
        return this.fail('unexpected end of expression', token);
      case 'name':
        break;
    }

    if (Object.hasOwn(LITERAL_NAMES, token.value)) {
      return { kind: 'literal', value: LITERAL_NAMES[token.value] ?? null };
    }

    const path = [token.value];
    while (this.isPunct('.')) {
      this.index++;
      path.push(this.expectName());
    }

    if (!this.isPunct('(')) {
      return { kind: 'name', path };
    }

    this.index++;
    const args: TemplateExpr[] = [];
    const kwargs: KeywordArgument[] = [];
    while (!this.isPunct(')')) {
      const current = this.peek();
      const following = this.tokens[this.index + 1];
      if (current.type === 'name' && following?.type === 'punct' && following.value === '=') {
        this.index += 2;
        kwargs.push({ name: current.value, value: this.parseExpression() });
      } else {
        if (kwargs.length > 0) {
          this.fail('positional argument after keyword argument');
        }
        args.push(this.parseExpression());
      }
      if (!this.isPunct(',')) {
        break;
      }
      this.index++;
    }
    this.expectPunct(')');

    return { kind: 'call', callee: path, args, kwargs };
  }
}

// =============================================================================
// TREE BUILDING
// =============================================================================

type IfNode = Extract<TemplateNode, { kind: 'if' }>;
type MacroNode = Extract<TemplateNode, { kind: 'macro' }>;

type Frame =
  | { kind: 'root'; target: TemplateNode[] }
  | { kind: 'if'; target: TemplateNode[]; node: IfNode; inElse: boolean; offset: number }
  | { kind: 'macro'; target: TemplateNode[]; node: MacroNode; offset: number; bodyStart: number };

function parseMacroSignature(parser: ExpressionParser): {
  name: string;
  parameters: MacroParameterNode[];
} {
  const name = parser.expectName();
  const parameters: MacroParameterNode[] = [];
  parser.expectPunct('(');
  while (!parser.isPunct(')')) {
    const parameter = parser.expectName();
    let fallback: TemplateExpr | undefined;
    if (parser.isPunct('=')) {
      parser.expectPunct('=');
      fallback = parser.parseExpression();
    }
    parameters.push({ name: parameter, default: fallback });
    if (!parser.isPunct(',')) {
      break;
    }
    parser.expectPunct(',');
  }
  parser.expectPunct(')');
  parser.expectEnd();
  return { name, parameters };
}

/**
 * Parse template text into directive nodes
 *
 * @param source - Raw template text
 * @param model - Model (or macro) name used in error messages
 */
export function parseTemplate(source: string, model: string): TemplateNode[] {
  const root: TemplateNode[] = [];
  const stack: Frame[] = [{ kind: 'root', target: root }];
  const top = (): Frame => stack[stack.length - 1] ?? { kind: 'root', target: root };

  for (const segment of scanSegments(source, model)) {
    if (segment.kind === 'text') {
      if (segment.value.length > 0) {
        top().target.push({ kind: 'text', value: segment.value });
      }
      continue;
    }
    if (segment.type === 'comment') {
      continue;
    }

    const parser = new ExpressionParser(
      tokenizeExpression(segment.content, segment.contentOffset, model),
      model
    );

    if (segment.type === 'output') {
      const expr = parser.parseExpression();
      parser.expectEnd();
      top().target.push({ kind: 'output', expr, offset: segment.offset });
      continue;
    }

    const keyword = parser.expectName();
    const frame = top();

    switch (keyword) {
      case 'set': {
        const name = parser.expectName();
        parser.expectPunct('=');
        const value = parser.parseExpression();
        parser.expectEnd();
        frame.target.push({ kind: 'set', name, value, offset: segment.offset });
        break;
      }
      case 'if': {
        const condition = parser.parseExpression();
        parser.expectEnd();
        const node: IfNode = { kind: 'if', branches: [{ condition, body: [] }], otherwise: [] };
        frame.target.push(node);
        stack.push({
          kind: 'if',
          node,
          target: node.branches[0]?.body ?? [],
          inElse: false,
          offset: segment.offset,
        });
        break;
      }
      case 'elif': {
        if (frame.kind !== 'if' || frame.inElse) {
          throw new TemplateSyntaxError(model, "unexpected '{% elif %}'", segment.offset);
        }
        const condition = parser.parseExpression();
        parser.expectEnd();
        const branch: ConditionalBranch = { condition, body: [] };
        frame.node.branches.push(branch);
        frame.target = branch.body;
        break;
      }
      case 'else': {
        parser.expectEnd();
        if (frame.kind !== 'if' || frame.inElse) {
          throw new TemplateSyntaxError(model, "unexpected '{% else %}'", segment.offset);
        }
        frame.inElse = true;
        frame.target = frame.node.otherwise;
        break;
      }
      case 'endif': {
        parser.expectEnd();
        if (frame.kind !== 'if') {
          throw new TemplateSyntaxError(model, "unexpected '{% endif %}'", segment.offset);
        }
        stack.pop();
        break;
      }
      case 'macro': {
        const { name, parameters } = parseMacroSignature(parser);
        const node: MacroNode = { kind: 'macro', name, parameters, body: [], source: '' };
        frame.target.push(node);
        stack.push({
          kind: 'macro',
          node,
          target: node.body,
          offset: segment.offset,
          bodyStart: segment.end,
        });
        break;
      }
      case 'endmacro': {
        parser.expectEnd();
        if (frame.kind !== 'macro') {
          throw new TemplateSyntaxError(model, "unexpected '{% endmacro %}'", segment.offset);
        }
        frame.node.source = source.slice(frame.bodyStart, segment.offset);
        stack.pop();
        break;
      }
      default:
        throw new TemplateSyntaxError(model, `unsupported tag '${keyword}'`, segment.offset);
    }
  }

  const unclosed = top();
  if (unclosed.kind !== 'root') {
    throw new TemplateSyntaxError(model, `unclosed '{% ${unclosed.kind} %}'`, unclosed.offset);
  }

  return root;
}
