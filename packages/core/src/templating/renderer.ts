/**
 * Template Renderer
 *
 * Expands model references, source references, variables and macro calls in
 * raw model text into plain SQL, recording the references each model uses.
 * Rendering is a pure function of the model text and the project value.
 *
 * @module core/templating/renderer
 */

import type { Macro, Model, Reference, TemplateLiteral } from '@lineagekit/types';

import {
  ConfigurationError,
  MacroRecursionError,
  UnresolvedReferenceError,
} from '../errors.js';
import { macroKey, modelRelation, type Project } from '../lineage/project.js';
import { createLogger, type Logger } from '../logger.js';

import type { KeywordArgument, MacroParameterNode, TemplateExpr, TemplateNode } from './ast.js';
import { parseTemplate } from './parser.js';

export const DEFAULT_MACRO_DEPTH_LIMIT = 32;

export interface RenderResult {
  sql: string;
  /** Models and sources the text depends on, first-use order, no duplicates */
  references: Reference[];
  /** Macros expanded while rendering, first-use order */
  macros: string[];
}

export interface TemplateRendererOptions {
  /** Maximum nested macro expansions (default: 32) */
  macroDepthLimit?: number;
  logger?: Logger;
}

type MacroNode = Extract<TemplateNode, { kind: 'macro' }>;

interface RenderState {
  model: Model;
  references: Map<string, Reference>;
  macros: string[];
  localMacros: Map<string, MacroNode>;
}

interface Frame {
  scope: Map<string, TemplateLiteral>;
  depth: number;
  chain: string[];
}

interface MacroDefinition {
  name: string;
  parameters: readonly (MacroParameterNode | Macro['parameters'][number])[];
  body: TemplateNode[];
}

function isTruthy(value: TemplateLiteral): boolean {
  return value !== null && value !== false && value !== 0 && value !== '';
}

function stringify(value: TemplateLiteral): string {
  if (value === null) {
    return '';
  }
  if (typeof value === 'boolean') {
    return value ? 'True' : 'False';
  }
  return String(value);
}

export class TemplateRenderer {
  private readonly project: Project;
  private readonly depthLimit: number;
  private readonly logger: Logger;
  private readonly parsedMacros = new Map<string, TemplateNode[]>();

  constructor(project: Project, options: TemplateRendererOptions = {}) {
    const depthLimit = options.macroDepthLimit ?? DEFAULT_MACRO_DEPTH_LIMIT;
    if (!Number.isInteger(depthLimit) || depthLimit < 1) {
      throw new ConfigurationError(
        `Macro depth limit must be a positive integer, got ${depthLimit}`
      );
    }
    this.project = project;
    this.depthLimit = depthLimit;
    this.logger = options.logger ?? createLogger({ name: 'template-renderer' });
  }

  /**
   * Render one model
   *
   * @throws TemplateSyntaxError, UnresolvedReferenceError, MacroRecursionError
   */
  render(model: Model): RenderResult {
    const nodes = parseTemplate(model.rawSql, model.name);
    const state: RenderState = {
      model,
      references: new Map(),
      macros: [],
      localMacros: new Map(),
    };

    for (const node of nodes) {
      if (node.kind === 'macro') {
        state.localMacros.set(node.name, node);
      }
    }

    const sql = this.renderNodes(nodes, state, { scope: new Map(), depth: 0, chain: [model.name] });
    const references = Array.from(state.references.values());

    this.logger.debug(
      { model: model.name, references: references.length, macros: state.macros.length },
      'Model rendered'
    );

    return { sql, references, macros: state.macros };
  }

  private renderNodes(nodes: readonly TemplateNode[], state: RenderState, frame: Frame): string {
    let out = '';

    for (const node of nodes) {
      switch (node.kind) {
        case 'text':
          out += node.value;
          break;
        case 'output':
          out += stringify(this.evaluate(node.expr, state, frame));
          break;
        case 'set':
          frame.scope.set(node.name, this.evaluate(node.value, state, frame));
          break;
        case 'if': {
          const branch = node.branches.find((b) =>
            isTruthy(this.evaluate(b.condition, state, frame))
          );
          out += this.renderNodes(branch ? branch.body : node.otherwise, state, frame);
          break;
        }
        case 'macro':
          state.localMacros.set(node.name, node);
          break;
      }
    }

    return out;
  }

  private evaluate(expr: TemplateExpr, state: RenderState, frame: Frame): TemplateLiteral {
    switch (expr.kind) {
      case 'literal':
        return expr.value;
      case 'name':
        return this.lookupName(expr.path, state, frame);
      case 'not':
        return !isTruthy(this.evaluate(expr.operand, state, frame));
      case 'binary': {
        const left = this.evaluate(expr.left, state, frame);
        switch (expr.operator) {
          case 'and':
            return isTruthy(left) ? this.evaluate(expr.right, state, frame) : left;
          case 'or':
            return isTruthy(left) ? left : this.evaluate(expr.right, state, frame);
          case '==':
            return left === this.evaluate(expr.right, state, frame);
          case '!=':
            return left !== this.evaluate(expr.right, state, frame);
          case '~':
            return stringify(left) + stringify(this.evaluate(expr.right, state, frame));
        }
        break;
      }
      case 'call':
        return this.call(expr.callee, expr.args, expr.kwargs, state, frame);
    }
    return null;
  }

  private lookupName(path: readonly string[], state: RenderState, frame: Frame): TemplateLiteral {
    const name = path.join('.');
    if (path.length === 1) {
      const local = frame.scope.get(name);
      if (local !== undefined) {
        return local;
      }
      if (name === 'this') {
        return modelRelation(this.project, state.model.name);
      }
    }
    if (name === 'target.schema') {
      return this.project.schema;
    }
    throw new UnresolvedReferenceError(state.model.name, name, 'var');
  }

  private stringArgs(args: readonly TemplateExpr[], state: RenderState, frame: Frame): string[] {
    return args.map((arg) => stringify(this.evaluate(arg, state, frame)));
  }

  private addReference(state: RenderState, reference: Reference): void {
    const key = `${reference.kind}:${reference.target}`;
    if (!state.references.has(key)) {
      state.references.set(key, reference);
    }
  }

  private call(
    callee: readonly string[],
    args: readonly TemplateExpr[],
    kwargs: readonly KeywordArgument[],
    state: RenderState,
    frame: Frame
  ): TemplateLiteral {
    const modelName = state.model.name;
    const [head, ...rest] = callee;

    if (rest.length === 0) {
      switch (head) {
        case 'ref': {
          const parts = this.stringArgs(args, state, frame);
          const target = parts[parts.length - 1];
          if (!target || !this.project.models.has(target)) {
            throw new UnresolvedReferenceError(modelName, target ?? '', 'model');
          }
          const relation = modelRelation(this.project, target);
          this.addReference(state, { kind: 'model', target, relation });
          return relation;
        }
        case 'source': {
          const [sourceName, table] = this.stringArgs(args, state, frame);
          const target = `${sourceName ?? ''}.${table ?? ''}`;
          if (!this.project.sources.has(target)) {
            throw new UnresolvedReferenceError(modelName, target, 'source');
          }
          this.addReference(state, { kind: 'source', target, relation: target });
          return target;
        }
        case 'var': {
          const [name] = this.stringArgs(args.slice(0, 1), state, frame);
          if (name !== undefined && Object.hasOwn(this.project.vars, name)) {
            return this.project.vars[name] ?? null;
          }
          const fallback = args[1];
          if (fallback) {
            return this.evaluate(fallback, state, frame);
          }
          throw new UnresolvedReferenceError(modelName, name ?? '', 'var');
        }
        case 'env_var': {
          const fallback = args[1];
          return fallback ? this.evaluate(fallback, state, frame) : '';
        }
        case 'is_incremental':
          return false;
        case 'config':
        case 'log':
          return '';
      }
    }

    const definition = this.findMacro(callee, state);
    if (!definition) {
      throw new UnresolvedReferenceError(modelName, callee.join('.'), 'macro');
    }
    return this.expandMacro(definition, args, kwargs, state, frame);
  }

  private findMacro(callee: readonly string[], state: RenderState): MacroDefinition | undefined {
    if (callee.length === 1) {
      const name = callee[0] ?? '';
      const local = state.localMacros.get(name);
      if (local) {
        return local;
      }
    }
    if (callee.length > 2) {
      return undefined;
    }

    const key =
      callee.length === 1 ? macroKey(callee[0] ?? '') : macroKey(callee[1] ?? '', callee[0]);
    const macro = this.project.macros.get(key);
    if (!macro) {
      return undefined;
    }

    let body = this.parsedMacros.get(key);
    if (!body) {
      body = parseTemplate(macro.body, state.model.name);
      this.parsedMacros.set(key, body);
    }
    return { name: key, parameters: macro.parameters, body };
  }

  private expandMacro(
    definition: MacroDefinition,
    args: readonly TemplateExpr[],
    kwargs: readonly KeywordArgument[],
    state: RenderState,
    frame: Frame
  ): string {
    const depth = frame.depth + 1;
    const chain = [...frame.chain, definition.name];
    if (depth > this.depthLimit) {
      throw new MacroRecursionError(state.model.name, chain, this.depthLimit);
    }

    const scope = new Map<string, TemplateLiteral>();
    definition.parameters.forEach((parameter, index) => {
      const positional = args[index];
      const keyword = kwargs.find((kw) => kw.name === parameter.name);
      let value: TemplateLiteral = null;
      if (positional) {
        value = this.evaluate(positional, state, frame);
      } else if (keyword) {
        value = this.evaluate(keyword.value, state, frame);
      } else if (parameter.default !== undefined) {
        value =
          typeof parameter.default === 'object' && parameter.default !== null
            ? this.evaluate(parameter.default, state, frame)
            : parameter.default;
      }
      scope.set(parameter.name, value);
    });

    if (!state.macros.includes(definition.name)) {
      state.macros.push(definition.name);
    }

    return this.renderNodes(definition.body, state, { scope, depth, chain });
  }
}
