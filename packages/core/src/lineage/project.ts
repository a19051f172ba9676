/**
 * Immutable project value
 *
 * Built once per run from validated input and passed explicitly to every
 * pipeline component.
 *
 * @module core/lineage/project
 */

import {
  ProjectInputSchema,
  sourceId,
  type Macro,
  type Model,
  type ProjectInput,
  type Source,
  type TemplateLiteral,
} from '@lineagekit/types';

import { ConfigurationError } from '../errors.js';

export interface Project {
  readonly models: ReadonlyMap<string, Model>;
  /** Keyed by `<sourceName>.<name>` */
  readonly sources: ReadonlyMap<string, Source>;
  /** Keyed by `macroKey()` */
  readonly macros: ReadonlyMap<string, Macro>;
  readonly vars: Readonly<Record<string, TemplateLiteral>>;
  readonly schema: string;
}

/**
 * Registry key of a macro, `<package>.<name>` for namespaced macros
 */
export function macroKey(name: string, pkg?: string): string {
  return pkg ? `${pkg}.${name}` : name;
}

/**
 * Relation identifier a model is materialized as
 */
export function modelRelation(project: Pick<Project, 'schema'>, model: string): string {
  return `${project.schema}.${model}`;
}

function indexUnique<T>(
  items: readonly T[],
  keyOf: (item: T) => string,
  what: string
): Map<string, T> {
  const index = new Map<string, T>();
  const duplicates: string[] = [];
  for (const item of items) {
    const key = keyOf(item);
    if (index.has(key)) {
      duplicates.push(key);
    }
    index.set(key, Object.freeze(item));
  }
  if (duplicates.length > 0) {
    throw new ConfigurationError(`Duplicate ${what}: ${duplicates.join(', ')}`, { duplicates });
  }
  return index;
}

/**
 * Validate project input and build the immutable project value
 *
 * @throws ConfigurationError if the input is invalid or names collide
 */
export function createProject(input: ProjectInput): Project {
  const result = ProjectInputSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError('Invalid project definition', result.error.flatten());
  }
  const definition = result.data;

  return Object.freeze({
    models: indexUnique(definition.models, (model) => model.name, 'model names'),
    sources: indexUnique(definition.sources, sourceId, 'sources'),
    macros: indexUnique(
      definition.macros,
      (macro) => macroKey(macro.name, macro.package),
      'macros'
    ),
    vars: Object.freeze({ ...definition.vars }),
    schema: definition.schema,
  });
}
