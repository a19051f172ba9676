/**
 * Project loader
 *
 * Reads model and macro files from a project directory into project input.
 * Documentation (descriptions, declared columns, sources) comes from the
 * caller.
 *
 * @module core/lineage/project-loader
 */

import { readdir, readFile } from 'node:fs/promises';
import { basename, join, relative, sep } from 'node:path';

import type { MacroInput, Model, TemplateLiteral } from '@lineagekit/types';

import { ConfigurationError, TemplateSyntaxError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { parseTemplate } from '../templating/parser.js';
import { mapInBatches } from '../utils.js';

export interface LoadProjectOptions {
  /** Directory names holding models, relative to the root (default: `['models']`) */
  modelPaths?: readonly string[];
  /** Directory names holding macros, relative to the root (default: `['macros']`) */
  macroPaths?: readonly string[];
  /** Namespace assigned to loaded macros */
  macroPackage?: string;
  /** Concurrent file reads (default: 16) */
  concurrency?: number;
  logger?: Logger;
}

export interface LoadedProjectFiles {
  models: Model[];
  macros: MacroInput[];
}

async function readEntries(directory: string) {
  try {
    return await readdir(directory, { withFileTypes: true });
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }
}

async function listSqlFiles(directory: string): Promise<string[]> {
  const entries = await readEntries(directory);
  const files: string[] = [];
  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    const path = join(directory, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listSqlFiles(path)));
    } else if (entry.isFile() && entry.name.endsWith('.sql')) {
      files.push(path);
    }
  }
  return files;
}

function toPosix(path: string): string {
  return path.split(sep).join('/');
}

/**
 * Macros defined by one file; only literal parameter defaults are supported
 */
export function extractMacros(text: string, file: string, macroPackage?: string): MacroInput[] {
  const macros: MacroInput[] = [];

  for (const node of parseTemplate(text, file)) {
    if (node.kind !== 'macro') {
      continue;
    }
    const parameters = node.parameters.map((parameter) => {
      if (parameter.default === undefined) {
        return { name: parameter.name };
      }
      if (parameter.default.kind !== 'literal') {
        throw new TemplateSyntaxError(
          file,
          `default of parameter '${parameter.name}' in macro '${node.name}' must be a literal`,
          0
        );
      }
      const value: TemplateLiteral = parameter.default.value;
      return { name: parameter.name, default: value };
    });
    macros.push({ name: node.name, package: macroPackage, parameters, body: node.source });
  }

  return macros;
}

/**
 * Read `models/**\/*.sql` and `macros/**\/*.sql` under `rootDir`
 *
 * @throws ConfigurationError when two model files share a name
 */
export async function loadProjectFiles(
  rootDir: string,
  options: LoadProjectOptions = {}
): Promise<LoadedProjectFiles> {
  const logger = options.logger ?? createLogger({ name: 'project-loader' });
  const concurrency = options.concurrency ?? 16;
  const listAll = async (dirs: readonly string[]): Promise<string[]> =>
    (await Promise.all(dirs.map((dir) => listSqlFiles(join(rootDir, dir))))).flat();

  const modelFiles = await listAll(options.modelPaths ?? ['models']);
  const macroFiles = await listAll(options.macroPaths ?? ['macros']);

  const models = await mapInBatches(modelFiles, concurrency, async (file): Promise<Model> => ({
    name: basename(file, '.sql'),
    rawSql: await readFile(file, 'utf8'),
    path: toPosix(relative(rootDir, file)),
  }));

  const seen = new Map<string, string>();
  for (const model of models) {
    const previous = seen.get(model.name);
    if (previous) {
      throw new ConfigurationError(
        `Duplicate model name '${model.name}' in ${previous} and ${model.path}`,
        { model: model.name, paths: [previous, model.path] }
      );
    }
    seen.set(model.name, model.path);
  }

  const macros = (
    await mapInBatches(macroFiles, concurrency, async (file) => {
      const path = toPosix(relative(rootDir, file));
      return extractMacros(await readFile(file, 'utf8'), path, options.macroPackage);
    })
  ).flat();

  logger.info({ rootDir, models: models.length, macros: macros.length }, 'Project files loaded');
  return { models, macros };
}
