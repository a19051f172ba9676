/**
 * Content fingerprints
 *
 * A node's fingerprint covers its own content, the fingerprints of everything
 * upstream of it and a version tag, so changing any ancestor changes every
 * descendant's cache keys.
 *
 * @module core/cache/fingerprint
 */

import { createHash } from 'node:crypto';

import {
  sourceId,
  type CacheArtifactKind,
  type Macro,
  type Model,
  type Reference,
  type Source,
  type SqlDialect,
} from '@lineagekit/types';

import type { Project } from '../lineage/project.js';

/** Bumped whenever rendering or resolution semantics change */
export const ENGINE_VERSION = '1.0.0';

const SEPARATOR = '\u0000';

function sha256(...parts: readonly string[]): string {
  const hash = createHash('sha256');
  for (const part of parts) {
    hash.update(part);
    hash.update(SEPARATOR);
  }
  return hash.digest('hex');
}

/**
 * Fingerprint of one node: raw text, sorted upstream fingerprints, version tag
 */
export function fingerprintNode(
  rawText: string,
  upstreamFingerprints: readonly string[],
  versionTag: string
): string {
  return sha256(rawText, ...[...upstreamFingerprints].sort(), versionTag);
}

/**
 * Store key of one artifact kind for a fingerprint
 */
export function cacheKey(kind: CacheArtifactKind, fingerprint: string): string {
  return sha256(kind, fingerprint);
}

/**
 * Tag covering everything outside a model that changes how it renders or resolves
 */
export function computeVersionTag(project: Project, dialect: SqlDialect): string {
  const macros = Array.from(project.macros.entries())
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([key, macro]) => [key, macro.parameters, macro.body]);
  const vars = Object.entries(project.vars).sort(([a], [b]) => a.localeCompare(b));

  return sha256(
    ENGINE_VERSION,
    dialect,
    project.schema,
    JSON.stringify(macros),
    JSON.stringify(vars)
  );
}

function declaredColumns(columns: Model['columns'] | Source['columns']): string {
  return JSON.stringify((columns ?? []).map((column) => column.name));
}

export function fingerprintSource(source: Source, versionTag: string): string {
  const text = `source:${sourceId(source)}:${declaredColumns(source.columns)}`;
  return fingerprintNode(text, [], versionTag);
}

export function fingerprintModel(
  model: Model,
  upstreamFingerprints: readonly string[],
  versionTag: string
): string {
  return fingerprintNode(
    `model:${model.name}:${model.rawSql}:${declaredColumns(model.columns)}`,
    upstreamFingerprints,
    versionTag
  );
}

/**
 * Key material for a model's rendered SQL, known before the graph exists
 */
export function renderFingerprint(model: Model, versionTag: string): string {
  return fingerprintNode(`render:${model.name}:${model.rawSql}`, [], versionTag);
}

/**
 * Fingerprint every model in topological order
 *
 * `referencesOf` returns the references a model rendered with; models that
 * failed to render have none.
 */
export function computeFingerprints(
  project: Project,
  order: readonly string[],
  referencesOf: (model: string) => readonly Reference[],
  versionTag: string
): Map<string, string> {
  const fingerprints = new Map<string, string>();
  const sourceFingerprints = new Map<string, string>();

  for (const name of order) {
    const model = project.models.get(name);
    if (!model) {
      continue;
    }

    const upstream: string[] = [];
    for (const reference of referencesOf(name)) {
      if (reference.kind === 'model') {
        const fingerprint = fingerprints.get(reference.target);
        if (fingerprint) {
          upstream.push(fingerprint);
        }
        continue;
      }

      let fingerprint = sourceFingerprints.get(reference.target);
      const source = project.sources.get(reference.target);
      if (!fingerprint && source) {
        fingerprint = fingerprintSource(source, versionTag);
        sourceFingerprints.set(reference.target, fingerprint);
      }
      if (fingerprint) {
        upstream.push(fingerprint);
      }
    }

    fingerprints.set(name, fingerprintModel(model, upstream, versionTag));
  }

  return fingerprints;
}

/**
 * Current state of each relation a model's lineage reads, including
 * relations named in plain SQL rather than through a reference
 *
 * A model contributes its fingerprint, a source its declared columns, and
 * any other name only the fact that it is neither.
 */
export function fingerprintProducers(
  project: Project,
  producers: readonly string[],
  fingerprints: ReadonlyMap<string, string>,
  versionTag: string
): string[] {
  return producers.map((producer) => {
    if (project.models.has(producer)) {
      return `model:${producer}:${fingerprints.get(producer) ?? 'unknown'}`;
    }
    const source = project.sources.get(producer);
    if (source) {
      return `source:${producer}:${fingerprintSource(source, versionTag)}`;
    }
    return `undeclared:${producer}`;
  });
}

/**
 * Fingerprint of a model's own text, independent of macros and upstream models
 */
export function contentFingerprint(model: Model): string {
  return fingerprintNode(`content:${model.name}:${model.rawSql}`, [], ENGINE_VERSION);
}

export function macroFingerprint(key: string, macro: Macro): string {
  const text = `macro:${key}:${JSON.stringify(macro.parameters)}:${macro.body}`;
  return fingerprintNode(text, [], ENGINE_VERSION);
}
