/**
 * Model selection
 *
 * Selectors: `m` (the model), `+m` (with its ancestors), `m+` (with its
 * descendants), `+m+` (both). A number before or after the `+` limits the
 * depth (`2+m`, `m+1`). Several selectors are separated by commas or
 * whitespace; the result is their union in topological order.
 *
 * @module core/lineage/selection
 */

import { ConfigurationError } from '../errors.js';

import type { LineageGraph } from './graph-builder.js';

const SELECTOR = /^(?:(\d*)\+)?([^+\s,]+)(?:\+(\d*))?$/;

export interface ParsedSelector {
  model: string;
  /** Ancestor depth; 0 selects none */
  ancestors: number;
  /** Descendant depth; 0 selects none */
  descendants: number;
}

function depthOf(marker: string | undefined): number {
  if (marker === undefined) {
    return 0;
  }
  return marker === '' ? Number.POSITIVE_INFINITY : Number(marker);
}

/**
 * @throws ConfigurationError on malformed selectors
 */
export function parseSelector(selector: string): ParsedSelector {
  const match = SELECTOR.exec(selector);
  const model = match?.[2];
  if (!match || !model) {
    throw new ConfigurationError(`Invalid model selector: '${selector}'`);
  }
  return { model, ancestors: depthOf(match[1]), descendants: depthOf(match[3]) };
}

/**
 * Resolve a selection expression against the graph
 *
 * @throws ConfigurationError on malformed selectors or unknown models
 */
export function selectModels(graph: LineageGraph, expression: string): string[] {
  const selected = new Set<string>();

  for (const token of expression.split(/[\s,]+/).filter((part) => part.length > 0)) {
    const { model, ancestors, descendants } = parseSelector(token);
    if (!graph.has(model)) {
      throw new ConfigurationError(`Unknown model in selector: '${model}'`);
    }
    selected.add(model);
    if (ancestors > 0) {
      graph.upstreamOf(model, ancestors).forEach((name) => selected.add(name));
    }
    if (descendants > 0) {
      graph.downstreamOf(model, descendants).forEach((name) => selected.add(name));
    }
  }

  return graph.topologicalOrder().filter((name) => selected.has(name));
}
