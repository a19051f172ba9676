/**
 * Lineage Graph Builder
 *
 * Builds the model dependency graph from rendered references, rejects
 * cycles, and answers ordering and traversal questions for the pipeline,
 * model selection and impact analysis.
 *
 * @module core/lineage/graph-builder
 */

import type { ColumnLineage, ModelLineage, Reference } from '@lineagekit/types';

import { ConfigurationError, CyclicDependencyError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';

// =============================================================================
// TYPES
// =============================================================================

export interface GraphNode {
  name: string;
  references: readonly Reference[];
  /** Models this model reads, sorted by name */
  upstream: readonly string[];
  /** Models reading this model, sorted by name */
  downstream: readonly string[];
}

export interface GraphStats {
  modelCount: number;
  sourceCount: number;
  /** Model-to-model plus source-to-model edges */
  edgeCount: number;
  /** Number of waves in `levels()` */
  depth: number;
  rootCount: number;
  leafCount: number;
  resolvedCount: number;
}

const DEFAULT_MAX_DEPTH = Number.POSITIVE_INFINITY;

// =============================================================================
// GRAPH
// =============================================================================

/**
 * Acyclic model graph; column lineage is attached as models are resolved
 */
export class LineageGraph {
  private readonly nodes: ReadonlyMap<string, GraphNode>;
  private readonly order: readonly string[];
  private readonly waves: readonly (readonly string[])[];
  private readonly columns = new Map<string, readonly ColumnLineage[]>();

  constructor(
    nodes: ReadonlyMap<string, GraphNode>,
    order: readonly string[],
    waves: readonly (readonly string[])[]
  ) {
    this.nodes = nodes;
    this.order = order;
    this.waves = waves;
  }

  has(name: string): boolean {
    return this.nodes.has(name);
  }

  node(name: string): GraphNode | undefined {
    return this.nodes.get(name);
  }

  referencesOf(name: string): readonly Reference[] {
    return this.nodes.get(name)?.references ?? [];
  }

  /**
   * Models in dependency order; ties broken by name
   */
  topologicalOrder(): string[] {
    return [...this.order];
  }

  /**
   * Waves of mutually independent models; every model's upstream lies in earlier waves
   */
  levels(): string[][] {
    return this.waves.map((wave) => [...wave]);
  }

  setColumns(name: string, lineage: ModelLineage): void {
    if (!this.nodes.has(name)) {
      throw new ConfigurationError(`Unknown model '${name}'`);
    }
    this.columns.set(name, lineage.columns);
  }

  columnsOf(name: string): readonly ColumnLineage[] | undefined {
    return this.columns.get(name);
  }

  /**
   * Transitive upstream models, nearest first
   */
  upstreamOf(name: string, maxDepth = DEFAULT_MAX_DEPTH): string[] {
    return this.traverse(name, maxDepth, (node) => node.upstream);
  }

  /**
   * Transitive downstream models, nearest first
   */
  downstreamOf(name: string, maxDepth = DEFAULT_MAX_DEPTH): string[] {
    return this.traverse(name, maxDepth, (node) => node.downstream);
  }

  private traverse(
    name: string,
    maxDepth: number,
    next: (node: GraphNode) => readonly string[]
  ): string[] {
    const visited = new Set<string>([name]);
    const result: string[] = [];
    let frontier = [name];

    for (let depth = 0; depth < maxDepth && frontier.length > 0; depth++) {
      const discovered: string[] = [];
      for (const current of frontier) {
        const node = this.nodes.get(current);
        for (const neighbour of node ? next(node) : []) {
          if (!visited.has(neighbour)) {
            visited.add(neighbour);
            discovered.push(neighbour);
          }
        }
      }
      discovered.sort();
      result.push(...discovered);
      frontier = discovered;
    }

    return result;
  }

  stats(): GraphStats {
    const sources = new Set<string>();
    let edgeCount = 0;
    let rootCount = 0;
    let leafCount = 0;

    for (const node of this.nodes.values()) {
      edgeCount += node.upstream.length;
      for (const reference of node.references) {
        if (reference.kind === 'source') {
          sources.add(reference.target);
          edgeCount++;
        }
      }
      if (node.upstream.length === 0) {
        rootCount++;
      }
      if (node.downstream.length === 0) {
        leafCount++;
      }
    }

    return {
      modelCount: this.nodes.size,
      sourceCount: sources.size,
      edgeCount,
      depth: this.waves.length,
      rootCount,
      leafCount,
      resolvedCount: this.columns.size,
    };
  }
}

// =============================================================================
// BUILDER
// =============================================================================

/**
 * Collects models and their references, then builds an acyclic LineageGraph
 */
export class LineageGraphBuilder {
  private readonly references = new Map<string, readonly Reference[]>();
  private readonly pendingColumns = new Map<string, ModelLineage>();
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger({ name: 'lineage-graph-builder' });
  }

  addModel(name: string, references: readonly Reference[]): this {
    this.references.set(name, references);
    return this;
  }

  setColumns(name: string, lineage: ModelLineage): this {
    this.pendingColumns.set(name, lineage);
    return this;
  }

  /**
   * @throws CyclicDependencyError if model references form a cycle
   */
  build(): LineageGraph {
    const names = Array.from(this.references.keys()).sort();
    const upstream = new Map<string, string[]>();
    const downstream = new Map<string, string[]>(names.map((name) => [name, []]));

    for (const name of names) {
      const targets = new Set<string>();
      for (const reference of this.references.get(name) ?? []) {
        if (reference.kind === 'model' && this.references.has(reference.target)) {
          targets.add(reference.target);
        }
      }
      const sorted = Array.from(targets).sort();
      upstream.set(name, sorted);
      for (const target of sorted) {
        downstream.get(target)?.push(name);
      }
    }

    const cycle = findCycle(names, upstream);
    if (cycle) {
      this.logger.error({ cycle }, 'Cyclic model dependency detected');
      throw new CyclicDependencyError(cycle);
    }

    const order = kahnOrder(names, upstream, downstream);
    const waves = computeLevels(order, upstream);

    const nodes = new Map<string, GraphNode>();
    for (const name of names) {
      nodes.set(name, {
        name,
        references: this.references.get(name) ?? [],
        upstream: upstream.get(name) ?? [],
        downstream: (downstream.get(name) ?? []).sort(),
      });
    }

    const graph = new LineageGraph(nodes, order, waves);
    for (const [name, lineage] of this.pendingColumns) {
      graph.setColumns(name, lineage);
    }

    this.logger.debug({ models: names.length, levels: waves.length }, 'Lineage graph built');
    return graph;
  }
}

// =============================================================================
// ALGORITHMS
// =============================================================================

/**
 * First cycle in name order, as a closed path (`[a, b, a]`)
 */
function findCycle(
  names: readonly string[],
  upstream: ReadonlyMap<string, readonly string[]>
): string[] | undefined {
  const state = new Map<string, 'visiting' | 'done'>();
  const path: string[] = [];

  const visit = (name: string): string[] | undefined => {
    state.set(name, 'visiting');
    path.push(name);

    for (const next of upstream.get(name) ?? []) {
      const seen = state.get(next);
      if (seen === 'visiting') {
        return [...path.slice(path.indexOf(next)), next];
      }
      if (seen === undefined) {
        const cycle = visit(next);
        if (cycle) {
          return cycle;
        }
      }
    }

    path.pop();
    state.set(name, 'done');
    return undefined;
  };

  for (const name of names) {
    if (!state.has(name)) {
      const cycle = visit(name);
      if (cycle) {
        return cycle;
      }
    }
  }
  return undefined;
}

function kahnOrder(
  names: readonly string[],
  upstream: ReadonlyMap<string, readonly string[]>,
  downstream: ReadonlyMap<string, readonly string[]>
): string[] {
  const remaining = new Map(names.map((name) => [name, upstream.get(name)?.length ?? 0]));
  const ready = names.filter((name) => remaining.get(name) === 0);
  const order: string[] = [];

  while (ready.length > 0) {
    ready.sort();
    const next = ready.shift();
    if (next === undefined) {
      break;
    }
    order.push(next);
    for (const dependent of downstream.get(next) ?? []) {
      const count = (remaining.get(dependent) ?? 0) - 1;
      remaining.set(dependent, count);
      if (count === 0) {
        ready.push(dependent);
      }
    }
  }

  return order;
}

function computeLevels(
  order: readonly string[],
  upstream: ReadonlyMap<string, readonly string[]>
): string[][] {
  const level = new Map<string, number>();
  const waves: string[][] = [];

  for (const name of order) {
    const parents = (upstream.get(name) ?? []).map((parent) => level.get(parent) ?? 0);
    const depth = Math.max(-1, ...parents) + 1;
    level.set(name, depth);
    (waves[depth] ??= []).push(name);
  }

  return waves.map((wave) => wave.sort());
}

// =============================================================================
// VISUALIZATION
// =============================================================================

/**
 * Mermaid flowchart of the graph, sources drawn as cylinders
 *
 * Node ids are positional (`m<n>` for models in topological order, `s<n>` for
 * sources in name order); names appear only in labels.
 */
export function toMermaid(graph: LineageGraph): string {
  const order = graph.topologicalOrder();
  const modelIds = new Map(order.map((name, index): [string, string] => [name, `m${index}`]));
  const sourceNames = new Set<string>();
  for (const name of order) {
    for (const reference of graph.referencesOf(name)) {
      if (reference.kind === 'source') {
        sourceNames.add(reference.target);
      }
    }
  }
  const sourceIds = new Map(
    Array.from(sourceNames)
      .sort()
      .map((name, index): [string, string] => [name, `s${index}`])
  );

  const lines: string[] = ['graph LR'];
  for (const [name, id] of modelIds) {
    lines.push(`    ${id}["${name}"]`);
  }
  for (const [name, id] of sourceIds) {
    lines.push(`    ${id}[("${name}")]`);
  }

  for (const [name, id] of modelIds) {
    for (const reference of graph.referencesOf(name)) {
      const from =
        reference.kind === 'source'
          ? sourceIds.get(reference.target)
          : modelIds.get(reference.target);
      if (from) {
        lines.push(`    ${from} --> ${id}`);
      }
    }
  }

  return lines.join('\n');
}
