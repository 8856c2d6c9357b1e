import type { NodeAttributes, NodeId } from "../types";
import { InvalidArgumentError } from "../types";
import type { DynamicGraph, Interaction, TemporalSnapshot } from "./types";

/**
 * In-memory dynamic graph with interval-annotated undirected interactions
 */
export class TemporalGraph implements DynamicGraph {
  private nodeAttributes = new Map<NodeId, NodeAttributes>();
  private interactions: Interaction[] = [];

  /**
   * Add a node, or merge attributes into an existing one
   */
  addNode(node: NodeId, attributes: NodeAttributes = {}): this {
    const existing = this.nodeAttributes.get(node);
    this.nodeAttributes.set(node, { ...existing, ...attributes });
    return this;
  }

  setNodeAttributes(node: NodeId, attributes: NodeAttributes): this {
    if (!this.nodeAttributes.has(node)) {
      throw new InvalidArgumentError(`Unknown node: ${node}`, "node");
    }
    this.nodeAttributes.set(node, { ...attributes });
    return this;
  }

  /**
   * Add an interaction present at every integer time in [from, until)
   * @param until - Removal time, defaults to from + 1
   */
  addInteraction(
    source: NodeId,
    target: NodeId,
    from: number,
    until: number = from + 1,
  ): this {
    if (source === target) {
      throw new InvalidArgumentError(
        `Self interactions are not supported: ${source}`,
        "target",
      );
    }
    if (!Number.isInteger(from) || !Number.isInteger(until)) {
      throw new InvalidArgumentError(
        `Interaction times must be integers, got [${from}, ${until})`,
        "from",
      );
    }
    if (until <= from) {
      throw new InvalidArgumentError(
        `Interaction removal time ${until} must be after ${from}`,
        "until",
      );
    }

    if (!this.nodeAttributes.has(source)) this.addNode(source);
    if (!this.nodeAttributes.has(target)) this.addNode(target);

    this.interactions.push({ source, target, from, until });
    return this;
  }

  nodes(): NodeId[] {
    return [...this.nodeAttributes.keys()];
  }

  hasNode(node: NodeId): boolean {
    return this.nodeAttributes.has(node);
  }

  attributes(node: NodeId): NodeAttributes | undefined {
    const attributes = this.nodeAttributes.get(node);
    return attributes ? { ...attributes } : undefined;
  }

  /**
   * Every instant at which some interaction is present, ascending. The index
   * holds one id per covered instant, so its length (and the number of
   * sliding windows) grows with the total span of the intervals; overlapping
   * intervals are merged and each instant is visited once.
   */
  temporalSnapshotIds(): number[] {
    const intervals = this.interactions
      .map(({ from, until }) => [from, until] as const)
      .sort((a, b) => a[0] - b[0]);

    const ids: number[] = [];
    let covered = -Infinity;
    for (const [from, until] of intervals) {
      for (let t = Math.max(from, covered); t < until; t++) {
        ids.push(t);
      }
      covered = Math.max(covered, until);
    }
    return ids;
  }

  getInteractions(): Interaction[] {
    return this.interactions.map((interaction) => ({ ...interaction }));
  }

  timeSlice(from: number, to: number): TemporalSnapshot {
    if (to < from) {
      throw new InvalidArgumentError(
        `Invalid temporal range [${from}, ${to}]`,
        "to",
      );
    }

    const adjacency = new Map<number, Map<NodeId, Set<NodeId>>>();
    const present = new Set<NodeId>();

    for (const { source, target, from: start, until } of this.interactions) {
      const first = Math.max(start, Math.ceil(from));
      const last = Math.min(until - 1, Math.floor(to));
      for (let t = first; t <= last; t++) {
        let atTime = adjacency.get(t);
        if (!atTime) {
          atTime = new Map();
          adjacency.set(t, atTime);
        }
        link(atTime, source, target);
        link(atTime, target, source);
        present.add(source);
        present.add(target);
      }
    }

    // Keep the graph's node insertion order
    const nodes = this.nodes().filter((node) => present.has(node));
    const attributes = new Map<NodeId, NodeAttributes>();
    for (const node of nodes) {
      attributes.set(node, { ...this.nodeAttributes.get(node) });
    }

    return new TemporalGraphSnapshot(nodes, attributes, adjacency);
  }
}

function link(atTime: Map<NodeId, Set<NodeId>>, from: NodeId, to: NodeId): void {
  let neighbors = atTime.get(from);
  if (!neighbors) {
    neighbors = new Set();
    atTime.set(from, neighbors);
  }
  neighbors.add(to);
}

/**
 * Immutable slice of a TemporalGraph over a closed temporal range
 */
export class TemporalGraphSnapshot implements TemporalSnapshot {
  private readonly times: number[];
  private readonly staticNeighbors = new Map<NodeId, NodeId[]>();

  constructor(
    private readonly nodeList: NodeId[],
    private readonly nodeAttributes: Map<NodeId, NodeAttributes>,
    private readonly adjacency: Map<number, Map<NodeId, Set<NodeId>>>,
  ) {
    this.times = [...adjacency.keys()].sort((a, b) => a - b);

    const union = new Map<NodeId, Set<NodeId>>();
    for (const t of this.times) {
      for (const [node, neighbors] of adjacency.get(t) ?? []) {
        let all = union.get(node);
        if (!all) {
          all = new Set();
          union.set(node, all);
        }
        for (const neighbor of neighbors) all.add(neighbor);
      }
    }
    for (const node of nodeList) {
      this.staticNeighbors.set(node, [...(union.get(node) ?? [])]);
    }
  }

  nodes(): NodeId[] {
    return [...this.nodeList];
  }

  attributes(node: NodeId): NodeAttributes | undefined {
    return this.nodeAttributes.get(node);
  }

  neighbors(node: NodeId): NodeId[] {
    return this.staticNeighbors.get(node) ?? [];
  }

  temporalSnapshotIds(): number[] {
    return [...this.times];
  }

  neighborsAt(node: NodeId, time: number): NodeId[] {
    const neighbors = this.adjacency.get(time)?.get(node);
    return neighbors ? [...neighbors] : [];
  }
}
