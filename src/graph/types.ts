import type { NodeAttributes, NodeId, PathPolicy } from "../types";

/**
 * Static view of a dynamic graph restricted to a temporal range
 */
export interface GraphSnapshot {
  nodes(): NodeId[];
  attributes(node: NodeId): NodeAttributes | undefined;
  /** Neighbours over the whole range, regardless of when the edge was active */
  neighbors(node: NodeId): NodeId[];
}

/**
 * Snapshot that still knows when each edge was active
 */
export interface TemporalSnapshot extends GraphSnapshot {
  temporalSnapshotIds(): number[];
  neighborsAt(node: NodeId, time: number): NodeId[];
}

export interface SnapshotProvider {
  /** Closed range [from, to] */
  timeSlice(from: number, to: number): TemporalSnapshot;
}

export interface TemporalIndexProvider {
  /** Ascending temporal ids at which the graph has activity */
  temporalSnapshotIds(): number[];
  nodes(): NodeId[];
}

export type DynamicGraph = SnapshotProvider & TemporalIndexProvider;

/**
 * Distances between one ordered pair, one integer per path policy
 */
export interface PairDistances {
  source: NodeId;
  target: NodeId;
  distances: Partial<Record<PathPolicy, number>>;
}

/**
 * Time-respecting path oracle
 */
export interface PathOracle {
  distances(
    snapshot: TemporalSnapshot,
    from: number,
    to: number,
  ): Iterable<PairDistances>;
}

/**
 * Interaction between two nodes, present at every integer time t with
 * from <= t < until
 */
export interface Interaction {
  source: NodeId;
  target: NodeId;
  from: number;
  until: number;
}
