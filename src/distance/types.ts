/**
 * Type definitions for the distance module
 */

import type { NodeId } from "../types";

/**
 * Reachability shells of one source: distance -> nodes at that distance
 */
export type DistanceShells = Map<number, NodeId[]>;

/**
 * Per source distances for one window: source -> target -> distance
 */
export type DistanceMap = Map<NodeId, Map<NodeId, number>>;
