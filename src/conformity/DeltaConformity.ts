import { DampingNormalizer } from "../distance/DampingNormalizer";
import { buildShells, maxShellDistance } from "../distance/DistanceShellBuilder";
import type { DistanceMap } from "../distance/types";
import { TimeRespectingPathOracle } from "../graph/TimeRespectingPathOracle";
import type {
  PairDistances,
  PathOracle,
  SnapshotProvider,
  TemporalSnapshot,
} from "../graph/types";
import type {
  ConformityResult,
  NodeId,
  PathPolicy,
  WindowConformityRequest,
} from "../types";
import { UpstreamDataError } from "../types";
import { logger as defaultLogger, type Logger } from "../utils/Logger";
import {
  accumulate,
  createEmptyResult,
  mergeAccumulators,
  type NodeAccumulator,
} from "./ConformityAggregator";
import { LabelSimilarityScorer } from "./LabelSimilarityScorer";
import { generateProfiles } from "./profiles";
import {
  parseRequest,
  WindowRequestSchema,
  type ValidatedWindowRequest,
} from "./validation";

/**
 * Collaborators of a conformity computation
 */
export interface ConformityContext {
  /** Defaults to the in-memory TimeRespectingPathOracle */
  oracle?: PathOracle;
  logger?: Logger;
  /** Checked between node iterations */
  signal?: AbortSignal;
}

/**
 * Delta-conformity of every node of the window [start, start + delta].
 *
 * @returns alpha key -> profile key -> node -> score, with every snapshot
 * node present under every key (0 when nothing is reachable)
 * @throws InvalidArgumentError before the graph is touched if the request is invalid
 * @throws UpstreamDataError if the oracle reports inconsistent distances
 */
export function deltaConformity(
  graph: SnapshotProvider,
  request: WindowConformityRequest,
  context: ConformityContext = {},
): ConformityResult {
  const validated = parseRequest(WindowRequestSchema, request);
  return computeWindow(graph, validated, context);
}

/**
 * Window computation on an already validated request
 */
export function computeWindow(
  graph: SnapshotProvider,
  request: ValidatedWindowRequest,
  context: ConformityContext = {},
): ConformityResult {
  const log = (context.logger ?? defaultLogger).child("DeltaConformity");
  const oracle = context.oracle ?? new TimeRespectingPathOracle();
  const { start, delta, alphas, labels, profileSize, hierarchies, pathPolicy } =
    request;
  const end = start + delta;

  context.signal?.throwIfAborted();

  const profiles = generateProfiles(labels, profileSize);
  const snapshot = graph.timeSlice(start, end);
  const nodes = snapshot.nodes();

  log.debug(
    `Window [${start}, ${end}]: ${nodes.length} nodes, ${profiles.length} profiles, ${alphas.length} alphas, policy ${pathPolicy}`,
  );

  const distances = extractDistances(
    snapshot,
    oracle.distances(snapshot, start, end),
    pathPolicy,
  );

  const scorer = new LabelSimilarityScorer(
    snapshot,
    hierarchies,
    context.logger ?? defaultLogger,
  );
  const normalizer = new DampingNormalizer();
  const accumulators: NodeAccumulator[] = [];

  for (const node of nodes) {
    context.signal?.throwIfAborted();

    const shells = buildShells(distances.get(node) ?? new Map<NodeId, number>());
    const accumulator = accumulate(
      node,
      shells,
      profiles,
      alphas,
      scorer,
      normalizer,
    );

    const maxDistance = maxShellDistance(shells);
    if (maxDistance !== undefined) {
      accumulator.normalize(maxDistance, normalizer);
    }

    accumulators.push(accumulator);
  }

  const result = mergeAccumulators(
    createEmptyResult(nodes, alphas, profiles),
    accumulators,
  );

  log.debug(`Window [${start}, ${end}] done`);
  return result;
}

/**
 * Select one policy's distance per pair and check it against the snapshot
 */
export function extractDistances(
  snapshot: TemporalSnapshot,
  pairs: Iterable<PairDistances>,
  policy: PathPolicy,
): DistanceMap {
  const known = new Set(snapshot.nodes());
  const distances: DistanceMap = new Map();

  for (const { source, target, distances: byPolicy } of pairs) {
    if (!known.has(source) || !known.has(target)) {
      throw new UpstreamDataError(
        `Distance reported for pair (${source}, ${target}) outside the snapshot`,
        "EXTRACT_DISTANCES",
      );
    }

    const distance = byPolicy[policy];
    if (distance === undefined) {
      throw new UpstreamDataError(
        `No "${policy}" distance for pair (${source}, ${target})`,
        "EXTRACT_DISTANCES",
      );
    }
    if (!Number.isInteger(distance) || distance < 0) {
      throw new UpstreamDataError(
        `Invalid distance ${distance} for pair (${source}, ${target})`,
        "EXTRACT_DISTANCES",
      );
    }
    if ((source === target) !== (distance === 0)) {
      throw new UpstreamDataError(
        `Distance ${distance} is inconsistent for pair (${source}, ${target})`,
        "EXTRACT_DISTANCES",
      );
    }

    let fromSource = distances.get(source);
    if (!fromSource) {
      fromSource = new Map();
      distances.set(source, fromSource);
    }
    fromSource.set(target, distance);
  }

  return distances;
}
