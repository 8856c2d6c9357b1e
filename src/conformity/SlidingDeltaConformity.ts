import type { DynamicGraph } from "../graph/types";
import type {
  NodeId,
  SlidingConformityRequest,
  SlidingConformityResult,
  TimeSeriesPoint,
} from "../types";
import { logger as defaultLogger } from "../utils/Logger";
import { computeWindow, type ConformityContext } from "./DeltaConformity";
import { alphaKey, generateProfiles, profileKey } from "./profiles";
import { parseRequest, SlidingRequestSchema } from "./validation";

/**
 * Window starts t of the temporal index with t + delta strictly before the
 * last temporal id
 */
export function windowStarts(temporalIds: readonly number[], delta: number): number[] {
  if (temporalIds.length === 0) {
    return [];
  }
  const last = temporalIds[temporalIds.length - 1];
  return temporalIds.filter((t) => t + delta < last);
}

/**
 * Delta-conformity over consecutive windows [t, t + delta] of the graph's
 * temporal index, as a time series per (alpha, profile, node) keyed by the
 * window end.
 *
 * Every graph node gets a series under every key, empty when no window is
 * admissible. A node absent from a window's snapshot gets no point for it.
 */
export function slidingDeltaConformity(
  graph: DynamicGraph,
  request: SlidingConformityRequest,
  context: ConformityContext = {},
): SlidingConformityResult {
  const validated = parseRequest(SlidingRequestSchema, request);
  const log = (context.logger ?? defaultLogger).child("SlidingDeltaConformity");
  const { delta, alphas, labels, profileSize } = validated;

  const profiles = generateProfiles(labels, profileSize);
  const series = createEmptySeries(graph.nodes(), alphas, profiles);
  const starts = windowStarts(graph.temporalSnapshotIds(), delta);

  log.info(`${starts.length} admissible windows for delta ${delta}`);

  for (const start of starts) {
    context.signal?.throwIfAborted();

    const window = computeWindow(graph, { ...validated, start }, context);
    const timestamp = start + delta;

    for (const [alpha, byProfile] of Object.entries(window)) {
      for (const [profile, scores] of Object.entries(byProfile)) {
        const bucket = series[alpha]?.[profile];
        if (!bucket) continue;
        for (const [node, score] of Object.entries(scores)) {
          const point: TimeSeriesPoint = [timestamp, score];
          const points = bucket[node];
          if (points) {
            points.push(point);
          } else {
            bucket[node] = [point];
          }
        }
      }
    }
  }

  return series;
}

function createEmptySeries(
  nodes: readonly NodeId[],
  alphas: readonly number[],
  profiles: readonly (readonly string[])[],
): SlidingConformityResult {
  const series: SlidingConformityResult = {};
  for (const alpha of alphas) {
    const byProfile: Record<string, Record<NodeId, TimeSeriesPoint[]>> = {};
    for (const profile of profiles) {
      const byNode: Record<NodeId, TimeSeriesPoint[]> = {};
      for (const node of nodes) {
        byNode[node] = [];
      }
      byProfile[profileKey(profile)] = byNode;
    }
    series[alphaKey(alpha)] = byProfile;
  }
  return series;
}
