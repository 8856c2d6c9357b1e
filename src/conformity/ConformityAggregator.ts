import type { DampingNormalizer } from "../distance/DampingNormalizer";
import type { DistanceShells } from "../distance/types";
import type { ConformityResult, NodeId } from "../types";
import type { LabelSimilarityScorer } from "./LabelSimilarityScorer";
import { alphaKey, profileKey } from "./profiles";

/**
 * Conformity accumulators of a single source node, one per (alpha, profile).
 * Each source owns its accumulator so nodes can be processed independently
 * and merged afterwards.
 */
export class NodeAccumulator {
  private values = new Map<string, Map<string, number>>();

  constructor(
    readonly node: NodeId,
    private readonly alphas: readonly number[],
    profiles: readonly (readonly string[])[],
  ) {
    for (const alpha of alphas) {
      const byProfile = new Map<string, number>();
      for (const profile of profiles) {
        byProfile.set(profileKey(profile), 0);
      }
      this.values.set(alphaKey(alpha), byProfile);
    }
  }

  add(alpha: number, profile: readonly string[], partial: number): void {
    const byProfile = this.values.get(alphaKey(alpha));
    const key = profileKey(profile);
    const current = byProfile?.get(key);
    if (byProfile === undefined || current === undefined) {
      throw new RangeError(
        `No accumulator for alpha ${alpha} and profile "${key}"`,
      );
    }
    byProfile.set(key, current + partial);
  }

  get(alpha: number, profile: readonly string[]): number | undefined {
    return this.values.get(alphaKey(alpha))?.get(profileKey(profile));
  }

  /**
   * Divide every accumulator by Σ_{k=1}^{maxDistance} k^-α of its alpha
   */
  normalize(maxDistance: number, normalizer: DampingNormalizer): void {
    for (const alpha of this.alphas) {
      const norm = normalizer.divisor(maxDistance, alpha);
      const byProfile = this.values.get(alphaKey(alpha));
      if (!byProfile) continue;
      for (const [key, value] of byProfile) {
        byProfile.set(key, value / norm);
      }
    }
  }

  entries(): Array<[alpha: string, profile: string, score: number]> {
    const entries: Array<[string, string, number]> = [];
    for (const [alpha, byProfile] of this.values) {
      for (const [profile, score] of byProfile) {
        entries.push([alpha, profile, score]);
      }
    }
    return entries;
  }
}

/**
 * Accumulate Σ_d sim(source, shell_d, profile) / d^α for every profile and
 * alpha. Shells are independent, so their order only matters up to
 * floating-point rounding.
 */
export function accumulate(
  source: NodeId,
  shells: DistanceShells,
  profiles: readonly (readonly string[])[],
  alphas: readonly number[],
  scorer: LabelSimilarityScorer,
  normalizer: DampingNormalizer,
): NodeAccumulator {
  const accumulator = new NodeAccumulator(source, alphas, profiles);

  for (const [distance, nodes] of shells) {
    if (distance === 0) continue;

    for (const profile of profiles) {
      const similarity = scorer.score(source, nodes, profile);
      for (const alpha of alphas) {
        accumulator.add(
          alpha,
          profile,
          similarity * normalizer.weight(distance, alpha),
        );
      }
    }
  }

  return accumulator;
}

/**
 * Result map with a 0 entry for every node, alpha and profile
 */
export function createEmptyResult(
  nodes: readonly NodeId[],
  alphas: readonly number[],
  profiles: readonly (readonly string[])[],
): ConformityResult {
  const result: ConformityResult = {};
  for (const alpha of alphas) {
    const byProfile: Record<string, Record<NodeId, number>> = {};
    for (const profile of profiles) {
      const scores: Record<NodeId, number> = {};
      for (const node of nodes) {
        scores[node] = 0;
      }
      byProfile[profileKey(profile)] = scores;
    }
    result[alphaKey(alpha)] = byProfile;
  }
  return result;
}

/**
 * Write per-node accumulators into a result created by createEmptyResult
 */
export function mergeAccumulators(
  result: ConformityResult,
  accumulators: Iterable<NodeAccumulator>,
): ConformityResult {
  for (const accumulator of accumulators) {
    for (const [alpha, profile, score] of accumulator.entries()) {
      const scores = result[alpha]?.[profile];
      if (scores) {
        scores[accumulator.node] = score;
      }
    }
  }
  return result;
}
