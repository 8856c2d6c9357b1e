import type { GraphSnapshot } from "../graph/types";
import type { LabelHierarchies, LabelValue, NodeId } from "../types";
import {
  InvalidArgumentError,
  PreconditionViolationError,
  UpstreamDataError,
} from "../types";
import { logger as defaultLogger, type Logger } from "../utils/Logger";

/** sgn for two different values of a label with no hierarchy */
export const OUT_OF_HIERARCHY_PENALTY = -1;

/**
 * Similarity between a source node and one reachability shell.
 * Implements s = Π_label mean_v( sgn(u, v) × f(v) ) over the profile's labels.
 *
 * One scorer is bound to one snapshot; homogeneity weights are memoised per
 * (label, node) for its lifetime.
 */
export class LabelSimilarityScorer {
  private homogeneityCache = new Map<string, Map<NodeId, number>>();
  private logger: Logger;

  constructor(
    private readonly snapshot: GraphSnapshot,
    private readonly hierarchies: LabelHierarchies = {},
    logger: Logger = defaultLogger,
  ) {
    this.logger = logger.child("LabelSimilarityScorer");
  }

  /**
   * @param source - Node whose conformity is being computed
   * @param candidates - Nodes at one temporal distance from source
   * @param profile - Labels evaluated jointly
   * @throws PreconditionViolationError if candidates is empty
   */
  score(
    source: NodeId,
    candidates: readonly NodeId[],
    profile: readonly string[],
  ): number {
    if (candidates.length === 0) {
      throw new PreconditionViolationError(
        `Empty shell for node ${source}`,
        "SCORE",
      );
    }

    let similarity = 1;
    for (const label of profile) {
      const sourceValue = this.labelValue(source, label);

      let sum = 0;
      for (const candidate of candidates) {
        const candidateValue = this.labelValue(candidate, label);
        sum +=
          this.agreement(label, sourceValue, candidateValue) *
          this.homogeneity(candidate, label);
      }

      similarity *= sum / candidates.length;
    }

    return similarity;
  }

  /**
   * sgn(u, v): 1 on equal values, graded hierarchy distance in [-1, 0]
   * when the label has a hierarchy, the fixed penalty otherwise
   */
  agreement(label: string, a: LabelValue, b: LabelValue): number {
    if (a === b) {
      return 1;
    }

    const hierarchy = Object.hasOwn(this.hierarchies, label)
      ? this.hierarchies[label]
      : undefined;
    if (!hierarchy) {
      return OUT_OF_HIERARCHY_PENALTY;
    }

    const size = Object.keys(hierarchy).length;
    return -Math.abs(rank(hierarchy, label, a) - rank(hierarchy, label, b)) / (size - 1);
  }

  /**
   * f(v): share of v's neighbours holding v's own value for the label.
   * A share of 0 counts as 1, and so does a node without neighbours.
   */
  homogeneity(node: NodeId, label: string): number {
    let byNode = this.homogeneityCache.get(label);
    if (!byNode) {
      byNode = new Map();
      this.homogeneityCache.set(label, byNode);
    }

    const cached = byNode.get(node);
    if (cached !== undefined) {
      return cached;
    }

    const value = this.labelValue(node, label);
    const neighbors = this.snapshot.neighbors(node);

    let weight: number;
    if (neighbors.length === 0) {
      this.logger.debug(
        `Node ${node} has no neighbours, homogeneity for "${label}" set to 1`,
      );
      weight = 1;
    } else {
      const same = neighbors.filter(
        (neighbor) => this.labelValue(neighbor, label) === value,
      ).length;
      const fraction = same / neighbors.length;
      weight = fraction > 0 ? fraction : 1;
    }

    byNode.set(node, weight);
    return weight;
  }

  private labelValue(node: NodeId, label: string): LabelValue {
    const value = this.snapshot.attributes(node)?.[label];
    if (value === undefined) {
      throw new UpstreamDataError(
        `Node ${node} has no value for label "${label}"`,
        "LABEL_VALUE",
      );
    }
    return value;
  }
}

function rank(
  hierarchy: Record<string, number>,
  label: string,
  value: LabelValue,
): number {
  const key = String(value);
  if (!Object.hasOwn(hierarchy, key)) {
    throw new InvalidArgumentError(
      `Value "${String(value)}" is missing from the hierarchy of label "${label}"`,
      "hierarchies",
    );
  }
  return hierarchy[key];
}
