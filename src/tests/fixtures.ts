import { TemporalGraph } from "../graph/TemporalGraph";
import type { NodeAttributes } from "../types";
import { Logger, LogLevel } from "../utils/Logger";

export const quietLogger = new Logger({ level: LogLevel.ERROR, timestamp: false });

export const EXAMPLE_LABELS: Record<string, NodeAttributes> = {
  A: { labels: "yes" },
  B: { labels: "no" },
  C: { labels: "yes" },
  D: { labels: "no" },
};

/**
 * Four nodes in one component, interactions spread over times 1..9
 */
export function buildExampleGraph(
  labels: Record<string, NodeAttributes> = EXAMPLE_LABELS,
): TemporalGraph {
  const graph = new TemporalGraph();
  for (const [node, attributes] of Object.entries(labels)) {
    graph.addNode(node, attributes);
  }

  graph.addInteraction("A", "B", 1, 4);
  graph.addInteraction("B", "D", 2, 5);
  graph.addInteraction("A", "C", 4, 8);
  graph.addInteraction("B", "D", 2, 4);
  graph.addInteraction("B", "C", 6, 10);
  graph.addInteraction("A", "B", 7, 9);

  return graph;
}
