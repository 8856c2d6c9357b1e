import type { NodeId, PathPolicy } from "../types";
import type { PairDistances, PathOracle, TemporalSnapshot } from "./types";

/**
 * A time-respecting path summarised by what the policies rank on
 */
export interface PathSummary {
  hops: number;
  departure: number;
  arrival: number;
}

/**
 * Enumerates time-respecting paths over a temporal snapshot and reports,
 * per ordered pair, the hop count of the path each policy selects.
 *
 * A path takes one hop per temporal snapshot with strictly increasing times,
 * starts at the source and never comes back to it. For every departure time
 * only the earliest arrival per (target, hops) is kept.
 */
export class TimeRespectingPathOracle implements PathOracle {
  *distances(
    snapshot: TemporalSnapshot,
    from: number,
    to: number,
  ): Iterable<PairDistances> {
    const times = snapshot
      .temporalSnapshotIds()
      .filter((t) => t >= from && t <= to);
    const maxHops = Math.max(snapshot.nodes().length - 1, 0);

    for (const source of snapshot.nodes()) {
      const paths = this.collectPaths(snapshot, source, times, maxHops);
      for (const [target, summaries] of paths) {
        yield {
          source,
          target,
          distances: summarizePolicies(summaries),
        };
      }
    }
  }

  /**
   * All non-dominated path summaries from source, grouped by target
   */
  private collectPaths(
    snapshot: TemporalSnapshot,
    source: NodeId,
    times: number[],
    maxHops: number,
  ): Map<NodeId, PathSummary[]> {
    const paths = new Map<NodeId, PathSummary[]>();

    times.forEach((departure, index) => {
      const firstHop = snapshot.neighborsAt(source, departure);
      if (firstHop.length === 0) return;

      // target -> hops -> earliest arrival
      const reached = new Map<NodeId, Map<number, number>>();
      for (const neighbor of firstHop) {
        record(reached, neighbor, 1, departure);
      }

      for (const t of times.slice(index + 1)) {
        const moves: Array<[NodeId, number]> = [];
        for (const [node, byHops] of reached) {
          for (const [hops, arrival] of byHops) {
            if (arrival >= t || hops >= maxHops) continue;
            for (const next of snapshot.neighborsAt(node, t)) {
              if (next !== source) moves.push([next, hops + 1]);
            }
          }
        }
        // Apply after the scan so a snapshot is crossed at most once
        for (const [node, hops] of moves) {
          record(reached, node, hops, t);
        }
      }

      for (const [target, byHops] of reached) {
        let summaries = paths.get(target);
        if (!summaries) {
          summaries = [];
          paths.set(target, summaries);
        }
        for (const [hops, arrival] of byHops) {
          summaries.push({ hops, departure, arrival });
        }
      }
    });

    return paths;
  }
}

function record(
  reached: Map<NodeId, Map<number, number>>,
  node: NodeId,
  hops: number,
  arrival: number,
): void {
  let byHops = reached.get(node);
  if (!byHops) {
    byHops = new Map();
    reached.set(node, byHops);
  }
  // Times are visited in ascending order: the first record is the earliest
  if (!byHops.has(hops)) byHops.set(hops, arrival);
}

function duration(path: PathSummary): number {
  return path.arrival - path.departure;
}

/**
 * Paths minimising `rank`, ties kept
 */
function argMin(
  paths: PathSummary[],
  rank: (path: PathSummary) => number,
): PathSummary[] {
  const best = Math.min(...paths.map(rank));
  return paths.filter((path) => rank(path) === best);
}

function fewestHops(paths: PathSummary[]): number {
  return Math.min(...paths.map((path) => path.hops));
}

/**
 * Hop count of the path selected by each policy
 */
export function summarizePolicies(
  paths: PathSummary[],
): Record<PathPolicy, number> {
  const shortest = argMin(paths, (path) => path.hops);
  const fastest = argMin(paths, duration);
  const foremost = argMin(paths, (path) => path.arrival);

  return {
    shortest: fewestHops(shortest),
    fastest: fewestHops(fastest),
    foremost: fewestHops(foremost),
    fastest_shortest: fewestHops(argMin(fastest, (path) => path.hops)),
    shortest_fastest: fewestHops(argMin(shortest, duration)),
  };
}
