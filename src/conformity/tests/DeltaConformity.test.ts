import { describe, it, expect, vi } from "vitest";
import { deltaConformity, extractDistances } from "../DeltaConformity";
import type { PairDistances, PathOracle, SnapshotProvider } from "../../graph/types";
import { TemporalGraph } from "../../graph/TemporalGraph";
import type { WindowConformityRequest } from "../../types";
import { InvalidArgumentError, UpstreamDataError } from "../../types";
import { buildExampleGraph, quietLogger } from "../../tests/fixtures";

const baseRequest: WindowConformityRequest = {
  start: 1,
  delta: 5,
  alphas: [1],
  labels: ["labels"],
  profileSize: 1,
  pathPolicy: "fastest",
};

function stubOracle(pairs: PairDistances[]): PathOracle {
  return { distances: () => pairs };
}

describe("deltaConformity", () => {
  const graph = buildExampleGraph();

  it("should score every node of the window with fastest paths", () => {
    const result = deltaConformity(graph, baseRequest, { logger: quietLogger });

    expect(Object.keys(result)).toEqual(["1"]);
    expect(Object.keys(result["1"])).toEqual(["labels"]);

    const scores = result["1"]["labels"];
    expect(Object.keys(scores)).toEqual(["A", "B", "C", "D"]);
    expect(scores.A).toBeCloseTo(-5 / 18, 12);
    expect(scores.B).toBeCloseTo(0, 12);
    expect(scores.C).toBeCloseTo(1 / 12, 12);
    expect(scores.D).toBeCloseTo(1 / 18, 12);
  });

  it("should keep scores inside [-1, 1] for the example window", () => {
    const result = deltaConformity(
      graph,
      { ...baseRequest, alphas: [1, 1.4, 2, 3] },
      { logger: quietLogger },
    );

    for (const byProfile of Object.values(result)) {
      for (const value of Object.values(byProfile.labels)) {
        expect(value).toBeGreaterThanOrEqual(-1);
        expect(value).toBeLessThanOrEqual(1);
      }
    }
  });

  it("should use the requested path policy", () => {
    const result = deltaConformity(
      graph,
      { ...baseRequest, pathPolicy: "foremost" },
      { logger: quietLogger },
    );

    // D reaches C in three hops under foremost paths
    expect(result["1"]["labels"].D).toBeCloseTo(-1 / 22, 12);
    expect(result["1"]["labels"].A).toBeCloseTo(-5 / 18, 12);
  });

  it("should key results by every alpha", () => {
    const result = deltaConformity(
      graph,
      { ...baseRequest, alphas: [1, 2] },
      { logger: quietLogger },
    );

    expect(Object.keys(result)).toEqual(["1", "2"]);
    expect(result["2"]["labels"].A).toBeCloseTo(-2 / 15, 12);
    expect(result["2"]["labels"].D).toBeCloseTo(1 / 6, 12);
  });

  it("should key results by every profile", () => {
    const twoLabels = buildExampleGraph({
      A: { labels: "yes", group: "g1" },
      B: { labels: "no", group: "g1" },
      C: { labels: "yes", group: "g1" },
      D: { labels: "no", group: "g1" },
    });

    const result = deltaConformity(
      twoLabels,
      { ...baseRequest, labels: ["labels", "group"], profileSize: 2 },
      { logger: quietLogger },
    );

    expect(Object.keys(result["1"])).toEqual(["labels", "group", "labels_group"]);
    // every neighbour shares the group, so it never changes the product
    expect(result["1"]["group"].A).toBeCloseTo(1, 12);
    expect(result["1"]["labels_group"].A).toBeCloseTo(-5 / 18, 12);
  });

  it("should score exactly 0 for nodes with nothing reachable", () => {
    const oracle = stubOracle([
      { source: "A", target: "B", distances: { shortest: 1 } },
    ]);

    const result = deltaConformity(
      graph,
      { ...baseRequest, pathPolicy: "shortest" },
      { oracle, logger: quietLogger },
    );

    const scores = result["1"]["labels"];
    expect(scores.A).toBeCloseTo(-1 / 3, 12);
    expect(scores.B).toBe(0);
    expect(scores.C).toBe(0);
    expect(scores.D).toBe(0);
  });

  it("should ignore distance 0 entries", () => {
    const oracle = stubOracle([
      { source: "A", target: "A", distances: { shortest: 0 } },
    ]);

    const result = deltaConformity(
      graph,
      { ...baseRequest, pathPolicy: "shortest" },
      { oracle, logger: quietLogger },
    );

    expect(result["1"]["labels"].A).toBe(0);
  });

  describe("argument validation", () => {
    function spyGraph() {
      const timeSlice = vi.fn((from: number, to: number) => graph.timeSlice(from, to));
      const provider: SnapshotProvider = { timeSlice };
      return { provider, timeSlice };
    }

    it("should reject profileSize above the label count before touching the graph", () => {
      const { provider, timeSlice } = spyGraph();

      expect(() =>
        deltaConformity(provider, { ...baseRequest, profileSize: 2 }),
      ).toThrow(InvalidArgumentError);
      expect(timeSlice).not.toHaveBeenCalled();
    });

    it("should reject empty alphas and labels", () => {
      const { provider, timeSlice } = spyGraph();

      expect(() => deltaConformity(provider, { ...baseRequest, alphas: [] })).toThrow(
        "alphas: At least one alpha is required",
      );
      expect(() => deltaConformity(provider, { ...baseRequest, labels: [] })).toThrow(
        InvalidArgumentError,
      );
      expect(timeSlice).not.toHaveBeenCalled();
    });

    it("should reject non-positive alphas", () => {
      expect(() => deltaConformity(graph, { ...baseRequest, alphas: [0] })).toThrow(
        "damping factor must be a positive finite number, got 0",
      );
    });

    it("should reject hierarchies with a single value", () => {
      expect(() =>
        deltaConformity(graph, {
          ...baseRequest,
          hierarchies: { labels: { yes: 0 } },
        }),
      ).toThrow("a hierarchy needs at least two values");
    });

    it("should reject labels whose profiles share a result key", () => {
      const { provider, timeSlice } = spyGraph();

      try {
        deltaConformity(provider, {
          ...baseRequest,
          labels: ["a", "b", "a_b"],
          profileSize: 2,
        });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidArgumentError);
        if (error instanceof InvalidArgumentError) {
          expect(error.field).toBe("labels");
          expect(error.message).toBe(
            'Invalid conformity request: labels: profile key "a_b" is produced by more than one profile',
          );
        }
      }
      expect(timeSlice).not.toHaveBeenCalled();
    });

    it("should accept a joined label name when no pair spells it", () => {
      const joined = new TemporalGraph()
        .addNode("X", { a: 1, b: 2, a_b: 3 })
        .addNode("Y", { a: 1, b: 2, a_b: 3 })
        .addInteraction("X", "Y", 1);

      const result = deltaConformity(
        joined,
        { ...baseRequest, labels: ["a", "b", "a_b"] },
        { logger: quietLogger },
      );

      expect(result).toEqual({
        "1": {
          a: { X: 1, Y: 1 },
          b: { X: 1, Y: 1 },
          a_b: { X: 1, Y: 1 },
        },
      });
    });

    it("should report the offending field", () => {
      try {
        deltaConformity(graph, { ...baseRequest, profileSize: 3 });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidArgumentError);
        if (error instanceof InvalidArgumentError) {
          expect(error.field).toBe("profileSize");
          expect(error.code).toBe("INVALID_ARGUMENT");
        }
      }
    });
  });

  it("should stop when the signal is aborted", () => {
    const controller = new AbortController();
    controller.abort(new Error("deadline"));

    expect(() =>
      deltaConformity(graph, baseRequest, {
        logger: quietLogger,
        signal: controller.signal,
      }),
    ).toThrow("deadline");
  });
});

describe("extractDistances", () => {
  const snapshot = buildExampleGraph().timeSlice(1, 6);

  it("should keep the requested policy per source", () => {
    const distances = extractDistances(
      snapshot,
      [
        { source: "A", target: "B", distances: { shortest: 1, foremost: 2 } },
        { source: "A", target: "D", distances: { shortest: 2, foremost: 3 } },
      ],
      "foremost",
    );

    expect([...(distances.get("A") ?? [])]).toEqual([
      ["B", 2],
      ["D", 3],
    ]);
  });

  it("should reject pairs outside the snapshot", () => {
    expect(() =>
      extractDistances(
        snapshot,
        [{ source: "A", target: "Z", distances: { shortest: 1 } }],
        "shortest",
      ),
    ).toThrow(UpstreamDataError);
  });

  it("should reject a missing policy", () => {
    expect(() =>
      extractDistances(
        snapshot,
        [{ source: "A", target: "B", distances: { shortest: 1 } }],
        "fastest",
      ),
    ).toThrow('No "fastest" distance for pair (A, B)');
  });

  it("should reject a self pair with a non-zero distance", () => {
    expect(() =>
      extractDistances(
        snapshot,
        [{ source: "A", target: "A", distances: { shortest: 2 } }],
        "shortest",
      ),
    ).toThrow("Distance 2 is inconsistent for pair (A, A)");
  });

  it("should reject malformed distances", () => {
    for (const distance of [-1, 1.5, 0]) {
      expect(() =>
        extractDistances(
          snapshot,
          [{ source: "A", target: "B", distances: { shortest: distance } }],
          "shortest",
        ),
      ).toThrow(UpstreamDataError);
    }
  });
});
