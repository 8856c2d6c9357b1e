/**
 * Core type definitions for delta-conformity
 */

// Graph data types
export type NodeId = string;

export type LabelValue = string | number | boolean;

export type NodeAttributes = Record<string, LabelValue>;

/**
 * Ordinal ranks per categorical value, keyed by label name.
 * `{ education: { primary: 0, secondary: 1, tertiary: 2 } }`
 */
export type LabelHierarchies = Record<string, Record<string, number>>;

export const PATH_POLICIES = [
  "shortest",
  "fastest",
  "foremost",
  "fastest_shortest",
  "shortest_fastest",
] as const;

export type PathPolicy = (typeof PATH_POLICIES)[number];

// Request types
export interface ConformityRequest {
  alphas: number[];
  labels: string[];
  profileSize?: number;
  hierarchies?: LabelHierarchies;
  pathPolicy?: PathPolicy;
}

export interface WindowConformityRequest extends ConformityRequest {
  start: number;
  delta: number;
}

export interface SlidingConformityRequest extends ConformityRequest {
  delta: number;
}

// Result types
export type NodeScores = Record<NodeId, number>;

/** alpha key -> profile key -> node -> score */
export type ConformityResult = Record<string, Record<string, NodeScores>>;

/** [window end, score] */
export type TimeSeriesPoint = [number, number];

/** alpha key -> profile key -> node -> time ordered scores */
export type SlidingConformityResult = Record<
  string,
  Record<string, Record<NodeId, TimeSeriesPoint[]>>
>;

// Error types
export class ConformityError extends Error {
  constructor(
    message: string,
    public code?: string,
  ) {
    super(message);
    this.name = "ConformityError";
  }
}

export class InvalidArgumentError extends ConformityError {
  constructor(
    message: string,
    public field?: string,
  ) {
    super(message, "INVALID_ARGUMENT");
    this.name = "InvalidArgumentError";
  }
}

export class PreconditionViolationError extends ConformityError {
  constructor(
    message: string,
    public operation?: string,
  ) {
    super(message, "PRECONDITION_VIOLATION");
    this.name = "PreconditionViolationError";
  }
}

export class UpstreamDataError extends ConformityError {
  constructor(
    message: string,
    public operation?: string,
  ) {
    super(message, "UPSTREAM_DATA_ERROR");
    this.name = "UpstreamDataError";
  }
}
