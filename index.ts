export {
  deltaConformity,
  computeWindow,
  extractDistances,
  type ConformityContext,
} from "./src/conformity/DeltaConformity";
export {
  slidingDeltaConformity,
  windowStarts,
} from "./src/conformity/SlidingDeltaConformity";
export {
  LabelSimilarityScorer,
  OUT_OF_HIERARCHY_PENALTY,
} from "./src/conformity/LabelSimilarityScorer";
export {
  NodeAccumulator,
  accumulate,
  createEmptyResult,
  mergeAccumulators,
} from "./src/conformity/ConformityAggregator";
export { generateProfiles, profileKey, alphaKey } from "./src/conformity/profiles";
export {
  ConformityRequestSchema,
  WindowRequestSchema,
  SlidingRequestSchema,
} from "./src/conformity/validation";
export { buildShells, maxShellDistance } from "./src/distance/DistanceShellBuilder";
export { DampingNormalizer } from "./src/distance/DampingNormalizer";
export {
  DampingProfiles,
  getDampingProfile,
  validateDampingFactors,
  type DampingProfileName,
} from "./src/distance/DampingProfiles";
export type { DistanceMap, DistanceShells } from "./src/distance/types";
export { TemporalGraph, TemporalGraphSnapshot } from "./src/graph/TemporalGraph";
export { TimeRespectingPathOracle } from "./src/graph/TimeRespectingPathOracle";
export type * from "./src/graph/types";
export {
  ConformityService,
  type WindowServiceRequest,
  type SlidingServiceRequest,
} from "./src/service/ConformityService";
export { loadConfig, resolveAlphas, ConformityConfigSchema, type ConformityConfig } from "./src/config";
export { Logger, LogLevel, logger } from "./src/utils/Logger";
export * from "./src/types";
