import { ConformityConfigSchema, resolveAlphas, type ConformityConfig } from "../config";
import { deltaConformity, type ConformityContext } from "../conformity/DeltaConformity";
import { slidingDeltaConformity } from "../conformity/SlidingDeltaConformity";
import { TimeRespectingPathOracle } from "../graph/TimeRespectingPathOracle";
import type { DynamicGraph, PathOracle } from "../graph/types";
import type {
    ConformityRequest,
    ConformityResult,
    SlidingConformityRequest,
    SlidingConformityResult,
    WindowConformityRequest,
} from "../types";
import { InvalidArgumentError } from "../types";
import { Logger, parseLogLevel } from "../utils/Logger";

/**
 * Requests whose damping factors, profile size and path policy may fall back
 * to the configuration
 */
export type WindowServiceRequest = Omit<WindowConformityRequest, "alphas"> & {
    alphas?: number[];
};

export type SlidingServiceRequest = Omit<SlidingConformityRequest, "alphas"> & {
    alphas?: number[];
};

type DefaultedFields = Pick<ConformityRequest, "alphas" | "profileSize" | "pathPolicy">;

export interface ConformityServiceDependencies {
    oracle?: PathOracle;
    logger?: Logger;
}

/**
 * Binds a dynamic graph, a path oracle and configuration defaults
 */
export class ConformityService {
    private readonly config: ConformityConfig;
    private readonly oracle: PathOracle;
    private readonly logger: Logger;

    constructor(
        private readonly graph: DynamicGraph,
        config: Partial<ConformityConfig> = {},
        dependencies: ConformityServiceDependencies = {},
    ) {
        const validationResult = ConformityConfigSchema.safeParse(config);

        if (!validationResult.success) {
            const errorMessages = validationResult.error.errors
                .map((err) => `${err.path.join(".")}: ${err.message}`)
                .join(", ");
            throw new InvalidArgumentError(
                `Configuration validation failed: ${errorMessages}`,
                "config",
            );
        }

        this.config = validationResult.data;
        this.oracle = dependencies.oracle ?? new TimeRespectingPathOracle();
        this.logger =
            dependencies.logger ??
            new Logger({
                level: parseLogLevel(this.config.logLevel),
                service: "ConformityService",
            });
    }

    /**
     * Delta-conformity of one window
     */
    compute(
        request: WindowServiceRequest,
        signal?: AbortSignal,
    ): ConformityResult {
        const startTime = Date.now();
        const result = deltaConformity(
            this.graph,
            { ...request, ...this.defaults(request) },
            this.context(signal),
        );
        this.logger.debug(
            `Window [${request.start}, ${request.start + request.delta}] computed in ${Date.now() - startTime}ms`,
        );
        return result;
    }

    /**
     * Delta-conformity time series over sliding windows
     */
    computeSliding(
        request: SlidingServiceRequest,
        signal?: AbortSignal,
    ): SlidingConformityResult {
        const startTime = Date.now();
        const result = slidingDeltaConformity(
            this.graph,
            { ...request, ...this.defaults(request) },
            this.context(signal),
        );
        this.logger.info(
            `Sliding conformity for delta ${request.delta} computed in ${Date.now() - startTime}ms`,
        );
        return result;
    }

    getConfig(): ConformityConfig {
        return { ...this.config, defaultAlphas: [...this.config.defaultAlphas] };
    }

    private defaults(request: Partial<DefaultedFields>): DefaultedFields {
        return {
            alphas: request.alphas ?? resolveAlphas(this.config),
            profileSize: request.profileSize ?? this.config.defaultProfileSize,
            pathPolicy: request.pathPolicy ?? this.config.defaultPathPolicy,
        };
    }

    private context(signal?: AbortSignal): ConformityContext {
        return { oracle: this.oracle, logger: this.logger, signal };
    }
}
