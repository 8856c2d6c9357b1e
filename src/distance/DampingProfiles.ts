/**
 * Pre-defined damping factor sets for common use cases
 */
export const DampingProfiles = {
    /**
     * Harmonic damping (α = 1)
     * Shell at distance d weighs 1/d
     */
    LINEAR: [1],

    /**
     * Quadratic damping (α = 2)
     * Influence concentrated on the first shells
     */
    QUADRATIC: [2],

    /**
     * Cubic damping (α = 3)
     * Nearly only direct reachability counts
     */
    CUBIC: [3],

    /**
     * Sweep α from 1.0 to 3.8 in steps of 0.2
     * Used to study how conformity changes with locality
     */
    SWEEP: Array.from({ length: 15 }, (_, i) => Math.round((1 + i * 0.2) * 10) / 10),
} as const satisfies Record<string, readonly number[]>;

/**
 * Type for damping profile names
 */
export type DampingProfileName = keyof typeof DampingProfiles;

export const DAMPING_PROFILE_NAMES = ['LINEAR', 'QUADRATIC', 'CUBIC', 'SWEEP'] as const satisfies readonly DampingProfileName[];

/**
 * Get the alphas of a damping profile by name
 */
export function getDampingProfile(name: DampingProfileName): number[] {
    return [...DampingProfiles[name]];
}

/**
 * Validate a set of damping factors
 */
export function validateDampingFactors(alphas: readonly number[]): string[] {
    const errors: string[] = [];

    if (alphas.length === 0) {
        errors.push('at least one damping factor is required');
    }

    for (const alpha of alphas) {
        if (!Number.isFinite(alpha) || alpha <= 0) {
            errors.push(`damping factor must be a positive finite number, got ${alpha}`);
        }
    }

    const keys = alphas.map((alpha) => String(alpha));
    if (new Set(keys).size !== keys.length) {
        errors.push(`damping factors must be distinct, got [${keys.join(', ')}]`);
    }

    return errors;
}
