import { InvalidArgumentError } from '../types';

/**
 * Power-law damping of reachability shells and the per-node divisor that
 * brings accumulated conformity back to a comparable scale
 */
export class DampingNormalizer {
    private divisors = new Map<string, number>();

    /**
     * Weight of a shell at `distance` under damping factor `alpha`: d^-α
     *
     * @param distance - Integer time-respecting distance, at least 1
     */
    weight(distance: number, alpha: number): number {
        this.validateDistance(distance);
        return distance ** -alpha;
    }

    /**
     * Normalization divisor Σ_{k=1}^{maxDistance} k^-α
     *
     * @param maxDistance - Deepest shell observed for the node
     */
    divisor(maxDistance: number, alpha: number): number {
        this.validateDistance(maxDistance);

        const key = `${alpha}:${maxDistance}`;
        const cached = this.divisors.get(key);
        if (cached !== undefined) {
            return cached;
        }

        let norm = 0;
        for (let k = 1; k <= maxDistance; k++) {
            norm += k ** -alpha;
        }

        this.divisors.set(key, norm);
        return norm;
    }

    private validateDistance(distance: number): void {
        if (!Number.isInteger(distance) || distance < 1) {
            throw new InvalidArgumentError(
                `Invalid distance: ${distance}. Must be a positive integer.`,
                'distance'
            );
        }
    }
}
