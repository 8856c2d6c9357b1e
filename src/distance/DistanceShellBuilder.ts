import type { NodeId } from '../types';
import type { DistanceShells } from './types';

/**
 * Group the nodes reachable from one source by time-respecting distance.
 * Distance 0 (the source itself) never forms a shell; unreachable nodes are
 * simply absent from the input.
 *
 * @param distances - Map of target node to distance from the source
 * @returns Map of distance to the nodes at that distance, in first-seen order
 */
export function buildShells(distances: ReadonlyMap<NodeId, number>): DistanceShells {
    const shells: DistanceShells = new Map();

    for (const [node, distance] of distances) {
        if (distance === 0) continue;

        const shell = shells.get(distance);
        if (shell) {
            shell.push(node);
        } else {
            shells.set(distance, [node]);
        }
    }

    return shells;
}

/**
 * Reachability depth of a source, undefined when nothing is reachable
 */
export function maxShellDistance(shells: DistanceShells): number | undefined {
    if (shells.size === 0) {
        return undefined;
    }
    return Math.max(...shells.keys());
}
