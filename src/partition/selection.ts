import type { Partition } from '../types.js';
import { ConflictingSelectionError, InvalidPartitionSelectionError } from '../utils/errors.js';

export interface PartitionSelection {
    include: number[];
    exclude: number[];
}

/**
 * Resolve which partitions to export: the inclusion list when given, else
 * everything outside the exclusion list. Passing both is an error.
 */
export function resolvePartitionSelection(
    partitions: Partition[],
    selection: PartitionSelection
): Partition[] {
    const include = new Set(selection.include);
    const exclude = new Set(selection.exclude);

    if (include.size > 0 && exclude.size > 0) {
        throw new ConflictingSelectionError();
    }

    if (include.size > 0) {
        const known = new Set(partitions.map((partition) => partition.index));
        const unknown = [...include].filter((index) => !known.has(index));
        if (unknown.length > 0) {
            throw new InvalidPartitionSelectionError(unknown.sort((a, b) => a - b));
        }
        return partitions.filter((partition) => include.has(partition.index));
    }

    if (exclude.size > 0) {
        return partitions.filter((partition) => !exclude.has(partition.index));
    }

    return [...partitions];
}
