import type { Metadata, OutlierFilter, TrainingPair, Warning } from '../types/index';
import { InvalidConfigurationError } from '../errors';
import { computeQuantiles } from '../utils/quantiles';
import { logWarning } from '../utils/logger';

type Bounds = { min: number; max: number };

function computeBounds(values: number[], filterConfig: OutlierFilter): Bounds {
    if (filterConfig.method === 'IQR') {
        const [q1, q3] = computeQuantiles(values, [0.25, 0.75]);
        const iqr = q3 - q1;
        return {
            min: q1 - filterConfig.outlier_iqr_multiplier * iqr,
            max: q3 + filterConfig.outlier_iqr_multiplier * iqr,
        };
    }
    if (filterConfig.min > filterConfig.max)
        throw new InvalidConfigurationError(`VariableBounds filter has min ${filterConfig.min} > max ${filterConfig.max}`);
    return { min: filterConfig.min, max: filterConfig.max };
}

/**
 * Drops pairs whose input or target falls outside the configured bounds.
 * IQR bounds are computed once over all pairs before any are removed.
 */
export function removeOutliers(
    pairs: TrainingPair[],
    metadata: Metadata,
    warnings: Warning[]
): TrainingPair[] {
    if (!metadata.outlier_filtering || pairs.length === 0) {
        return pairs;
    }

    const accessors = new Map<string, (pair: TrainingPair) => number>([
        [metadata.input_var, pair => pair.x],
        [metadata.target_var, pair => pair.y],
    ]);

    const checks: { column: string; value: (pair: TrainingPair) => number; bounds: Bounds }[] = [];
    for (const [column, filterConfig] of Object.entries(metadata.outlier_filtering)) {
        const value = accessors.get(column);
        if (value === undefined)
            throw new InvalidConfigurationError(`Outlier filter refers to unknown column '${column}'`);
        checks.push({ column, value, bounds: computeBounds(pairs.map(value), filterConfig) });
    }

    const removedCounts: { [column: string]: number } = {};
    const kept = pairs.filter(pair => {
        return checks.every(({ column, value, bounds }) => {
            const v = value(pair);
            if (v < bounds.min || v > bounds.max) {
                removedCounts[column] = (removedCounts[column] || 0) + 1;
                return false;
            }
            return true;
        });
    });

    for (const column in removedCounts) {
        logWarning(`Removed ${removedCounts[column]} rows due to outlier filter on ${column}`, warnings);
    }

    return kept;
}
