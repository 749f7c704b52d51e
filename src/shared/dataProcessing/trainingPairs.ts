import type { Metadata, Record, TrainingPair, Warning } from '../types';
import { InvalidConfigurationError, ShapeMismatchError } from '../errors';
import { logWarning } from '../utils/logger';

export function toTrainingPairs(xs: readonly number[], ys: readonly number[]): TrainingPair[] {
    if (xs.length !== ys.length) {
        throw new ShapeMismatchError(
            `Inputs and targets must have the same length (${xs.length} != ${ys.length}).`
        );
    }
    return xs.map((x, idx) => ({ x, y: ys[idx] }));
}

function parseNumber(value: string | undefined): number {
    if (value === undefined || value.trim() === '')
        return NaN;
    return Number(value);
}

/**
 * Reads the input and target columns of every record. Rows where either value
 * is not a finite number are dropped.
 */
export function extractTrainingPairs(records: Record[], metadata: Metadata, warnings: Warning[]): TrainingPair[] {
    if (records.length === 0)
        return [];

    for (const key of [metadata.input_var, metadata.target_var]) {
        if (!Object.prototype.hasOwnProperty.call(records[0], key))
            throw new InvalidConfigurationError(`Column '${key}' is not present in the dataset.`);
    }

    const pairs: TrainingPair[] = [];
    let nonNumericRemovedCount = 0;
    records.forEach(record => {
        const x = parseNumber(record[metadata.input_var]);
        const y = parseNumber(record[metadata.target_var]);
        if (!Number.isFinite(x) || !Number.isFinite(y)) {
            nonNumericRemovedCount++;
            return;
        }
        pairs.push({ x, y });
    });

    if (nonNumericRemovedCount > 0)
        logWarning(`Removed ${nonNumericRemovedCount} rows due to non-numeric values in '${metadata.input_var}' or '${metadata.target_var}'`, warnings);

    return pairs;
}
