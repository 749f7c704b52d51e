import { create, all } from 'mathjs';
import type { SplitOptions, TrainingPair, Warning } from '../types';
import { InvalidConfigurationError } from '../errors';
import { logWarning } from '../utils/logger';

function shuffle<T>(items: T[], seed: number): T[] {
    const math = create(all, { randomSeed: String(seed) });
    const shuffled = items.slice();
    for (let i = shuffled.length - 1; i > 0; i--) {
        const j = Math.floor(math.random() * (i + 1));
        [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
    }
    return shuffled;
}

/**
 * Holds out the last round(n * test_fraction) pairs for evaluation, after an
 * optional seeded shuffle. The training set always keeps at least one pair.
 */
export function splitTrainTest(
    pairs: TrainingPair[],
    options: SplitOptions | undefined,
    warnings: Warning[]
): { train: TrainingPair[]; test: TrainingPair[] } {
    if (options === undefined)
        return { train: pairs, test: [] };

    const fraction = options.test_fraction;
    if (!(fraction >= 0 && fraction < 1))
        throw new InvalidConfigurationError(`test_fraction must be in [0, 1), got ${fraction}`);

    const ordered = options.shuffle ? shuffle(pairs, options.seed ?? 0) : pairs;
    let testSize = Math.round(ordered.length * fraction);
    if (ordered.length > 0 && testSize >= ordered.length) {
        testSize = ordered.length - 1;
        logWarning(`Test split reduced to ${testSize} rows to keep at least one training row.`, warnings);
    }
    if (testSize <= 0)
        return { train: ordered, test: [] };

    return {
        train: ordered.slice(0, ordered.length - testSize),
        test: ordered.slice(ordered.length - testSize),
    };
}
