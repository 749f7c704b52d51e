import type { CoefficientVector, Metadata, TrainingPair, Warning } from '../types/index';
import { RidgeEstimator } from '../regression/ridgeEstimator';

export function executeRegressionPipeline(
    train: readonly TrainingPair[],
    metadata: Metadata,
    warnings: Warning[]
): CoefficientVector {
    const estimator = new RidgeEstimator(metadata.regularization, metadata.pivot_tolerance);
    return estimator.fit(train, warnings);
}
