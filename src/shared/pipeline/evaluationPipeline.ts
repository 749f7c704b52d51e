import type { CoefficientVector, EvaluationMetrics, TrainingPair, Warning } from '../types/index';
import { computeMetrics } from '../evaluation/metrics';
import { predictWithCoefficients } from '../regression/ridgeEstimator';

export function executeEvaluationPipeline(
    coefficients: CoefficientVector,
    pairs: readonly TrainingPair[],
    warnings: Warning[]
): EvaluationMetrics {
    const finalY = pairs.map(pair => pair.y);
    const y_pred = pairs.map(pair => predictWithCoefficients(coefficients, pair.x));
    return computeMetrics(finalY, y_pred, warnings);
}
