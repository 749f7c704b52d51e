import type { AnalysisResult, Metadata, Warning } from './types';
import { executeDataPipeline } from './pipeline/dataPipeline';
import { executeRegressionPipeline } from './pipeline/regressionPipeline';
import { executeEvaluationPipeline } from './pipeline/evaluationPipeline';
import { logWarning } from './utils/logger';

export * from './errors';
export { parseMetadata } from './config/metadata';
export { RidgeEstimator, fitRidge, predictWithCoefficients } from './regression/ridgeEstimator';
export { expandFeatures, FEATURE_DIMENSION } from './regression/featureExpansion';
export { toTrainingPairs } from './dataProcessing/trainingPairs';
export { computeMetrics } from './evaluation/metrics';
export type {
    AnalysisResult,
    CoefficientVector,
    EvaluationMetrics,
    FeatureVector,
    Metadata,
    TrainingPair,
    Warning,
} from './types';

export function main(metadata: Metadata, data: string): AnalysisResult {
    const warnings: Warning[] = [];

    if (metadata.regularization === 0)
        logWarning("Regularization is 0 - the fit is ordinary least squares and needs at least three distinct inputs.", warnings);

    const { train, test } = executeDataPipeline(data, metadata, warnings);

    const coefficients = executeRegressionPipeline(train, metadata, warnings);

    const train_metrics = executeEvaluationPipeline(coefficients, train, warnings);
    const test_metrics = test.length > 0 ? executeEvaluationPipeline(coefficients, test, warnings) : null;

    const [intercept, linear, quadratic] = coefficients;

    return {
        coefficients,
        named_coefficients: { intercept, linear, quadratic },
        regularization: metadata.regularization,
        n_train: train.length,
        n_test: test.length,
        train_metrics,
        test_metrics,
        warnings,
    };
}
