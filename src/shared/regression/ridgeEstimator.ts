import type { CoefficientVector, FeatureVector, TrainingPair, Warning } from '../types';
import { InvalidConfigurationError, ShapeMismatchError, UnfittedModelError } from '../errors';
import { logWarning } from '../utils/logger';
import { FEATURE_DIMENSION, buildDesignMatrix, expandFeatures } from './featureExpansion';
import { buildNormalEquations } from './matrixOperations';
import { DEFAULT_PIVOT_TOLERANCE, solveRegularizedSystem } from './solver';

export interface FitOptions {
    pivotTolerance?: number;
    warnings?: Warning[];
}

function validateRegularization(lambda: number): void {
    if (!Number.isFinite(lambda) || lambda < 0) {
        throw new InvalidConfigurationError(
            `Regularization strength must be a finite number >= 0, got ${lambda}.`
        );
    }
}

function validatePairs(pairs: readonly TrainingPair[]): void {
    if (pairs.length === 0) {
        throw new ShapeMismatchError('At least one training pair is required to fit the model.');
    }
    pairs.forEach((pair, index) => {
        if (!Number.isFinite(pair.x) || !Number.isFinite(pair.y)) {
            throw new ShapeMismatchError(
                `Training pair ${index} is not finite (x=${pair.x}, y=${pair.y}).`
            );
        }
    });
}

/**
 * Closed-form ridge fit of y on [1, x, x²].
 *
 * Returns the minimizer of Σᵢ(θᵀx̄ᵢ − yᵢ)² + λ‖θ‖², i.e. (XᵀX + λI)⁻¹XᵀY.
 * The intercept is penalized like the other two weights.
 *
 * @throws {InvalidConfigurationError} if lambda is negative or not finite
 * @throws {ShapeMismatchError} if pairs is empty or holds non-finite values
 * @throws {NumericalSingularityError} if XᵀX + λI cannot be factorized
 */
export function fitRidge(
    pairs: readonly TrainingPair[],
    lambda: number,
    options: FitOptions = {}
): CoefficientVector {
    validateRegularization(lambda);
    validatePairs(pairs);

    if (pairs.length < FEATURE_DIMENSION) {
        logWarning(
            `Only ${pairs.length} training pair(s) for ${FEATURE_DIMENSION} coefficients - the fit is determined by the regularization.`,
            options.warnings ?? []
        );
    }

    const { X, Y } = buildDesignMatrix(pairs);
    const { XtX_reg, Xt_y } = buildNormalEquations(X, Y, lambda);
    const [intercept, linear, quadratic] = solveRegularizedSystem(
        XtX_reg,
        Xt_y,
        options.pivotTolerance ?? DEFAULT_PIVOT_TOLERANCE
    );

    const coefficients: CoefficientVector = [intercept, linear, quadratic];
    return Object.freeze(coefficients);
}

export function predictWithCoefficients(coefficients: CoefficientVector, x: number): number {
    const features = expandFeatures(x);
    return coefficients.reduce((sum, coefficient, idx) => sum + coefficient * features[idx], 0);
}

/**
 * Stateful wrapper around {@link fitRidge}: holds λ for its lifetime and the
 * coefficients of the last successful fit. Not safe to share between
 * concurrent computations; independent instances share nothing.
 */
export class RidgeEstimator {
    readonly lambda: number;
    private readonly pivotTolerance: number;
    private coefficients: CoefficientVector | null = null;

    constructor(lambda: number, pivotTolerance: number = DEFAULT_PIVOT_TOLERANCE) {
        validateRegularization(lambda);
        this.lambda = lambda;
        this.pivotTolerance = pivotTolerance;
    }

    get isFitted(): boolean {
        return this.coefficients !== null;
    }

    expand(x: number): FeatureVector {
        return expandFeatures(x);
    }

    /**
     * Fits on `pairs` and replaces any earlier coefficients. A failing fit
     * leaves the previous coefficients in place.
     */
    fit(pairs: readonly TrainingPair[], warnings: Warning[] = []): CoefficientVector {
        const coefficients = fitRidge(pairs, this.lambda, {
            pivotTolerance: this.pivotTolerance,
            warnings,
        });
        this.coefficients = coefficients;
        return coefficients;
    }

    getCoefficients(): CoefficientVector {
        if (this.coefficients === null)
            throw new UnfittedModelError();
        return this.coefficients;
    }

    predict(x: number): number {
        return predictWithCoefficients(this.getCoefficients(), x);
    }
}
