export class RegressionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class InvalidConfigurationError extends RegressionError {}

/**
 * Raised when the regularized Gram matrix cannot be factorized.
 * Supply more data, distinct inputs or a larger regularization strength.
 */
export class NumericalSingularityError extends RegressionError {}

export class UnfittedModelError extends RegressionError {
    constructor(message = 'The model has not been fitted yet - call fit() first.') {
        super(message);
    }
}

export class ShapeMismatchError extends RegressionError {}
