import { Matrix, CholeskyDecomposition } from 'ml-matrix';
import { NumericalSingularityError } from '../errors';

export const DEFAULT_PIVOT_TOLERANCE = 1e-10;

/**
 * Solves (XᵀX + λI) θ = XᵀY through a Cholesky factorization.
 *
 * A pivot Lⱼⱼ² that is not larger than `pivotTolerance` times the matching
 * diagonal entry is treated as a linear dependency between feature columns.
 */
export function solveRegularizedSystem(
    XtX_reg: Matrix,
    Xt_y: Matrix,
    pivotTolerance: number = DEFAULT_PIVOT_TOLERANCE
): number[] {
    if (!XtX_reg.to1DArray().every(Number.isFinite) || !Xt_y.to1DArray().every(Number.isFinite)) {
        throw new NumericalSingularityError(
            'The normal equations overflowed to a non-finite value. Rescale the inputs before fitting.'
        );
    }

    const chol = new CholeskyDecomposition(XtX_reg);
    if (!chol.isPositiveDefinite()) {
        throw new NumericalSingularityError(
            'The regularized Gram matrix is not positive definite. Provide more distinct inputs or a larger regularization strength.'
        );
    }

    const diagElements = chol.lowerTriangularMatrix.diagonal();
    diagElements.forEach((value, index) => {
        const pivot = value * value;
        const scale = XtX_reg.get(index, index);
        if (!(pivot > pivotTolerance * scale)) {
            throw new NumericalSingularityError(
                `The regularized Gram matrix is numerically singular (pivot ${pivot} at column ${index} against diagonal ${scale}).`
            );
        }
    });

    return chol.solve(Xt_y).to1DArray();
}
