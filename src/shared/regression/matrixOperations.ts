import { Matrix } from 'ml-matrix';
import { ShapeMismatchError } from '../errors';

/**
 * Left and right hand side of the ridge normal equations,
 * (XᵀX + λI) θ = XᵀY. X is n × p and Y is n × 1.
 */
export function buildNormalEquations(
    X_matrix: Matrix,
    y_vector: Matrix,
    lambda: number
): { XtX_reg: Matrix; Xt_y: Matrix } {
    if (X_matrix.rows !== y_vector.rows || y_vector.columns !== 1) {
        throw new ShapeMismatchError(
            `Design matrix has ${X_matrix.rows} rows but target vector is ${y_vector.rows} x ${y_vector.columns}.`
        );
    }
    const Xt = X_matrix.transpose();
    const XtX = Xt.mmul(X_matrix);
    const XtX_reg = XtX.add(Matrix.eye(XtX.rows).mul(lambda));
    return { XtX_reg, Xt_y: Xt.mmul(y_vector) };
}
