import type { EvaluationMetrics, Warning } from '../types';
import { ShapeMismatchError } from '../errors';
import { logWarning } from '../utils/logger';

export function computeMetrics(finalY: number[], y_pred: number[], warnings: Warning[] = []): EvaluationMetrics {
    const n = finalY.length;
    if (n === 0 || n !== y_pred.length) {
        throw new ShapeMismatchError(
            `Cannot compute metrics for ${n} targets and ${y_pred.length} predictions.`
        );
    }

    const mae =
        finalY.reduce((acc, val, idx) => acc + Math.abs(val - y_pred[idx]), 0) / n;
    const ssRes = finalY.reduce(
        (acc, val, idx) => acc + Math.pow(val - y_pred[idx], 2),
        0
    );
    const rmse = Math.sqrt(ssRes / n);

    const meanY = finalY.reduce((acc, val) => acc + val, 0) / n;
    const ssTot = finalY.reduce((acc, val) => acc + Math.pow(val - meanY, 2), 0);
    let rSquared = NaN;
    if (ssTot === 0)
        logWarning('Targets have zero variance - R² is undefined.', warnings);
    else
        rSquared = 1 - ssRes / ssTot;

    const epsilon = 1e-10;
    const mape =
        (finalY.reduce((acc, val, idx) => {
            return acc + Math.abs((val - y_pred[idx]) / (Math.abs(val) + epsilon));
        }, 0) /
            n) *
        100;

    return {
        mean_absolute_error: mae,
        root_mean_squared_error: rmse,
        r_squared: rSquared,
        mean_absolute_percentage_error: mape,
    };
}
