import { Matrix } from 'ml-matrix';
import type { FeatureVector, TrainingPair } from '../types';

export const FEATURE_DIMENSION = 3;

export function expandFeatures(x: number): FeatureVector {
    return [1, x, x * x];
}

/**
 * Stacks the expanded inputs row by row and the targets as a column vector,
 * keeping the order of `pairs` so that row i of X lines up with row i of Y.
 */
export function buildDesignMatrix(pairs: readonly TrainingPair[]): { X: Matrix; Y: Matrix } {
    const X = new Matrix(pairs.map(pair => [...expandFeatures(pair.x)]));
    const Y = Matrix.columnVector(pairs.map(pair => pair.y));
    return { X, Y };
}
