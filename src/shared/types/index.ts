export type OutlierFilter =
    | { method: 'IQR'; outlier_iqr_multiplier: number }
    | { method: 'VariableBounds'; min: number; max: number };

export interface SplitOptions {
    /** Share of pairs held out for evaluation, in [0, 1). */
    test_fraction: number;
    shuffle?: boolean;
    seed?: number;
}

export interface Metadata {
    input_var: string;
    target_var: string;
    split_char: string;
    decimal_point?: '.' | ',';
    regularization: number;
    pivot_tolerance?: number;
    test_split?: SplitOptions;
    outlier_filtering?: { [column: string]: OutlierFilter };
}

export type Record = { [key: string]: string };

export interface TrainingPair {
    x: number;
    y: number;
}

/** [1, x, x²], intercept first. */
export type FeatureVector = readonly [number, number, number];

/** Weights for the intercept, linear and quadratic terms, in that order. */
export type CoefficientVector = readonly [number, number, number];

export type Warning = string | { [key: string]: unknown };

export type EvaluationMetrics = {
    mean_absolute_error: number;
    root_mean_squared_error: number;
    r_squared: number;
    mean_absolute_percentage_error: number;
};

export type AnalysisResult = {
    coefficients: CoefficientVector;
    named_coefficients: {
        intercept: number;
        linear: number;
        quadratic: number;
    };
    regularization: number;
    n_train: number;
    n_test: number;
    train_metrics: EvaluationMetrics;
    test_metrics: EvaluationMetrics | null;
    warnings: Warning[];
};
