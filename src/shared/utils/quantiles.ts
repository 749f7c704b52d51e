/** Linearly interpolated quantiles; `values` need not be sorted. */
export function computeQuantiles(values: number[], q: number[]): number[] {
    const sorted = values.slice().sort((a, b) => a - b);
    return q.map((quantile) => {
        if (sorted.length === 0)
            return NaN;
        const pos = (sorted.length - 1) * quantile;
        const base = Math.floor(pos);
        const rest = pos - base;
        return base + 1 < sorted.length
            ? sorted[base] + rest * (sorted[base + 1] - sorted[base])
            : sorted[base];
    });
}
