import { describe, it, expect } from "vitest";
import { parseCSV } from "../../src/shared/dataProcessing/csvParser";
import { extractTrainingPairs } from "../../src/shared/dataProcessing/trainingPairs";
import { removeOutliers } from "../../src/shared/dataProcessing/outlierRemoval";
import { splitTrainTest } from "../../src/shared/dataProcessing/trainTestSplit";
import { computeQuantiles } from "../../src/shared/utils/quantiles";
import { InvalidConfigurationError } from "../../src/shared/errors";
import type { Metadata, OutlierFilter, TrainingPair, Warning } from "../../src/shared/types";

function makeMetadata(overrides: Partial<Metadata> = {}): Metadata {
  return {
    input_var: "x",
    target_var: "y",
    split_char: ",",
    regularization: 0.1,
    ...overrides,
  };
}

function range(n: number): TrainingPair[] {
  return Array.from({ length: n }, (_, i) => ({ x: i, y: 2 * i }));
}

describe("parseCSV", () => {
  it("reads headered rows as string records", () => {
    expect(parseCSV("x,y\n1,2\n3,4\n", makeMetadata())).toEqual([
      { x: "1", y: "2" },
      { x: "3", y: "4" },
    ]);
  });

  it("converts a decimal comma", () => {
    const metadata = makeMetadata({ split_char: ";", decimal_point: "," });

    expect(parseCSV("x;y\n1,5;2,25\n", metadata)).toEqual([{ x: "1.5", y: "2.25" }]);
  });

  it("rejects a decimal comma with a comma delimiter", () => {
    const metadata = makeMetadata({ decimal_point: "," });

    expect(() => parseCSV("x,y\n1,2\n", metadata)).toThrow(InvalidConfigurationError);
  });
});

describe("extractTrainingPairs", () => {
  it("drops rows with non-numeric values", () => {
    const warnings: Warning[] = [];
    const metadata = makeMetadata();
    const records = parseCSV("x,y\n1,2\nabc,3\n4,\n", metadata);

    const pairs = extractTrainingPairs(records, metadata, warnings);

    expect(pairs).toEqual([{ x: 1, y: 2 }]);
    expect(warnings).toEqual(["Removed 2 rows due to non-numeric values in 'x' or 'y'"]);
  });

  it("rejects a column that is not in the dataset", () => {
    const metadata = makeMetadata({ input_var: "z" });

    expect(() => extractTrainingPairs([{ x: "1", y: "2" }], metadata, [])).toThrow(
      InvalidConfigurationError
    );
  });
});

describe("extractTrainingPairs with inherited property names", () => {
  it.each(["constructor", "toString"])("rejects '%s' as an input column", (name) => {
    const metadata = makeMetadata({ input_var: name });

    expect(() => extractTrainingPairs([{ x: "1", y: "2" }], metadata, [])).toThrow(
      InvalidConfigurationError
    );
  });
});

describe("computeQuantiles", () => {
  it("interpolates between neighbours", () => {
    expect(computeQuantiles([1, 2, 3, 4], [0, 0.5, 1])).toEqual([1, 2.5, 4]);
  });
});

describe("removeOutliers", () => {
  const pairs: TrainingPair[] = [
    { x: 1, y: 1 },
    { x: 2, y: 2 },
    { x: 3, y: 3 },
    { x: 4, y: 4 },
    { x: 100, y: 5 },
  ];

  it("returns the pairs unchanged without filters", () => {
    expect(removeOutliers(pairs, makeMetadata(), [])).toBe(pairs);
  });

  it("drops values outside the IQR fence", () => {
    const warnings: Warning[] = [];
    const metadata = makeMetadata({
      outlier_filtering: { x: { method: "IQR", outlier_iqr_multiplier: 1.5 } },
    });

    const kept = removeOutliers(pairs, metadata, warnings);

    expect(kept.map((p) => p.x)).toEqual([1, 2, 3, 4]);
    expect(warnings).toEqual(["Removed 1 rows due to outlier filter on x"]);
  });

  it("drops values outside fixed bounds", () => {
    const metadata = makeMetadata({
      outlier_filtering: { y: { method: "VariableBounds", min: 2, max: 4 } },
    });

    expect(removeOutliers(pairs, metadata, []).map((p) => p.y)).toEqual([2, 3, 4]);
  });

  it("rejects a filter named after an inherited property", () => {
    const metadata = makeMetadata({
      outlier_filtering: { toString: { method: "VariableBounds", min: 0, max: 1 } satisfies OutlierFilter },
    });

    expect(() => removeOutliers(pairs, metadata, [])).toThrow(InvalidConfigurationError);
  });

  it("rejects a filter on an unknown column", () => {
    const metadata = makeMetadata({
      outlier_filtering: { w: { method: "VariableBounds", min: 0, max: 1 } },
    });

    expect(() => removeOutliers(pairs, metadata, [])).toThrow(InvalidConfigurationError);
  });
});

describe("splitTrainTest", () => {
  it("keeps everything for training without a split", () => {
    const pairs = range(5);

    expect(splitTrainTest(pairs, undefined, [])).toEqual({ train: pairs, test: [] });
  });

  it("holds out the tail of the data", () => {
    const { train, test } = splitTrainTest(range(10), { test_fraction: 0.2 }, []);

    expect(train.map((p) => p.x)).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
    expect(test.map((p) => p.x)).toEqual([8, 9]);
  });

  it("shuffles reproducibly for a given seed", () => {
    const options = { test_fraction: 0.3, shuffle: true, seed: 42 };

    const first = splitTrainTest(range(10), options, []);
    const second = splitTrainTest(range(10), options, []);

    expect(first).toEqual(second);
    expect(first.train).toHaveLength(7);
    expect(first.test).toHaveLength(3);
    const xs = [...first.train, ...first.test].map((p) => p.x).sort((a, b) => a - b);
    expect(xs).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  it("keeps at least one training pair", () => {
    const warnings: Warning[] = [];

    const { train, test } = splitTrainTest(range(1), { test_fraction: 0.9 }, warnings);

    expect(train).toHaveLength(1);
    expect(test).toHaveLength(0);
    expect(warnings).toEqual(["Test split reduced to 0 rows to keep at least one training row."]);
  });

  it("rejects a fraction outside [0, 1)", () => {
    expect(() => splitTrainTest(range(4), { test_fraction: 1 }, [])).toThrow(
      InvalidConfigurationError
    );
    expect(() => splitTrainTest(range(4), { test_fraction: -0.1 }, [])).toThrow(
      InvalidConfigurationError
    );
  });
});
