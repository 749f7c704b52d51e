import type { Metadata, TrainingPair, Warning } from '../types/index';
import { parseCSV } from '../dataProcessing/csvParser';
import { extractTrainingPairs } from '../dataProcessing/trainingPairs';
import { removeOutliers } from '../dataProcessing/outlierRemoval';
import { splitTrainTest } from '../dataProcessing/trainTestSplit';

export function executeDataPipeline(
    data: string,
    metadata: Metadata,
    warnings: Warning[]
): { train: TrainingPair[]; test: TrainingPair[] } {
    const records = parseCSV(data, metadata);
    let pairs = extractTrainingPairs(records, metadata, warnings);
    pairs = removeOutliers(pairs, metadata, warnings);
    return splitTrainTest(pairs, metadata.test_split, warnings);
}
