import * as csv from "csv-parse/sync";
import { z } from "zod";
import type { Metadata, Record } from "../types/index";
import { InvalidConfigurationError, ShapeMismatchError } from "../errors";

const recordsSchema = z.array(z.record(z.string(), z.string()));

export function parseCSV(data: string, metadata: Metadata): Record[] {
  if (metadata.decimal_point === ",") {
    if (metadata.split_char === ",")
      throw new InvalidConfigurationError("A decimal comma requires a delimiter other than ','.");

    const [header, ...dataLines] = data.split("\n");
    const innerData = dataLines.join("\n").replace(/,/g, ".");

    data = `${header}\n${innerData}`;
  }

  let parsed: unknown;
  try {
    parsed = csv.parse(data, {
      columns: true,
      delimiter: metadata.split_char,
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error) {
    throw new ShapeMismatchError(`Could not parse CSV: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = recordsSchema.safeParse(parsed);
  if (!result.success)
    throw new ShapeMismatchError(`Unexpected CSV layout: ${result.error.message}`);
  return result.data;
}
