/**
 * Transposon feature table
 *
 * Tab-separated annotation of the functional elements within the transposon
 * sequence (splice acceptors, splice donors, polyA signals):
 *
 * ```
 * name	start	end	strand	type
 * En2SA	1530	1545	-1	SA
 * ```
 *
 * Coordinates are positions within the transposon sequence, inclusive.
 */

import { ParseError } from "../errors";
import { collect } from "../io/stream-utils";
import { type GenomicStrand, toGenomicStrand } from "../types";
import { AbstractParser } from "./abstract-parser";

export const FEATURE_COLUMNS = ["name", "start", "end", "strand", "type"] as const;

export interface TransposonFeature {
  readonly name: string;
  readonly start: number;
  readonly end: number;
  readonly strand: GenomicStrand;
  /** Feature class, e.g. SA (splice acceptor), SD (splice donor), pA */
  readonly type: string;
}

function parseCoordinate(value: string, column: string, lineNumber: number): number {
  if (!/^\d+$/.test(value)) {
    throw new ParseError(
      `Invalid ${column} '${value}' (expected a non-negative integer)`,
      "features",
      lineNumber
    );
  }
  return Number.parseInt(value, 10);
}

/**
 * Streaming parser for transposon feature tables
 *
 * The header line is optional and skipped when present.
 */
export class TransposonFeatureParser extends AbstractParser<TransposonFeature> {
  protected getFormatName(): string {
    return "features";
  }

  protected parseLine(line: string, lineNumber: number): TransposonFeature | undefined {
    const fields = line.split("\t").map((field) => field.trim());
    if (fields[0] === FEATURE_COLUMNS[0] && fields[1] === FEATURE_COLUMNS[1]) {
      return undefined;
    }

    const [name, startStr, endStr, strandStr, featureType] = fields;
    if (
      name === undefined ||
      startStr === undefined ||
      endStr === undefined ||
      strandStr === undefined ||
      featureType === undefined ||
      name === ""
    ) {
      throw new ParseError(
        `Feature table requires ${FEATURE_COLUMNS.length} tab-separated fields, got ${fields.length}`,
        "features",
        lineNumber,
        `Columns: ${FEATURE_COLUMNS.join(", ")}`
      );
    }

    const start = parseCoordinate(startStr, "start", lineNumber);
    const end = parseCoordinate(endStr, "end", lineNumber);
    if (start > end) {
      throw new ParseError(`Feature '${name}' starts after it ends (${start} > ${end})`, "features", lineNumber);
    }

    const strand = toGenomicStrand(strandStr);
    if (strand === undefined) {
      throw new ParseError(
        `Invalid strand '${strandStr}' for feature '${name}'`,
        "features",
        lineNumber,
        "Valid strands: 1, -1, +, -"
      );
    }

    return { name, start, end, strand, type: featureType };
  }
}

/**
 * Read a complete feature table
 */
export async function readTransposonFeatures(path: string): Promise<TransposonFeature[]> {
  return collect(new TransposonFeatureParser().parseFile(path));
}

/**
 * Find the first feature containing a transposon position
 */
export function findFeature(
  features: readonly TransposonFeature[],
  position: number
): TransposonFeature | undefined {
  return features.find((feature) => feature.start <= position && position <= feature.end);
}
