/**
 * Tophat-Fusion `fusions.out` parser
 *
 * Each line describes one candidate fusion:
 *
 * ```
 * chr16-T2onc	52141093	1539	fr	400	90	12	0	40	37	...
 * ```
 *
 * Only the first ten fields are read; the read-level detail Tophat appends
 * after them is ignored.
 */

import { ParseError } from "../errors";
import { type GenomicStrand, toGenomicStrand } from "../types";
import { AbstractParser } from "./abstract-parser";

const REQUIRED_FIELDS = 10;

export type FusionOrientation = "ff" | "fr" | "rf" | "rr";

export interface TophatFusion {
  readonly seqname1: string;
  readonly seqname2: string;
  /** Breakpoint on the first partner (left coordinate) */
  readonly location1: number;
  /** Breakpoint on the second partner (right coordinate) */
  readonly location2: number;
  readonly orientation: FusionOrientation;
  readonly strand1: GenomicStrand;
  readonly strand2: GenomicStrand;
  /** Reads spanning the fusion junction */
  readonly supportJunction: number;
  /** Mate pairs supporting the fusion */
  readonly supportSpanning: number;
  /** Mate pairs with one end spanning the fusion */
  readonly supportSpanningOneEnd: number;
  /** Reads contradicting the fusion */
  readonly contradicting: number;
  /** Bases flanking the junction on the left */
  readonly flank1: number;
  /** Bases flanking the junction on the right */
  readonly flank2: number;
  readonly lineNumber: number;
}

function isFusionOrientation(value: string): value is FusionOrientation {
  return value === "ff" || value === "fr" || value === "rf" || value === "rr";
}

function parseCount(value: string, column: string, lineNumber: number): number {
  if (!/^\d+$/.test(value)) {
    throw new ParseError(`Invalid ${column} '${value}' (expected a non-negative integer)`, "fusions", lineNumber);
  }
  return Number.parseInt(value, 10);
}

function parseStrands(
  orientation: FusionOrientation
): readonly [GenomicStrand, GenomicStrand] {
  return [toGenomicStrand(orientation.charAt(0)) ?? 1, toGenomicStrand(orientation.charAt(1)) ?? 1];
}

/**
 * Streaming parser for Tophat-Fusion `fusions.out`
 *
 * The chromosome pair field is split at its single `-`; sequence names
 * containing `-` are rejected as ambiguous.
 */
export class TophatFusionParser extends AbstractParser<TophatFusion> {
  protected getFormatName(): string {
    return "fusions";
  }

  protected parseLine(line: string, lineNumber: number): TophatFusion {
    const fields = line.split("\t").map((field) => field.trim());
    if (fields.length < REQUIRED_FIELDS) {
      throw new ParseError(
        `Fusion line requires at least ${REQUIRED_FIELDS} tab-separated fields, got ${fields.length}`,
        "fusions",
        lineNumber
      );
    }

    const [pair = "", location1, location2, orientation = "", junction, spanning, oneEnd, contradicting, flank1, flank2] =
      fields;

    const seqnames = pair.split("-");
    const [seqname1, seqname2] = seqnames;
    if (seqnames.length !== 2 || seqname1 === undefined || seqname2 === undefined || seqname1 === "" || seqname2 === "") {
      throw new ParseError(
        `Invalid chromosome pair '${pair}'`,
        "fusions",
        lineNumber,
        "Expected two sequence names joined by a single '-', e.g. 'chr1-chr2'"
      );
    }

    if (!isFusionOrientation(orientation)) {
      throw new ParseError(
        `Invalid fusion orientation '${orientation}'`,
        "fusions",
        lineNumber,
        "Valid orientations: ff, fr, rf, rr"
      );
    }

    const [strand1, strand2] = parseStrands(orientation);

    return {
      seqname1,
      seqname2,
      location1: parseCount(location1 ?? "", "left coordinate", lineNumber),
      location2: parseCount(location2 ?? "", "right coordinate", lineNumber),
      orientation,
      strand1,
      strand2,
      supportJunction: parseCount(junction ?? "", "junction read count", lineNumber),
      supportSpanning: parseCount(spanning ?? "", "spanning pair count", lineNumber),
      supportSpanningOneEnd: parseCount(oneEnd ?? "", "one-end spanning count", lineNumber),
      contradicting: parseCount(contradicting ?? "", "contradicting read count", lineNumber),
      flank1: parseCount(flank1 ?? "", "left flank", lineNumber),
      flank2: parseCount(flank2 ?? "", "right flank", lineNumber),
      lineNumber,
    };
  }
}
