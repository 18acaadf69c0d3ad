/**
 * STAR `Chimeric.out.junction` parser
 *
 * One line per chimeric read or read pair, 14 tab-separated columns:
 * donor chromosome, breakpoint and strand; acceptor chromosome, breakpoint and
 * strand; junction type; repeat lengths; read name; alignment starts and
 * CIGARs of both segments.
 */

import { ParseError } from "../errors";
import { type GenomicStrand, toGenomicStrand } from "../types";
import { AbstractParser } from "./abstract-parser";

const JUNCTION_COLUMNS = 14;

/** Junction type STAR reports for mate pairs encompassing the junction */
export const SPANNING_PAIR_TYPE = -1;

export interface ChimericJunction {
  readonly donorSeqname: string;
  /** First base of the intron on the donor side */
  readonly donorBreakpoint: number;
  readonly donorStrand: GenomicStrand;
  readonly acceptorSeqname: string;
  /** First base of the intron on the acceptor side */
  readonly acceptorBreakpoint: number;
  readonly acceptorStrand: GenomicStrand;
  /** -1 spanning pair; 0, 1, 2 split read (non-canonical, GT/AG, CT/AC) */
  readonly junctionType: number;
  readonly repeatLeft: number;
  readonly repeatRight: number;
  readonly readName: string;
  readonly donorAlignmentStart: number;
  readonly donorCigar: string;
  readonly acceptorAlignmentStart: number;
  readonly acceptorCigar: string;
  readonly lineNumber: number;
}

function parseInteger(value: string, column: string, lineNumber: number): number {
  if (!/^-?\d+$/.test(value)) {
    throw new ParseError(`Invalid ${column} '${value}' (expected an integer)`, "junctions", lineNumber);
  }
  return Number.parseInt(value, 10);
}

function parseStrand(value: string, column: string, lineNumber: number): GenomicStrand {
  const strand = toGenomicStrand(value);
  if (strand === undefined) {
    throw new ParseError(`Invalid ${column} '${value}'`, "junctions", lineNumber, "Valid strands: +, -");
  }
  return strand;
}

/**
 * Streaming parser for STAR chimeric junctions
 *
 * Skips `#` comment lines and the `chr_donorA` header written by newer STAR
 * releases.
 */
export class ChimericJunctionParser extends AbstractParser<ChimericJunction> {
  protected getFormatName(): string {
    return "junctions";
  }

  protected override shouldSkipLine(line: string): boolean {
    return super.shouldSkipLine(line) || line.startsWith("chr_donorA");
  }

  protected parseLine(line: string, lineNumber: number): ChimericJunction {
    const fields = line.split("\t");
    const [
      donorSeqname,
      donorBreakpoint,
      donorStrand,
      acceptorSeqname,
      acceptorBreakpoint,
      acceptorStrand,
      junctionType,
      repeatLeft,
      repeatRight,
      readName,
      donorAlignmentStart,
      donorCigar,
      acceptorAlignmentStart,
      acceptorCigar,
    ] = fields;

    if (
      fields.length < JUNCTION_COLUMNS ||
      donorSeqname === undefined ||
      donorBreakpoint === undefined ||
      donorStrand === undefined ||
      acceptorSeqname === undefined ||
      acceptorBreakpoint === undefined ||
      acceptorStrand === undefined ||
      junctionType === undefined ||
      repeatLeft === undefined ||
      repeatRight === undefined ||
      readName === undefined ||
      donorAlignmentStart === undefined ||
      donorCigar === undefined ||
      acceptorAlignmentStart === undefined ||
      acceptorCigar === undefined
    ) {
      throw new ParseError(
        `Chimeric junction requires ${JUNCTION_COLUMNS} tab-separated fields, got ${fields.length}`,
        "junctions",
        lineNumber
      );
    }

    return {
      donorSeqname,
      donorBreakpoint: parseInteger(donorBreakpoint, "donor breakpoint", lineNumber),
      donorStrand: parseStrand(donorStrand, "donor strand", lineNumber),
      acceptorSeqname,
      acceptorBreakpoint: parseInteger(acceptorBreakpoint, "acceptor breakpoint", lineNumber),
      acceptorStrand: parseStrand(acceptorStrand, "acceptor strand", lineNumber),
      junctionType: parseInteger(junctionType, "junction type", lineNumber),
      repeatLeft: parseInteger(repeatLeft, "left repeat length", lineNumber),
      repeatRight: parseInteger(repeatRight, "right repeat length", lineNumber),
      readName,
      donorAlignmentStart: parseInteger(donorAlignmentStart, "donor alignment start", lineNumber),
      donorCigar,
      acceptorAlignmentStart: parseInteger(acceptorAlignmentStart, "acceptor alignment start", lineNumber),
      acceptorCigar,
      lineNumber,
    };
  }
}
