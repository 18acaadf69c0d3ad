/**
 * GTF format parser
 *
 * Streams GTF features with line-numbered errors. Used to read the gene
 * annotation for insertion annotation and to filter blacklisted genes while
 * building references.
 *
 * @module gtf/parser
 */

import { type } from "arktype";
import { ParseError, ValidationError } from "../../errors";
import type { Strand } from "../../types";
import { AbstractParser } from "../abstract-parser";
import { GTF_LIMITS, type GtfFeature, type GtfParserOptions } from "./types";

const FeatureTypes = type("string>0").array();

const GtfParserOptionsSchema = type({
  "includeFeatures?": FeatureTypes,
  "excludeFeatures?": FeatureTypes,
});

/**
 * Parse GTF attributes
 *
 * Handles quoted and unquoted values; repeated keys (e.g. several `tag`
 * entries) are collected into arrays.
 *
 * @example
 * ```typescript
 * const attrs = parseGtfAttributes('gene_id "ENSMUSG001"; tag "basic"; tag "CCDS";');
 * console.log(attrs.gene_id); // "ENSMUSG001"
 * console.log(attrs.tag); // ["basic", "CCDS"]
 * ```
 *
 * @public
 */
export function parseGtfAttributes(attributeString: string): Record<string, string | string[]> {
  const attributes: Record<string, string | string[]> = {};

  for (const part of attributeString.split(";")) {
    const trimmed = part.trim();
    if (trimmed === "") continue;

    // key "value" or key value
    const match = trimmed.match(/^([^=\s]+)\s+(.+)$/);
    const key = match?.[1];
    let value = match?.[2]?.trim();
    if (key === undefined || value === undefined || value === "") continue;

    if (
      (value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'"))
    ) {
      value = value.slice(1, -1);
    }

    const existing = attributes[key];
    if (existing === undefined) {
      attributes[key] = value;
    } else if (typeof existing === "string") {
      attributes[key] = [existing, value];
    } else {
      existing.push(value);
    }
  }

  return attributes;
}

/**
 * Read a single-valued attribute
 *
 * @returns The value, the first value of a repeated key, or undefined
 */
export function getGtfAttribute(
  attributes: Readonly<Record<string, string | string[]>>,
  key: string
): string | undefined {
  const value = attributes[key];
  return typeof value === "string" ? value : value?.[0];
}

function isGtfStrand(strand: string): strand is Strand {
  return strand === "+" || strand === "-" || strand === ".";
}

/** Score field, "." for missing */
function parseGtfScore(scoreStr: string): number | null {
  if (scoreStr === "." || scoreStr === "") {
    return null;
  }

  const score = Number.parseFloat(scoreStr);
  if (Number.isNaN(score)) {
    throw new ParseError(`Invalid score: ${scoreStr}`, "GTF");
  }
  return score;
}

/** Frame field of CDS features (0, 1, 2 or ".") */
function parseGtfFrame(frameStr: string): number | null {
  if (frameStr === "." || frameStr === "") {
    return null;
  }

  const frame = Number.parseInt(frameStr, 10);
  if (Number.isNaN(frame) || frame < 0 || frame > 2) {
    throw new ParseError(`Invalid frame: ${frameStr} (must be 0, 1, 2, or '.')`, "GTF");
  }
  return frame;
}

/**
 * GTF coordinate validation for the 1-based inclusive system
 *
 * Single-base features (start = end) are valid.
 */
export function validateGtfCoordinates(
  start: number,
  end: number,
  sequenceLength: number = GTF_LIMITS.MAX_CHROMOSOME_SIZE,
  region = `${start}-${end}`
): { valid: boolean; error?: string } {
  if (start < GTF_LIMITS.MIN_COORDINATE) {
    return {
      valid: false,
      error: `Invalid start position: ${start} (GTF is 1-based, minimum value is 1) in region ${region}`,
    };
  }
  if (end > sequenceLength) {
    return {
      valid: false,
      error: `Invalid end position: ${end} (exceeds sequence length ${sequenceLength}) in region ${region}`,
    };
  }
  if (start > end) {
    return {
      valid: false,
      error: `Invalid coordinates: start ${start} > end ${end} in region ${region}`,
    };
  }
  return { valid: true };
}

function parseGtfCoordinate(value: string, name: string, lineNumber: number): number {
  if (!/^\d+$/.test(value)) {
    throw new ParseError(
      `Invalid ${name} coordinate '${value}' (not a number)`,
      "GTF",
      lineNumber,
      "GTF uses 1-based inclusive coordinates"
    );
  }
  return Number.parseInt(value, 10);
}

/**
 * Parse one GTF line into a feature
 *
 * @throws {ParseError} If the line is malformed
 */
export function parseGtfLine(line: string, lineNumber: number): GtfFeature {
  const fields = line.split("\t");
  const [seqname, source, feature, startStr, endStr, scoreStr, strandStr, frameStr, attributeStr] =
    fields;

  if (
    fields.length !== 9 ||
    seqname === undefined ||
    source === undefined ||
    feature === undefined ||
    startStr === undefined ||
    endStr === undefined ||
    scoreStr === undefined ||
    strandStr === undefined ||
    frameStr === undefined ||
    attributeStr === undefined
  ) {
    throw new ParseError(
      `GTF format requires exactly 9 tab-separated fields, got ${fields.length}`,
      "GTF",
      lineNumber,
      "Each GTF line must have: seqname, source, feature, start, end, score, strand, frame, attributes"
    );
  }

  if (seqname === "" || feature === "") {
    throw new ParseError("Missing required GTF fields", "GTF", lineNumber, "Required: seqname, feature");
  }

  const start = parseGtfCoordinate(startStr, "start", lineNumber);
  const end = parseGtfCoordinate(endStr, "end", lineNumber);
  const coordinates = validateGtfCoordinates(start, end, undefined, `${seqname}:${start}-${end}`);
  if (!coordinates.valid) {
    throw new ParseError(
      coordinates.error ?? "Invalid coordinates",
      "GTF",
      lineNumber,
      `Feature coordinates: ${seqname}:${start}-${end} (${feature})`
    );
  }

  if (!isGtfStrand(strandStr)) {
    throw new ParseError(
      `Invalid strand '${strandStr}', must be '+', '-', or '.'`,
      "GTF",
      lineNumber,
      "Valid strand annotations: + (forward), - (reverse), . (unknown/not applicable)"
    );
  }

  let score: number | null;
  let frame: number | null;
  try {
    score = parseGtfScore(scoreStr);
    frame = parseGtfFrame(frameStr);
  } catch (error) {
    if (error instanceof ParseError) {
      throw new ParseError(error.message, "GTF", lineNumber);
    }
    throw error;
  }

  return {
    seqname,
    source,
    feature,
    start,
    end,
    score,
    strand: strandStr,
    frame,
    attributes: parseGtfAttributes(attributeStr),
    length: end - start + 1,
    lineNumber,
  };
}

/**
 * Streaming GTF parser
 *
 * @example
 * ```typescript
 * const parser = new GtfParser({ includeFeatures: ["gene"] });
 * for await (const gene of parser.parseFile("reference/reference.gtf")) {
 *   console.log(`${gene.seqname}:${gene.start}-${gene.end}`);
 * }
 * ```
 *
 * @public
 */
export class GtfParser extends AbstractParser<GtfFeature> {
  private readonly options: GtfParserOptions;

  /**
   * @throws {ValidationError} If a feature type filter holds an empty name
   */
  constructor(options: GtfParserOptions = {}) {
    super();
    const validation = GtfParserOptionsSchema(options);
    if (validation instanceof type.errors) {
      throw new ValidationError(`Invalid GTF parser options: ${validation.summary}`);
    }
    this.options = options;
  }

  protected getFormatName(): string {
    return "GTF";
  }

  protected parseLine(line: string, lineNumber: number): GtfFeature | undefined {
    const feature = parseGtfLine(line, lineNumber);
    return this.shouldIncludeFeature(feature) ? feature : undefined;
  }

  private shouldIncludeFeature(feature: GtfFeature): boolean {
    const { includeFeatures, excludeFeatures } = this.options;
    if (includeFeatures !== undefined && !includeFeatures.includes(feature.feature)) {
      return false;
    }
    return excludeFeatures === undefined || !excludeFeatures.includes(feature.feature);
  }
}
