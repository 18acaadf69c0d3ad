/**
 * Shared type definitions
 *
 * Core types used across formats, external tool wrappers and insertion
 * detection, together with the arktype schemas that validate them at
 * runtime boundaries.
 */

import { type } from "arktype";

/**
 * GTF/BED strand annotation: + (forward), - (reverse), . (unknown)
 */
export type Strand = "+" | "-" | ".";

/**
 * Numeric strand used for fusions and insertions (1 = forward, -1 = reverse)
 */
export type GenomicStrand = 1 | -1;

/**
 * Convert a strand annotation into a numeric strand
 *
 * Accepts GTF style (`+`/`-`), numeric style (`1`/`-1`) and tophat
 * orientation letters (`f`/`r`).
 *
 * @returns The numeric strand, or undefined for unknown / unstranded values
 */
export function toGenomicStrand(value: string): GenomicStrand | undefined {
  switch (value) {
    case "+":
    case "1":
    case "+1":
    case "f":
      return 1;
    case "-":
    case "-1":
    case "r":
      return -1;
    default:
      return undefined;
  }
}

/**
 * Command line flags for an external tool
 *
 * Maps each flag to its values; an empty list produces a bare flag.
 *
 * @example
 * ```typescript
 * const args: ArgMap = { "--bowtie1": [], "--num-threads": [4] };
 * ```
 */
export type ArgMap = Readonly<Record<string, readonly (string | number)[]>>;

/**
 * Runtime schema for {@link ArgMap} values coming from configuration
 */
export const ArgMapSchema = type({
  "[string]": "(string | number)[]",
});

/**
 * Strictly positive integer, used for thread counts and lengths
 */
export const PositiveIntegerSchema = type("number>0").narrow((value, ctx) =>
  Number.isInteger(value) ? true : ctx.mustBe("an integer")
);

/**
 * Non-empty file system path
 */
export const FilePathSchema = type("string>0");
