/**
 * GTF (Gene Transfer Format) module exports
 *
 * @example
 * ```typescript
 * import { GtfParser } from "./formats/gtf";
 *
 * const parser = new GtfParser();
 * for await (const feature of parser.parseString(gtfData)) {
 *   console.log(`${feature.seqname}:${feature.start}-${feature.end}`);
 * }
 * ```
 *
 * @module gtf
 */

export {
  GtfParser,
  getGtfAttribute,
  parseGtfAttributes,
  parseGtfLine,
  validateGtfCoordinates,
} from "./parser";
export type { GtfFeature, GtfParserOptions } from "./types";
export { GTF_LIMITS } from "./types";
