/**
 * Registration tables for indexers and aligners
 *
 * Tables are built explicitly and handed to the CLI; there is no global
 * registry to mutate.
 */

import { type AlignerEntry, starAlignerEntry, tophatAlignerEntry } from "./cli/aligners";
import { type IndexerEntry, starIndexerEntry, tophatIndexerEntry } from "./cli/indexers";
import { ValidationError } from "./errors";

/**
 * Named implementations of one kind
 *
 * @example
 * ```typescript
 * const aligners = createAlignerRegistry();
 * aligners.get("tophat").description;
 * aligners.get("bwa"); // ValidationError: Unknown aligner 'bwa' (available: tophat, star)
 * ```
 */
export class Registry<T> {
  private readonly entries = new Map<string, T>();

  /**
   * @param kind What is registered, used in error messages (e.g. "aligner")
   */
  constructor(readonly kind: string) {}

  /**
   * @throws {ValidationError} If the name is taken
   */
  register(name: string, entry: T): this {
    if (this.entries.has(name)) {
      throw new ValidationError(`Duplicate ${this.kind} '${name}'`);
    }
    this.entries.set(name, entry);
    return this;
  }

  /**
   * @throws {ValidationError} Listing the available names when `name` is unknown
   */
  get(name: string): T {
    const entry = this.entries.get(name);
    if (entry === undefined) {
      throw new ValidationError(
        `Unknown ${this.kind} '${name}' (available: ${this.names().join(", ")})`
      );
    }
    return entry;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  /** Registered names in registration order */
  names(): string[] {
    return [...this.entries.keys()];
  }
}

export function createIndexerRegistry(): Registry<IndexerEntry> {
  return new Registry<IndexerEntry>("indexer")
    .register("tophat", tophatIndexerEntry)
    .register("star", starIndexerEntry);
}

export function createAlignerRegistry(): Registry<AlignerEntry> {
  return new Registry<AlignerEntry>("aligner")
    .register("tophat", tophatAlignerEntry)
    .register("star", starAlignerEntry);
}
