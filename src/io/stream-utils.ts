/**
 * Async iterable helpers
 */

/**
 * Drain an iterable into an array
 *
 * @example
 * ```typescript
 * const features = await collect(new TransposonFeatureParser().parseFile(path));
 * ```
 */
export async function collect<T>(source: Iterable<T> | AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}
