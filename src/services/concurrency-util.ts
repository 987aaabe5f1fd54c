/**
 * Map over items with at most `limit` calls in flight, keeping results in
 * input order. A limit of 0 (or one at least as large as the input) starts
 * every call at once.
 *
 * The mapper is expected to settle on its own: a rejection rejects the whole
 * map, so callers that need per-item isolation must catch inside the mapper.
 */
export async function mapWithConcurrency<T, R>(
  items: ReadonlyArray<T>,
  limit: number,
  mapper: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  if (limit <= 0 || limit >= items.length) {
    return Promise.all(items.map((item, index) => mapper(item, index)));
  }

  const results = new Array<R>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await mapper(items[index], index);
    }
  };

  const workers = Array.from({ length: limit }, () => worker());
  await Promise.all(workers);

  return results;
}
