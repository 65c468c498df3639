export type PageFetcher<T> = (startAt: number, maxResults: number) => Promise<T[]>;

/**
 * Offset pagination: request pages at increasing offsets until one comes back
 * empty. The offset advances by the number of records actually returned, so
 * a server that caps `maxResults` below `pageSize` still gets walked fully.
 */
export async function* paginate<T>(
  fetchPage: PageFetcher<T>,
  pageSize: number
): AsyncGenerator<T> {
  let startAt = 0;
  while (true) {
    const page = await fetchPage(startAt, pageSize);
    if (page.length === 0) return;
    for (const record of page) {
      yield record;
    }
    startAt += page.length;
  }
}
