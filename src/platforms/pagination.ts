export interface PageRequest {
  url: string;
  searchParams?: Record<string, string | number>;
}

export interface PageContents<TItem> {
  items: TItem[];
  /** Absolute URL of the next page, absent on the last page */
  next?: string | null;
}

/**
 * Follow an API's `next` links until the last page
 * Pages are requested only as the consumer iterates
 */
export async function* paginate<TPage, TItem>(
  first: PageRequest,
  fetchPage: (request: PageRequest) => Promise<TPage>,
  read: (page: TPage) => PageContents<TItem>
): AsyncGenerator<TItem, void, undefined> {
  let request: PageRequest | null = first;

  while (request) {
    const page = read(await fetchPage(request));
    yield* page.items;
    request = page.next ? { url: page.next } : null;
  }
}

export const chunk = <T>(items: readonly T[], size: number): T[][] => {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
};
