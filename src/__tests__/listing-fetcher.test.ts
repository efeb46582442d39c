import { describe, it, expect, vi } from 'vitest';
import { ListingFetcher } from '../services/listing-fetcher';
import { dedupeKeepLast } from '../services/deduplication';
import { ListingSource } from '../sources/base';
import { RawListing } from '../types/listing';
import { FetchError } from '../utils/errors';

function stubSource(pages: Record<number, RawListing[]>) {
  const fetchPage = vi.fn(
    async (_token: string, _catalogues: readonly number[], page: number): Promise<RawListing[]> =>
      pages[page] ?? []
  );
  const source: ListingSource = {
    name: 'stub',
    getAccessToken: async () => 'token',
    fetchPage,
  };
  return { source, fetchPage };
}

describe('dedupeKeepLast', () => {
  it('keeps the last row per key in first-seen order', () => {
    const rows = [
      { id: 1, v: 'a' },
      { id: 2, v: 'b' },
      { id: 1, v: 'c' },
    ];
    expect(dedupeKeepLast(rows, row => row.id)).toEqual([
      { id: 1, v: 'c' },
      { id: 2, v: 'b' },
    ]);
  });

  it('drops rows without a key', () => {
    const rows = [{ id: null }, { id: 3 }];
    expect(dedupeKeepLast(rows, row => row.id)).toEqual([{ id: 3 }]);
  });
});

describe('ListingFetcher.clean', () => {
  it('keeps exactly one listing per id, the last one encountered', () => {
    const { listings, stats } = ListingFetcher.clean([
      { id: 5, id_client: 1, profession: 'first' },
      { id: 6, id_client: 1 },
      { id: 5, id_client: 2, profession: 'last' },
    ]);
    expect(listings).toEqual([
      { id: 5, id_client: 2, profession: 'last' },
      { id: 6, id_client: 1 },
    ]);
    expect(stats.duplicates).toBe(1);
  });

  it('drops listings without an id', () => {
    const { listings, stats } = ListingFetcher.clean([{ id: null, id_client: 1 }, { id_client: 1 }, { id: 8, id_client: 1 }]);
    expect(listings).toEqual([{ id: 8, id_client: 1 }]);
    expect(stats.withoutId).toBe(2);
  });

  it('drops a duplicated id entirely when its last occurrence has organization id 0', () => {
    const { listings } = ListingFetcher.clean([
      { id: 42, id_client: 7 },
      { id: 42, id_client: 0 },
    ]);
    expect(listings).toEqual([]);
  });

  it('keeps a duplicated id when its last occurrence has a real organization', () => {
    const { listings, stats } = ListingFetcher.clean([
      { id: 42, id_client: 0 },
      { id: 42, id_client: 7 },
    ]);
    expect(listings).toEqual([{ id: 42, id_client: 7 }]);
    expect(stats).toEqual({
      fetched: 2,
      withoutId: 0,
      duplicates: 1,
      withoutOrganization: 0,
      kept: 1,
    });
  });
});

describe('ListingFetcher.fetchAll', () => {
  it('requests every page with all catalogues and merges them in page order', async () => {
    const { source, fetchPage } = stubSource({
      0: [{ id: 1, id_client: 1, page: 0 }],
      1: [{ id: 2, id_client: 1 }, { id: 1, id_client: 1, page: 1 }],
      2: [{ id: 3, id_client: 0 }],
    });
    const fetcher = new ListingFetcher(source, {
      catalogueIds: [33, 62],
      pageCount: 3,
      fetchConcurrency: 2,
    });

    const { listings, stats } = await fetcher.fetchAll('token');

    expect(fetchPage).toHaveBeenCalledTimes(3);
    expect(fetchPage).toHaveBeenCalledWith('token', [33, 62], 0);
    expect(fetchPage).toHaveBeenCalledWith('token', [33, 62], 1);
    expect(fetchPage).toHaveBeenCalledWith('token', [33, 62], 2);
    expect(listings).toEqual([
      { id: 1, id_client: 1, page: 1 },
      { id: 2, id_client: 1 },
    ]);
    expect(stats).toEqual({
      pages: 3,
      fetched: 4,
      withoutId: 0,
      duplicates: 1,
      withoutOrganization: 1,
      kept: 2,
    });
  });

  it('never runs more workers than the configured concurrency', async () => {
    let running = 0;
    let peak = 0;
    const source: ListingSource = {
      name: 'slow',
      getAccessToken: async () => 'token',
      fetchPage: async (_token, _catalogues, page) => {
        running++;
        peak = Math.max(peak, running);
        await new Promise(resolve => setTimeout(resolve, 5));
        running--;
        return [{ id: page, id_client: 1 }];
      },
    };
    const fetcher = new ListingFetcher(source, { catalogueIds: [1], pageCount: 5, fetchConcurrency: 2 });

    const { listings } = await fetcher.fetchAll('token');

    expect(peak).toBe(2);
    expect(listings.map(listing => listing.id)).toEqual([0, 1, 2, 3, 4]);
  });

  it('stops starting queued pages once a page has failed', async () => {
    const started: number[] = [];
    const source: ListingSource = {
      name: 'failing',
      getAccessToken: async () => 'token',
      fetchPage: async (_token, _catalogues, page) => {
        started.push(page);
        if (page === 0) throw new FetchError('Catalog API returned 500', { status: 500 });
        await new Promise(resolve => setTimeout(resolve, 5));
        return [{ id: page, id_client: 1 }];
      },
    };
    const fetcher = new ListingFetcher(source, { catalogueIds: [1], pageCount: 5, fetchConcurrency: 1 });

    await expect(fetcher.fetchAll('token')).rejects.toThrow('Catalog API returned 500');
    await new Promise(resolve => setTimeout(resolve, 30));

    expect(started).toEqual([0]);
  });

  it('rejects the whole fetch when one page fails', async () => {
    const { source, fetchPage } = stubSource({});
    fetchPage.mockImplementation(async (_token, _catalogues, page) => {
      if (page === 1) throw new FetchError('Catalog API returned 502', { status: 502 });
      return [{ id: page, id_client: 1 }];
    });
    const fetcher = new ListingFetcher(source, { catalogueIds: [1], pageCount: 3, fetchConcurrency: 4 });

    await expect(fetcher.fetchAll('token')).rejects.toThrow('Catalog API returned 502');
  });
});
