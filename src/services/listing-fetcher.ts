import pLimit from 'p-limit';
import { ListingSource } from '../sources/base';
import { RawListing } from '../types/listing';
import { Config } from '../config';
import { dedupeKeepLast } from './deduplication';
import { logger } from '../utils/logger';

export interface FetchStats {
  pages: number;
  fetched: number;
  withoutId: number;
  duplicates: number;
  withoutOrganization: number;
  kept: number;
}

/**
 * Fans page requests out over a bounded worker pool
 * Each worker owns one page index and queries every catalogue for it.
 */
export class ListingFetcher {
  constructor(
    private source: ListingSource,
    private config: Pick<Config, 'catalogueIds' | 'pageCount' | 'fetchConcurrency'>
  ) {}

  /**
   * Fetches every configured page and returns deduplicated listings
   * A single failed request rejects the whole fetch.
   */
  async fetchAll(accessToken: string): Promise<{ listings: RawListing[]; stats: FetchStats }> {
    const limit = pLimit(this.config.fetchConcurrency);
    const pages = Array.from({ length: this.config.pageCount }, (_, page) => page);

    logger.info(`Fetching ${pages.length} pages from ${this.source.name}`, {
      catalogues: this.config.catalogueIds.length,
      concurrency: this.config.fetchConcurrency,
    });

    // Promise.all is the join point: results come back in page order.
    // The first failure drops every page still waiting for a worker.
    const perPage = await Promise.all(
      pages.map(page =>
        limit(async () => {
          try {
            return await this.source.fetchPage(accessToken, this.config.catalogueIds, page);
          } catch (error) {
            limit.clearQueue();
            throw error;
          }
        })
      )
    );

    const merged = perPage.flat();
    const { listings, stats } = ListingFetcher.clean(merged);

    const summary: FetchStats = { pages: pages.length, ...stats };
    logger.info(`Source ${this.source.name} completed`, { ...summary });
    return { listings, stats: summary };
  }

  /**
   * Drops listings without an id, keeps the last listing per id, then
   * drops listings whose organization id is 0
   */
  static clean(merged: readonly RawListing[]): {
    listings: RawListing[];
    stats: Omit<FetchStats, 'pages'>;
  } {
    const withId = merged.filter(listing => listing.id !== null && listing.id !== undefined);
    const unique = dedupeKeepLast(withId, listing => listing.id);
    const listings = unique.filter(listing => listing.id_client !== 0);

    return {
      listings,
      stats: {
        fetched: merged.length,
        withoutId: merged.length - withId.length,
        duplicates: withId.length - unique.length,
        withoutOrganization: unique.length - listings.length,
        kept: listings.length,
      },
    };
  }
}
