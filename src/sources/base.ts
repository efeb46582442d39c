import type { RawListing } from '../types/listing';

/**
 * Upstream catalog the pipeline reads listings from
 */
export interface ListingSource {
  /**
   * Unique identifier for the source
   */
  readonly name: string;

  /**
   * Exchanges the configured credentials for an access token
   */
  getAccessToken(): Promise<string>;

  /**
   * Fetches one result page for every catalogue, one request per catalogue
   * @param accessToken - Token returned by getAccessToken
   * @param catalogueIds - Catalogue ids, queried in order
   * @param page - Zero-based page index
   * @returns Listings of all catalogues concatenated in catalogue order
   */
  fetchPage(accessToken: string, catalogueIds: readonly number[], page: number): Promise<RawListing[]>;
}
