import { ListingSource } from './base';
import { CatalogApiClient } from './catalog-api';
import { Config } from '../config';

export type { ListingSource } from './base';

/**
 * Factory function to create the listing source for the configured API
 */
export function createListingSource(config: Config): ListingSource {
  return new CatalogApiClient(config);
}
