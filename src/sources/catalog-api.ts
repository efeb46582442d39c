import fetch from 'node-fetch';
import type { RequestInit, Response } from 'node-fetch';
import { ListingSource } from './base';
import { Config } from '../config';
import {
  RawListing,
  accessTokenSchema,
  listingPageSchema,
  rawListingSchema,
} from '../types/listing';
import { AuthError, ConnectivityError, FetchError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

/**
 * Catalog REST API adapter (SuperJob API 2.20)
 * Docs: https://api.superjob.ru/
 */
export class CatalogApiClient implements ListingSource {
  readonly name = 'catalog-api';

  constructor(
    private config: Config,
    private fetchImpl: FetchLike = fetch
  ) {}

  async getAccessToken(): Promise<string> {
    const { login, password, clientId, clientSecret } = this.config.catalogApi;
    const url = this.buildUrl('/oauth2/password/', {
      login,
      password,
      client_id: clientId,
      client_secret: clientSecret,
    });

    // Credentials travel in the query string, so the URL is never logged
    const response = await this.request(url, {}, '/oauth2/password/');
    if (!response.ok) {
      throw new AuthError(`Credential exchange returned ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new AuthError(`Could not read credential exchange response: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const parsed = accessTokenSchema.safeParse(body);
    if (!parsed.success) {
      throw new AuthError('Credential exchange response has no access_token', {
        cause: parsed.error,
      });
    }

    logger.info(`Access token obtained from ${this.name}`);
    return parsed.data.access_token;
  }

  async fetchPage(
    accessToken: string,
    catalogueIds: readonly number[],
    page: number
  ): Promise<RawListing[]> {
    const listings: RawListing[] = [];

    for (const catalogueId of catalogueIds) {
      const url = this.buildUrl('/vacancies/', {
        period: this.config.period,
        town: this.config.townId,
        count: this.config.pageSize,
        catalogues: catalogueId,
        page,
      });

      const response = await this.request(url, {
        headers: {
          'X-Api-App-Id': this.config.catalogApi.clientSecret,
          Authorization: `Bearer ${accessToken}`,
        },
      }, url);

      if (!response.ok) {
        throw new FetchError(`Catalog API returned ${response.status}`, {
          status: response.status,
          url,
        });
      }

      const body = listingPageSchema.safeParse(await this.readJson(response, url));
      if (!body.success) {
        throw new FetchError('Catalog API response has no objects array', {
          cause: body.error,
          url,
        });
      }

      for (const [index, item] of body.data.objects.entries()) {
        const listing = rawListingSchema.safeParse(item);
        if (!listing.success) {
          throw new FetchError(`Listing #${index} has an unexpected id shape`, {
            cause: listing.error,
            url,
          });
        }
        listings.push(listing.data);
      }

      logger.debug(`Fetched catalogue page`, {
        catalogueId,
        page,
        count: body.data.objects.length,
      });
    }

    return listings;
  }

  private buildUrl(path: string, params: Record<string, string | number>): string {
    const url = new URL(`${this.config.catalogApi.baseUrl}${path}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  private async request(url: string, init: RequestInit, label: string): Promise<Response> {
    try {
      return await this.fetchImpl(url, {
        ...init,
        timeout: this.config.catalogApi.requestTimeoutMs,
      });
    } catch (error) {
      throw new ConnectivityError(`Request to ${label} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private async readJson(response: Response, url: string): Promise<unknown> {
    try {
      return await response.json();
    } catch (error) {
      throw new FetchError(`Could not read catalog API response: ${errorMessage(error)}`, {
        cause: error,
        url,
      });
    }
  }
}
