import { z } from 'zod';
import {
  Listing,
  RawClient,
  RawListing,
  Titled,
  listingSchema,
} from '../types/listing';
import { NormalizedBatch, Organization, Vacancy } from '../types/records';
import { dedupeKeepLast } from './deduplication';
import { TransformError } from '../utils/errors';
import { formatCivilDateTime, fromUnixSeconds } from '../utils/datetime';
import { logger } from '../utils/logger';

export interface NormalizerOptions {
  sourceSystemId: number;
  timeZone?: string;
  now?: () => Date;
}

function titleOf(value: Titled | null | undefined): string | null {
  return value?.title ?? null;
}

function joinOrNull(values: readonly (string | number)[] | null | undefined, separator: string): string | null {
  if (!values || values.length === 0) return null;
  return values.join(separator);
}

/** 0 means "not specified" for payment bounds */
function paymentOrNull(value: number | null): number | null {
  return value === null || value === 0 ? null : value;
}

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'invalid listing';
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}

/**
 * Flattens raw catalog listings into organization and vacancy records
 * Input listings are never mutated; every call builds new arrays.
 */
export class Normalizer {
  private readonly now: () => Date;

  constructor(private options: NormalizerOptions) {
    this.now = options.now ?? (() => new Date());
  }

  normalize(rawListings: readonly RawListing[]): NormalizedBatch {
    const listings = rawListings.map(raw => this.parse(raw));
    const downloadTime = formatCivilDateTime(this.now(), this.options.timeZone);

    const organizations = dedupeKeepLast(
      listings.flatMap(listing => {
        const organization = this.toOrganization(listing.client, downloadTime);
        return organization ? [organization] : [];
      }),
      organization => organization.id
    );

    const vacancies = dedupeKeepLast(
      listings
        .filter(listing => listing.id_client !== 0)
        .map(listing => this.toVacancy(listing, downloadTime)),
      vacancy => vacancy.id
    );

    logger.info('Organizations and vacancies normalized', {
      listings: listings.length,
      organizations: organizations.length,
      vacancies: vacancies.length,
    });

    return { organizations, vacancies };
  }

  private parse(raw: RawListing): Listing {
    const result = listingSchema.safeParse(raw);
    if (!result.success) {
      throw new TransformError(
        `Listing ${raw.id ?? '(no id)'} has an unexpected shape: ${describeIssue(result.error)}`,
        { cause: result.error }
      );
    }
    return result.data;
  }

  private toOrganization(client: RawClient | null, downloadTime: string): Organization | null {
    if (!client || client.id === null || client.id === undefined) return null;

    return {
      id: client.id,
      name: client.title ?? null,
      description: client.description ?? null,
      vacancyCount: client.vacancy_count ?? null,
      staffCount: client.staff_count ?? null,
      logo: client.client_logo ?? null,
      mainAddress: client.address ?? null,
      addresses: client.addresses ? JSON.stringify(client.addresses) : null,
      url: client.url ?? null,
      link: client.link ?? null,
      registeredDate:
        client.registered_date === null || client.registered_date === undefined
          ? null
          : fromUnixSeconds(client.registered_date, this.options.timeZone),
      downloadTime,
    };
  }

  private toVacancy(listing: Listing, downloadTime: string): Vacancy {
    const { timeZone } = this.options;
    const catalogues = listing.catalogues ?? [];

    return {
      id: listing.id,
      clientId: listing.id_client,
      profession: listing.profession,
      candidat: listing.candidat,
      work: listing.work,
      compensation: listing.compensation,
      education: titleOf(listing.education),
      experience: titleOf(listing.experience),
      typeOfWork: titleOf(listing.type_of_work),
      placeOfWork: titleOf(listing.place_of_work),
      maritalStatus: titleOf(listing.maritalstatus),
      children: titleOf(listing.children),
      gender: titleOf(listing.gender),
      drivingLicence: joinOrNull(listing.driving_licence, ', '),
      ageFrom: listing.age_from,
      ageTo: listing.age_to,
      moveable: listing.moveable,
      agreement: listing.agreement,
      agency: titleOf(listing.agency),
      town: titleOf(listing.town),
      paymentFrom: paymentOrNull(listing.payment_from),
      paymentTo: paymentOrNull(listing.payment_to),
      currency: listing.currency,
      address: listing.address,
      latitude: listing.latitude,
      longitude: listing.longitude,
      metro: joinOrNull(listing.metro?.flatMap(station => (station.title ? [station.title] : [])), '; '),
      link: listing.link,
      datePubTo: fromUnixSeconds(listing.date_pub_to, timeZone),
      datePublished: fromUnixSeconds(listing.date_published, timeZone),
      dateArchived: fromUnixSeconds(listing.date_archived, timeZone),
      isClosed: listing.is_closed,
      cataloguesId: joinOrNull(catalogues.map(catalogue => catalogue.id), '; '),
      cataloguesName: joinOrNull(catalogues.map(catalogue => catalogue.title), '; '),
      downloadTime,
      sourceId: this.options.sourceSystemId,
      classificationId: null,
    };
  }
}
