import { z } from 'zod';

/**
 * Catalog API payload schemas
 * Only the fields the pipeline reads are declared; everything else is ignored.
 */

/** Dictionary reference such as education level or town: `{ id, title }` */
export const titledSchema = z.object({
  title: z.string().nullish(),
});

export type Titled = z.infer<typeof titledSchema>;

export const clientSchema = z.object({
  id: z.number().int().nullish(),
  title: z.string().nullish(),
  description: z.string().nullish(),
  vacancy_count: z.number().int().nullish(),
  staff_count: z.string().nullish(),
  client_logo: z.string().nullish(),
  address: z.string().nullish(),
  addresses: z.array(z.unknown()).nullish(),
  url: z.string().nullish(),
  link: z.string().nullish(),
  registered_date: z.number().int().nullish(),
});

export type RawClient = z.infer<typeof clientSchema>;

export const catalogueSchema = z.object({
  id: z.number().int(),
  title: z.string(),
});

/**
 * A single vacancy as returned by `GET /vacancies/`
 */
export const listingSchema = z.object({
  id: z.number().int(),
  id_client: z.number().int().nullable(),
  profession: z.string().nullable(),
  candidat: z.string().nullable(),
  work: z.string().nullable(),
  compensation: z.string().nullable(),
  education: titledSchema.nullable(),
  experience: titledSchema.nullable(),
  type_of_work: titledSchema.nullable(),
  place_of_work: titledSchema.nullable(),
  maritalstatus: titledSchema.nullable(),
  children: titledSchema.nullable(),
  gender: titledSchema.nullable(),
  driving_licence: z.array(z.string()).nullish(),
  age_from: z.number().int().nullable(),
  age_to: z.number().int().nullable(),
  moveable: z.boolean(),
  agreement: z.boolean(),
  agency: titledSchema.nullable(),
  town: titledSchema.nullable(),
  payment_from: z.number().int().nullable(),
  payment_to: z.number().int().nullable(),
  currency: z.string().nullable(),
  address: z.string().nullable(),
  latitude: z.number().nullable(),
  longitude: z.number().nullable(),
  metro: z.array(titledSchema).nullish(),
  link: z.string().nullable(),
  date_pub_to: z.number().int(),
  date_published: z.number().int(),
  date_archived: z.number().int(),
  is_closed: z.boolean(),
  catalogues: z.array(catalogueSchema).nullish(),
  client: clientSchema.nullable(),
});

export type Listing = z.infer<typeof listingSchema>;

/**
 * The fetch stage only looks at the identifiers; the rest of the
 * record travels untouched to the normalizer
 */
export const rawListingSchema = z
  .object({
    id: z.number().int().nullish(),
    id_client: z.number().int().nullish(),
  })
  .passthrough();

export type RawListing = z.infer<typeof rawListingSchema>;

export const listingPageSchema = z.object({
  objects: z.array(z.unknown()),
});

export const accessTokenSchema = z.object({
  access_token: z.string().min(1),
});
