/**
 * Normalized records persisted by the pipeline
 * Datetimes are civil `YYYY-MM-DD HH:MM:SS` strings in the run's zone.
 */

export interface Organization {
  id: number;
  name: string | null;
  description: string | null;
  vacancyCount: number | null;
  staffCount: string | null;
  logo: string | null;
  mainAddress: string | null;
  /** JSON-serialized list of additional addresses */
  addresses: string | null;
  url: string | null;
  link: string | null;
  registeredDate: string | null;
  downloadTime: string;
}

export interface Vacancy {
  id: number;
  clientId: number | null;
  profession: string | null;
  candidat: string | null;
  work: string | null;
  compensation: string | null;
  education: string | null;
  experience: string | null;
  typeOfWork: string | null;
  placeOfWork: string | null;
  maritalStatus: string | null;
  children: string | null;
  gender: string | null;
  drivingLicence: string | null;
  ageFrom: number | null;
  ageTo: number | null;
  moveable: boolean;
  agreement: boolean;
  agency: string | null;
  town: string | null;
  paymentFrom: number | null;
  paymentTo: number | null;
  currency: string | null;
  address: string | null;
  latitude: number | null;
  longitude: number | null;
  metro: string | null;
  link: string | null;
  datePubTo: string;
  datePublished: string;
  dateArchived: string;
  isClosed: boolean;
  cataloguesId: string | null;
  cataloguesName: string | null;
  downloadTime: string;
  sourceId: number;
  classificationId: number | null;
}

export interface NormalizedBatch {
  organizations: Organization[];
  vacancies: Vacancy[];
}

/**
 * Vacancy awaiting reconciliation
 */
export interface UnmatchedVacancy {
  id: number;
  profession: string | null;
}

/**
 * Eligible taxonomy row (code is not the placeholder)
 */
export interface ClassificationEntry {
  id: number;
  name: string;
}

export interface MatchResult {
  vacancyId: number;
  classificationId: number;
  classificationName: string;
  score: number;
}
