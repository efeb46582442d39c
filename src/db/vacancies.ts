import { PoolClient } from 'pg';
import { MatchResult, UnmatchedVacancy, Vacancy } from '../types/records';
import { chunk, valuesClause } from './sql';
import { logger } from '../utils/logger';

export const VACANCY_COLUMNS = [
  'id',
  'id_client',
  'profession',
  'candidat',
  'work',
  'compensation',
  'education',
  'experience',
  'type_of_work',
  'place_of_work',
  'maritalstatus',
  'children',
  'gender',
  'driving_licence',
  'age_from',
  'age_to',
  'moveable',
  'agreement',
  'agency',
  'town',
  'payment_from',
  'payment_to',
  'currency',
  'address',
  'latitude',
  'longitude',
  'metro',
  'link',
  'date_pub_to',
  'date_published',
  'date_archived',
  'is_closed',
  'catalogues_id',
  'catalogues_name',
  'download_time',
  'source_id',
  'classification_id',
] as const;

// classification_id belongs to reconciliation; is_matched is never part of the insert
const PRESERVED_ON_CONFLICT: ReadonlySet<string> = new Set(['id', 'classification_id']);

export const VACANCY_UPDATE_COLUMNS = VACANCY_COLUMNS.filter(
  column => !PRESERVED_ON_CONFLICT.has(column)
);

function toRow(vacancy: Vacancy): unknown[] {
  return [
    vacancy.id,
    vacancy.clientId,
    vacancy.profession,
    vacancy.candidat,
    vacancy.work,
    vacancy.compensation,
    vacancy.education,
    vacancy.experience,
    vacancy.typeOfWork,
    vacancy.placeOfWork,
    vacancy.maritalStatus,
    vacancy.children,
    vacancy.gender,
    vacancy.drivingLicence,
    vacancy.ageFrom,
    vacancy.ageTo,
    vacancy.moveable,
    vacancy.agreement,
    vacancy.agency,
    vacancy.town,
    vacancy.paymentFrom,
    vacancy.paymentTo,
    vacancy.currency,
    vacancy.address,
    vacancy.latitude,
    vacancy.longitude,
    vacancy.metro,
    vacancy.link,
    vacancy.datePubTo,
    vacancy.datePublished,
    vacancy.dateArchived,
    vacancy.isClosed,
    vacancy.cataloguesId,
    vacancy.cataloguesName,
    vacancy.downloadTime,
    vacancy.sourceId,
    vacancy.classificationId,
  ];
}

/**
 * Database operations for vacancies
 */
export class VacanciesRepository {
  /**
   * Inserts new vacancies and overwrites existing ones row for row
   * Returns the number of affected rows
   */
  async upsertVacancies(client: PoolClient, vacancies: readonly Vacancy[]): Promise<number> {
    const updates = VACANCY_UPDATE_COLUMNS
      .map(column => `${column} = EXCLUDED.${column}`)
      .join(', ');
    let affected = 0;

    for (const batch of chunk(vacancies)) {
      const { text, values } = valuesClause(batch.map(toRow), VACANCY_COLUMNS.length);
      try {
        const result = await client.query(
          `INSERT INTO vacancies (${VACANCY_COLUMNS.join(', ')})
           VALUES ${text}
           ON CONFLICT (id)
           DO UPDATE SET ${updates}`,
          values
        );
        affected += result.rowCount ?? 0;
      } catch (error) {
        logger.error(`Error upserting vacancies`, error, { batchSize: batch.length });
        throw error;
      }
    }

    return affected;
  }

  /**
   * Gets vacancies that have not been through reconciliation yet
   */
  async getUnmatchedVacancies(client: PoolClient): Promise<UnmatchedVacancy[]> {
    const result = await client.query<{ id: string | number; profession: string | null }>(
      `SELECT id, profession
       FROM vacancies
       WHERE is_matched = false
       ORDER BY id`
    );

    return result.rows.map(row => ({
      id: Number(row.id),
      profession: row.profession,
    }));
  }

  /**
   * Writes resolved classification ids
   */
  async setClassificationIds(client: PoolClient, matches: readonly MatchResult[]): Promise<void> {
    for (const match of matches) {
      try {
        await client.query(
          `UPDATE vacancies SET classification_id = $1 WHERE id = $2`,
          [match.classificationId, match.vacancyId]
        );
      } catch (error) {
        logger.error(`Error setting classification id`, error, { vacancyId: match.vacancyId });
        throw error;
      }
    }
  }

  /**
   * Flags vacancies as processed by reconciliation, matched or not
   */
  async markMatched(client: PoolClient, vacancyIds: readonly number[]): Promise<number> {
    if (vacancyIds.length === 0) return 0;

    const result = await client.query(
      `UPDATE vacancies SET is_matched = true WHERE id = ANY($1::bigint[])`,
      [vacancyIds]
    );
    return result.rowCount ?? 0;
  }
}
