import { PoolClient } from 'pg';
import { Organization } from '../types/records';
import { chunk, valuesClause } from './sql';
import { logger } from '../utils/logger';

export const COMPANY_COLUMNS = [
  'id',
  'name',
  'description',
  'vacancy_count',
  'staff_count',
  'client_logo',
  'main_address',
  'addresses',
  'url',
  'link',
  'registered_date',
  'download_time',
] as const;

function toRow(org: Organization): unknown[] {
  return [
    org.id,
    org.name,
    org.description,
    org.vacancyCount,
    org.staffCount,
    org.logo,
    org.mainAddress,
    org.addresses,
    org.url,
    org.link,
    org.registeredDate,
    org.downloadTime,
  ];
}

/**
 * Database operations for companies
 * Existing rows are never overwritten
 */
export class CompaniesRepository {
  /**
   * Inserts companies whose id is not present yet
   * Returns the number of inserted rows
   */
  async insertCompaniesIfAbsent(
    client: PoolClient,
    organizations: readonly Organization[]
  ): Promise<number> {
    let inserted = 0;

    for (const batch of chunk(organizations)) {
      const { text, values } = valuesClause(batch.map(toRow), COMPANY_COLUMNS.length);
      try {
        const result = await client.query(
          `INSERT INTO companies (${COMPANY_COLUMNS.join(', ')})
           VALUES ${text}
           ON CONFLICT (id) DO NOTHING`,
          values
        );
        inserted += result.rowCount ?? 0;
      } catch (error) {
        logger.error(`Error inserting companies`, error, { batchSize: batch.length });
        throw error;
      }
    }

    return inserted;
  }
}
