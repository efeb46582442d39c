import { PoolClient } from 'pg';
import { ClassificationEntry } from '../types/records';

/** Code of taxonomy rows that are headings rather than occupations */
export const PLACEHOLDER_CODE = '_';

/**
 * Read access to the classification reference table
 */
export class ClassificationRepository {
  /**
   * Gets every entry that can be a match target, ordered by id
   */
  async getEligibleEntries(client: PoolClient): Promise<ClassificationEntry[]> {
    const result = await client.query<{ id: string | number; name: string }>(
      `SELECT id, name
       FROM classification
       WHERE code <> $1
       ORDER BY id`,
      [PLACEHOLDER_CODE]
    );

    return result.rows.map(row => ({
      id: Number(row.id),
      name: row.name,
    }));
  }
}
