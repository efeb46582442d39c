import { PoolClient } from 'pg';

/**
 * Append-only log of run outcomes
 */
export class RunLogRepository {
  async record(client: PoolClient, exitPoint: number, message: string): Promise<void> {
    await client.query(
      `INSERT INTO run_log (exit_point, message) VALUES ($1, $2)`,
      [exitPoint, message]
    );
  }
}
