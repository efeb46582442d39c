import { Pool } from 'pg';
import { withTransaction, verifyConnection } from './client';
import { CompaniesRepository } from './companies';
import { VacanciesRepository } from './vacancies';
import { ClassificationRepository } from './classification';
import { RunLogRepository } from './run-log';
import {
  ClassificationEntry,
  MatchResult,
  Organization,
  UnmatchedVacancy,
  Vacancy,
} from '../types/records';

/**
 * Persistence operations the pipeline depends on
 */
export interface PipelineStore {
  verifyConnection(): Promise<void>;
  saveOrganizations(organizations: readonly Organization[]): Promise<number>;
  saveVacancies(vacancies: readonly Vacancy[]): Promise<number>;
  loadUnmatchedVacancies(): Promise<UnmatchedVacancy[]>;
  loadClassificationEntries(): Promise<ClassificationEntry[]>;
  /**
   * Writes classification ids, then flags every processed vacancy as matched
   */
  saveMatches(matches: readonly MatchResult[], processedIds: readonly number[]): Promise<void>;
  recordRun(exitPoint: number, message: string): Promise<void>;
}

/**
 * PostgreSQL-backed store; every write runs in its own transaction
 */
export class PostgresStore implements PipelineStore {
  constructor(
    private pool: Pool,
    private companiesRepo = new CompaniesRepository(),
    private vacanciesRepo = new VacanciesRepository(),
    private classificationRepo = new ClassificationRepository(),
    private runLogRepo = new RunLogRepository()
  ) {}

  async verifyConnection(): Promise<void> {
    await verifyConnection(this.pool);
  }

  async saveOrganizations(organizations: readonly Organization[]): Promise<number> {
    if (organizations.length === 0) return 0;
    return withTransaction(this.pool, client =>
      this.companiesRepo.insertCompaniesIfAbsent(client, organizations)
    );
  }

  async saveVacancies(vacancies: readonly Vacancy[]): Promise<number> {
    if (vacancies.length === 0) return 0;
    return withTransaction(this.pool, client =>
      this.vacanciesRepo.upsertVacancies(client, vacancies)
    );
  }

  async loadUnmatchedVacancies(): Promise<UnmatchedVacancy[]> {
    const client = await this.pool.connect();
    try {
      return await this.vacanciesRepo.getUnmatchedVacancies(client);
    } finally {
      client.release();
    }
  }

  async loadClassificationEntries(): Promise<ClassificationEntry[]> {
    const client = await this.pool.connect();
    try {
      return await this.classificationRepo.getEligibleEntries(client);
    } finally {
      client.release();
    }
  }

  async saveMatches(matches: readonly MatchResult[], processedIds: readonly number[]): Promise<void> {
    await withTransaction(this.pool, client =>
      this.vacanciesRepo.setClassificationIds(client, matches)
    );
    await withTransaction(this.pool, client =>
      this.vacanciesRepo.markMatched(client, processedIds)
    );
  }

  async recordRun(exitPoint: number, message: string): Promise<void> {
    await withTransaction(this.pool, client =>
      this.runLogRepo.record(client, exitPoint, message)
    );
  }
}
