import { Config } from '../config';
import { ListingSource } from '../sources/base';
import { PipelineStore } from '../db/store';
import { ListingFetcher } from './listing-fetcher';
import { Normalizer } from './normalizer';
import { ClassificationIndex } from './classification-index';
import { ClassificationMatcher } from './matcher';
import {
  AuthError,
  ConnectivityError,
  ExitPoint,
  FetchError,
  PersistenceError,
  PipelineError,
  ReconciliationError,
  TransformError,
  errorMessage,
} from '../utils/errors';
import { logger } from '../utils/logger';

type PipelineErrorClass = new (message: string, options?: { cause?: unknown }) => PipelineError;

interface Stage {
  exitPoint: ExitPoint;
  name: string;
  failureMessage: string;
  errorClass: PipelineErrorClass;
}

const STAGES = {
  connect: {
    exitPoint: ExitPoint.DatabaseConnect,
    name: 'connect',
    failureMessage: 'Failed to connect to the database',
    errorClass: ConnectivityError,
  },
  authenticate: {
    exitPoint: ExitPoint.AccessToken,
    name: 'authenticate',
    failureMessage: 'Failed to obtain an access token',
    errorClass: AuthError,
  },
  fetch: {
    exitPoint: ExitPoint.FetchListings,
    name: 'fetch',
    failureMessage: 'Failed to fetch listings from the catalog API',
    errorClass: FetchError,
  },
  normalize: {
    exitPoint: ExitPoint.Normalize,
    name: 'normalize',
    failureMessage: 'Failed to build organization and vacancy records',
    errorClass: TransformError,
  },
  saveOrganizations: {
    exitPoint: ExitPoint.SaveOrganizations,
    name: 'save-organizations',
    failureMessage: 'Failed to save companies',
    errorClass: PersistenceError,
  },
  saveVacancies: {
    exitPoint: ExitPoint.SaveVacancies,
    name: 'save-vacancies',
    failureMessage: 'Failed to save vacancies',
    errorClass: PersistenceError,
  },
  readBack: {
    exitPoint: ExitPoint.ReadBack,
    name: 'read-back',
    failureMessage: 'Failed to read unmatched vacancies and classification entries',
    errorClass: ReconciliationError,
  },
  match: {
    exitPoint: ExitPoint.Match,
    name: 'match',
    failureMessage: 'Failed to match classification codes',
    errorClass: ReconciliationError,
  },
  writeBack: {
    exitPoint: ExitPoint.WriteBack,
    name: 'write-back',
    failureMessage: 'Failed to write classification codes',
    errorClass: PersistenceError,
  },
} satisfies Record<string, Stage>;

export const SUCCESS_MESSAGE = 'Data loaded successfully';

export interface StageFailure {
  stage: string;
  exitPoint: ExitPoint;
  message: string;
  error: PipelineError;
}

export type StageResult<T> =
  | { ok: true; value: T }
  | { ok: false; failure: StageFailure };

export interface RunOutcome {
  exitCode: ExitPoint;
  message: string;
  error?: PipelineError;
  durationMs: number;
}

export interface PipelineDependencies {
  config: Pick<
    Config,
    'catalogueIds' | 'pageCount' | 'fetchConcurrency' | 'similarityThreshold' | 'sourceSystemId' | 'timeZone'
  >;
  source: ListingSource;
  store: PipelineStore;
  now?: () => Date;
}

/**
 * Runs one ingestion pass: fetch, normalize, persist, reconcile
 * Stages run in order and the first failure ends the run; nothing is retried.
 */
export class IngestionPipeline {
  private readonly fetcher: ListingFetcher;
  private readonly normalizer: Normalizer;

  constructor(private deps: PipelineDependencies) {
    this.fetcher = new ListingFetcher(deps.source, deps.config);
    this.normalizer = new Normalizer({
      sourceSystemId: deps.config.sourceSystemId,
      timeZone: deps.config.timeZone,
      now: deps.now,
    });
  }

  async run(): Promise<RunOutcome> {
    const startTime = Date.now();
    const { store, source, config } = this.deps;
    logger.info('Ingestion run started');

    const connected = await this.runStage(STAGES.connect, () => store.verifyConnection());
    if (!connected.ok) return this.fail(connected.failure, startTime, false);

    const token = await this.runStage(STAGES.authenticate, () => source.getAccessToken());
    if (!token.ok) return this.fail(token.failure, startTime);

    const fetched = await this.runStage(STAGES.fetch, () => this.fetcher.fetchAll(token.value));
    if (!fetched.ok) return this.fail(fetched.failure, startTime);

    const batch = await this.runStage(STAGES.normalize, async () =>
      this.normalizer.normalize(fetched.value.listings)
    );
    if (!batch.ok) return this.fail(batch.failure, startTime);

    const savedOrganizations = await this.runStage(STAGES.saveOrganizations, () =>
      store.saveOrganizations(batch.value.organizations)
    );
    if (!savedOrganizations.ok) return this.fail(savedOrganizations.failure, startTime);

    const savedVacancies = await this.runStage(STAGES.saveVacancies, () =>
      store.saveVacancies(batch.value.vacancies)
    );
    if (!savedVacancies.ok) return this.fail(savedVacancies.failure, startTime);

    logger.info('Data persisted', {
      companiesInserted: savedOrganizations.value,
      vacanciesUpserted: savedVacancies.value,
    });

    const readBack = await this.runStage(STAGES.readBack, async () => ({
      vacancies: await store.loadUnmatchedVacancies(),
      entries: await store.loadClassificationEntries(),
    }));
    if (!readBack.ok) return this.fail(readBack.failure, startTime);

    const matches = await this.runStage(STAGES.match, async () => {
      const index = new ClassificationIndex(readBack.value.entries);
      const matcher = new ClassificationMatcher(index, config.similarityThreshold);
      return matcher.match(readBack.value.vacancies);
    });
    if (!matches.ok) return this.fail(matches.failure, startTime);

    const processedIds = readBack.value.vacancies.map(vacancy => vacancy.id);
    const written = await this.runStage(STAGES.writeBack, () =>
      store.saveMatches(matches.value, processedIds)
    );
    if (!written.ok) return this.fail(written.failure, startTime);

    await this.recordRun(ExitPoint.Success, SUCCESS_MESSAGE);

    const durationMs = Date.now() - startTime;
    logger.info('Ingestion run completed', {
      duration: `${durationMs}ms`,
      listings: fetched.value.stats.kept,
      companies: batch.value.organizations.length,
      vacancies: batch.value.vacancies.length,
      reconciled: processedIds.length,
      matched: matches.value.length,
    });

    return { exitCode: ExitPoint.Success, message: SUCCESS_MESSAGE, durationMs };
  }

  private async runStage<T>(stage: Stage, action: () => Promise<T>): Promise<StageResult<T>> {
    try {
      return { ok: true, value: await action() };
    } catch (cause) {
      const error = cause instanceof PipelineError
        ? cause
        : new stage.errorClass(errorMessage(cause), { cause });
      return {
        ok: false,
        failure: {
          stage: stage.name,
          exitPoint: stage.exitPoint,
          message: stage.failureMessage,
          error,
        },
      };
    }
  }

  private async fail(
    failure: StageFailure,
    startTime: number,
    databaseAvailable: boolean = true
  ): Promise<RunOutcome> {
    logger.error(failure.message, failure.error, {
      stage: failure.stage,
      exitPoint: failure.exitPoint,
      kind: failure.error.kind,
    });

    if (databaseAvailable) {
      await this.recordRun(failure.exitPoint, `${failure.message}: ${failure.error.message}`);
    }

    return {
      exitCode: failure.exitPoint,
      message: failure.message,
      error: failure.error,
      durationMs: Date.now() - startTime,
    };
  }

  /**
   * Best effort: a failed log write never replaces the run's own outcome
   */
  private async recordRun(exitPoint: ExitPoint, message: string): Promise<void> {
    try {
      await this.deps.store.recordRun(exitPoint, message);
    } catch (error) {
      logger.warn('Failed to write run log entry', {
        exitPoint,
        error: errorMessage(error),
      });
    }
  }
}
