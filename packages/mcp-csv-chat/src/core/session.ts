import { DataLoadError } from '../utils/errors.ts';
import { logger } from '../utils/logger.ts';
import { ChatHistory } from './history.ts';
import { profileTable, renderProfile, type DatasetProfile } from './profiler.ts';
import type { Table } from './table.ts';

export interface LoadedDataset {
  readonly table: Table;
  readonly profile: DatasetProfile;
  /** Rendered profile, statistics included, as sent to the model. */
  readonly profileText: string;
  readonly source: string;
  readonly loadedAt: string;
}

export interface ChatSessionOptions {
  /** Maximum exchanges kept; 0 keeps all of them. */
  historyCapacity: number;
  headRows: number;
}

/**
 * State owned by one interactive session: the current dataset and its history.
 * Passed explicitly to the composer; nothing here is global.
 */
export class ChatSession {
  readonly history: ChatHistory;
  private readonly headRows: number;
  private current: LoadedDataset | undefined;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: ChatSessionOptions) {
    this.history = new ChatHistory(options.historyCapacity);
    this.headRows = options.headRows;
  }

  get dataset(): LoadedDataset | undefined {
    return this.current;
  }

  /**
   * Replaces the dataset wholesale. History is kept; only clear() empties it.
   */
  loadTable(table: Table, source: string): LoadedDataset {
    const profile = profileTable(table, { headRows: this.headRows, includeStatistics: true });
    this.current = Object.freeze({
      table,
      profile,
      profileText: renderProfile(profile),
      source,
      loadedAt: new Date().toISOString(),
    });
    logger.info(
      { source, rows: profile.rowCount, columns: profile.columnCount },
      'Dataset loaded',
    );
    return this.current;
  }

  requireDataset(): LoadedDataset {
    if (!this.current) {
      throw new DataLoadError('No dataset loaded. Upload a CSV file first.');
    }
    return this.current;
  }

  /** Profile of the current dataset, regenerated from the table. */
  describe(includeStatistics: boolean): string {
    const { table } = this.requireDataset();
    return renderProfile(profileTable(table, { headRows: this.headRows, includeStatistics }));
  }

  /**
   * Runs tasks one after another, so a session never has two questions in flight.
   * A failed task does not block the ones queued after it.
   */
  exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
