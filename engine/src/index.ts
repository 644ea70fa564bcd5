export * from './types';
export * from './errors';
export { VocabDatabase, createDatabase, getDatabaseStats, DEFAULT_DB_NAME } from './db/database';
export { DataApiClient, DEFAULT_TIMEOUT_MS, type DataApiClientOptions, type FetchLike, type WordFieldsUpdate } from './api/client';
export { authFromHeader, requireAuth } from './services/auth';
export { CardStore, type CardStoreOptions } from './services/card-store';
export { StudySession, DEFAULT_SESSION_CAP, type StudySessionOptions } from './services/study-session';
export { SyncService, DEFAULT_SYNC_ATTEMPTS, type SyncServiceOptions } from './services/sync';
export { parseSnapshot, SnapshotSchema } from './services/snapshot';
export { IssueReporter, ISSUES_FILE } from './services/issues';
export type { ReportDetails } from './services/issues';
export {
  parseGroupedItems,
  importFromOcr,
  type OcrLine,
  type ImportItem,
  type ImportResult,
  type ImportFromOcrInput,
  type Translator,
} from './services/import';
export {
  StudyEngine,
  toCardView,
  type StudyEngineOptions,
  type NextCard,
  type IntervalPreview,
} from './services/study-engine';
