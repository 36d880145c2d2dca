/**
 * Market Runs Experiment Model
 *
 * Public entry point: build the model from a wide extract and its chat log,
 * navigate it, and flatten it back to tables.
 */

export {
  buildExperiment,
  buildSession,
  loadExperiment,
  type BuildOptions,
  type BuildResult,
  type BuildStatus,
  type ExperimentPaths,
  type ExperimentTables,
  type SessionFailure,
} from "./services/experiment-builder.ts";

export {
  Experiment,
  Group,
  Period,
  Round,
  Segment,
  Session,
  sellDate,
  type ChatMessage,
  type PlayerPeriodData,
  type SessionMetadataValue,
} from "./services/experiment-model.ts";

export {
  alignSessionChat,
  channelToRound,
  parseChatTable,
  reportUnbuiltSessionChat,
  type ChatLog,
  type ChatRecord,
  type MalformedChatRow,
  type SegmentChatAlignment,
} from "./services/chat-aligner.ts";

export {
  flattenPeriods,
  flattenRounds,
  serializeRows,
  PERIOD_ROW_COLUMNS,
  ROUND_ROW_COLUMNS,
  type ExportFormat,
  type FlattenLevel,
  type PeriodRow,
  type RoundRow,
} from "./services/experiment-flatten.ts";

export {
  BuildReportCollector,
  DROP_REASONS,
  WARNING_KINDS,
  type BuildReport,
  type ChatPartition,
  type DropReason,
  type WarningKind,
} from "./services/build-report.ts";

export { chatRowSchema, type ChatRow } from "./schemas/chat-row.ts";
export { resolveWideSchema, type WideSchema, type SegmentSchema } from "./services/column-schema.ts";
export { parseCsvText, readCsvFile, type CsvRow, type CsvTable } from "./lib/csv.ts";
export {
  ErrorCodes,
  MarketDataError,
  isMarketDataError,
  type DataErrorCode,
  type DataErrorKind,
} from "./lib/errors.ts";
export { loadEnv, type Env } from "./config/env.ts";
