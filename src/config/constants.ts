/** Column carrying the participant's label (A, B, C, ...) */
export const PARTICIPANT_LABEL_COLUMN = "participant.label";

/** Column carrying the participant's numeric id within the session */
export const PARTICIPANT_ID_COLUMN = "participant.id_in_session";

/** Column carrying the session code; optional in single-session extracts */
export const SESSION_CODE_COLUMN = "session.code";

/** Session code used when the extract has no session column */
export const DEFAULT_SESSION_CODE = "session";

/** Experiment name given to a build when the caller does not name it */
export const DEFAULT_EXPERIMENT_NAME = "Market Runs Experiment";

// ---------------------------------------------------------------------------
// Wide column layout: {segment}.{period}.{player|group}.{field}
// ---------------------------------------------------------------------------

/**
 * Matches player/group columns of a segment.
 * Example: "chat_noavg.12.player.sold" → ["chat_noavg", "12", "player", "sold"]
 */
export const SEGMENT_COLUMN_PATTERN = /^([^.]+)\.(\d+)\.(player|group)\.(.+)$/;

/**
 * Matches per-round payoff fields.
 * Example: "round_3_payoff" → ["3"]
 */
export const ROUND_PAYOFF_FIELD_PATTERN = /^round_(\d+)_payoff$/;

/** Player fields read for every column-period */
export const PLAYER_FIELDS = {
  idInGroup: "id_in_group",
  roundNumber: "round_number_in_segment",
  periodInRound: "period_in_round",
  sold: "sold",
  sellClickTime: "sell_click_time",
  signal: "signal",
  price: "price",
  state: "state",
  payoff: "payoff",
} as const;

/** Group field that identifies the group within the subsession */
export const GROUP_ID_FIELD = "id_in_subsession";

/** Round/period number used when the extract leaves the cell empty */
export const FALLBACK_INDEX = 1;

/**
 * Share of observations built from a fallback round or period number above
 * which the build summary escalates from a warning to an error log.
 * Example: 120 fallbacks over 1000 observations = 0.12 > 0.1 → error log
 */
export const DEFAULT_FALLBACK_ALARM_RATIO = 0.1;

/**
 * Numeric cell text: plain decimal with an optional exponent.
 * Hex ("0x1"), "Infinity" and digit separators are rejected.
 */
export const NUMERIC_CELL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/** Integer and flag cell text: decimal digits, optionally ending in a fraction ("3", "3.0") */
export const DECIMAL_CELL_PATTERN = /^[+-]?\d+(?:\.\d*)?$/;

/** Cell literals treated as absent values */
export const MISSING_CELL_LITERALS: ReadonlySet<string> = new Set([
  "",
  "nan",
  "NaN",
  "None",
  "null",
  "NULL",
]);

// ---------------------------------------------------------------------------
// Session metadata columns (first row of each session)
// ---------------------------------------------------------------------------

export const SESSION_METADATA_COLUMNS = {
  participationFee: "session.config.participation_fee",
  realWorldCurrencyPerPoint: "session.config.real_world_currency_per_point",
  room: "session.config.room",
  isDemo: "session.is_demo",
} as const;

// ---------------------------------------------------------------------------
// Chat log
// ---------------------------------------------------------------------------

/**
 * Chat rooms opened per round: one per group.
 * Channels are numbered contiguously in round order, so channel N of a
 * segment whose lowest channel is M belongs to round floor((N - M) / 4) + 1.
 */
export const CHANNELS_PER_ROUND = 4;

/**
 * Channel string layout: <constant>-<segment>-<channel number>.
 * Example: "1-chat_noavg-17" → ["1", "chat_noavg", "17"]
 */
export const CHAT_CHANNEL_PATTERN = /^([^-]+)-(.+)-(\d+)$/;

// ---------------------------------------------------------------------------
// Build report
// ---------------------------------------------------------------------------

/** Example details kept per warning kind in the build report */
export const REPORT_SAMPLE_LIMIT = 5;
