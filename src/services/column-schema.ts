/**
 * Wide Column Schema
 *
 * Resolves the wide extract's headers once, before any row is read, into a
 * lookup from (segment, column-period, field) to a concrete column name.
 * The per-row scan never builds column names by string concatenation. A
 * field the extract lacks is an absent accessor; a layout the builder cannot
 * read fails here.
 *
 * Column layout: {segment}.{period}.{player|group}.{field}
 *   chat_noavg.3.player.sold
 *   chat_noavg.3.player.round_2_payoff
 *   chat_noavg.3.group.id_in_subsession
 */

import {
  DECIMAL_CELL_PATTERN,
  GROUP_ID_FIELD,
  NUMERIC_CELL_PATTERN,
  PARTICIPANT_ID_COLUMN,
  PARTICIPANT_LABEL_COLUMN,
  PLAYER_FIELDS,
  ROUND_PAYOFF_FIELD_PATTERN,
  SEGMENT_COLUMN_PATTERN,
  SESSION_CODE_COLUMN,
  SESSION_METADATA_COLUMNS,
} from "../config/constants.ts";
import { readCell, type CsvRow } from "../lib/csv.ts";
import { throwDataError } from "../lib/errors.ts";
import { sortNumeric } from "../lib/math-utils.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Resolved columns of one segment column-period */
export interface PeriodColumns {
  /** Column-period index (oTree round number within the app) */
  periodIndex: number;
  idInGroup: string;
  roundNumber?: string;
  periodInRound?: string;
  sold?: string;
  sellClickTime?: string;
  signal?: string;
  price?: string;
  state?: string;
  payoff?: string;
  groupId?: string;
  /** round N → column holding round_N_payoff in this column-period */
  roundPayoffs: ReadonlyMap<number, string>;
}

export interface SegmentSchema {
  name: string;
  /** Column-periods in ascending index order */
  periods: readonly PeriodColumns[];
}

export type SessionMetadataKey = keyof typeof SESSION_METADATA_COLUMNS;

export interface WideSchema {
  labelColumn: string;
  participantIdColumn: string;
  /** null when the extract holds a single unnamed session */
  sessionCodeColumn: string | null;
  metadataColumns: Partial<Record<SessionMetadataKey, string>>;
  /** Segments in sorted-name order */
  segments: readonly SegmentSchema[];
}

/** Where a cell was read, for error details */
export interface CellContext {
  sessionCode: string;
  label: string;
}

interface RawPeriod {
  player: Map<string, string>;
  group: Map<string, string>;
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/**
 * Resolve headers into a schema.
 *
 * Fails with SCHEMA_MISMATCH when the participant label or id column is
 * missing, or when a column-period has player fields but no id_in_group.
 */
export function resolveWideSchema(headers: readonly string[]): WideSchema {
  const headerSet = new Set(headers);

  for (const required of [PARTICIPANT_LABEL_COLUMN, PARTICIPANT_ID_COLUMN]) {
    if (!headerSet.has(required)) {
      throwDataError("SCHEMA_MISMATCH", `Required column missing: ${required}`, {
        column: required,
      });
    }
  }

  const raw = new Map<string, Map<number, RawPeriod>>();
  for (const header of headers) {
    const match = SEGMENT_COLUMN_PATTERN.exec(header);
    if (!match) continue;
    const [, segment, periodText, scope, field] = match;
    const periods = raw.get(segment) ?? new Map<number, RawPeriod>();
    raw.set(segment, periods);
    const periodIndex = Number(periodText);
    const entry = periods.get(periodIndex) ?? { player: new Map(), group: new Map() };
    periods.set(periodIndex, entry);
    (scope === "player" ? entry.player : entry.group).set(field, header);
  }

  const segments: SegmentSchema[] = [];
  for (const name of [...raw.keys()].sort()) {
    const periods = raw.get(name) ?? new Map<number, RawPeriod>();
    const resolved: PeriodColumns[] = [];
    for (const periodIndex of sortNumeric(periods.keys())) {
      const entry = periods.get(periodIndex);
      if (!entry || entry.player.size === 0) continue;
      resolved.push(resolvePeriod(name, periodIndex, entry));
    }
    // Segments only detected through group columns are not segments
    if (resolved.length > 0) segments.push({ name, periods: resolved });
  }

  const metadataColumns: Partial<Record<SessionMetadataKey, string>> = {};
  for (const [key, column] of Object.entries(SESSION_METADATA_COLUMNS)) {
    if (headerSet.has(column) && isMetadataKey(key)) metadataColumns[key] = column;
  }

  return {
    labelColumn: PARTICIPANT_LABEL_COLUMN,
    participantIdColumn: PARTICIPANT_ID_COLUMN,
    sessionCodeColumn: headerSet.has(SESSION_CODE_COLUMN) ? SESSION_CODE_COLUMN : null,
    metadataColumns,
    segments,
  };
}

function resolvePeriod(segment: string, periodIndex: number, entry: RawPeriod): PeriodColumns {
  const idInGroup = entry.player.get(PLAYER_FIELDS.idInGroup);
  if (idInGroup === undefined) {
    throwDataError(
      "SCHEMA_MISMATCH",
      `Segment ${segment} period ${periodIndex} has player columns but no ${PLAYER_FIELDS.idInGroup}`,
      { segment, periodIndex },
    );
  }

  const roundPayoffs = new Map<number, string>();
  for (const [field, column] of entry.player) {
    const payoffMatch = ROUND_PAYOFF_FIELD_PATTERN.exec(field);
    if (payoffMatch) roundPayoffs.set(Number(payoffMatch[1]), column);
  }

  return {
    periodIndex,
    idInGroup,
    roundNumber: entry.player.get(PLAYER_FIELDS.roundNumber),
    periodInRound: entry.player.get(PLAYER_FIELDS.periodInRound),
    sold: entry.player.get(PLAYER_FIELDS.sold),
    sellClickTime: entry.player.get(PLAYER_FIELDS.sellClickTime),
    signal: entry.player.get(PLAYER_FIELDS.signal),
    price: entry.player.get(PLAYER_FIELDS.price),
    state: entry.player.get(PLAYER_FIELDS.state),
    payoff: entry.player.get(PLAYER_FIELDS.payoff),
    groupId: entry.group.get(GROUP_ID_FIELD),
    roundPayoffs,
  };
}

function isMetadataKey(key: string): key is SessionMetadataKey {
  return key in SESSION_METADATA_COLUMNS;
}

// ---------------------------------------------------------------------------
// Typed cell readers
// ---------------------------------------------------------------------------

/**
 * Read a numeric cell. Absent → null; anything that is not a finite
 * decimal number is an INVALID_CELL error.
 */
export function readNumber(
  row: CsvRow,
  column: string | undefined,
  ctx: CellContext,
): number | null {
  return parseCell(row, column, ctx, NUMERIC_CELL_PATTERN);
}

/**
 * Read an integer cell ("3" and "3.0" both read as 3).
 */
export function readInteger(
  row: CsvRow,
  column: string | undefined,
  ctx: CellContext,
): number | null {
  const value = parseCell(row, column, ctx, DECIMAL_CELL_PATTERN);
  if (value !== null && !Number.isInteger(value)) {
    throwDataError("INVALID_CELL", `Column ${column} holds non-integer value ${value}`, {
      ...ctx,
      column,
      value,
    });
  }
  return value;
}

/**
 * Read a 0/1 flag cell.
 */
export function readFlag(
  row: CsvRow,
  column: string | undefined,
  ctx: CellContext,
): 0 | 1 | null {
  const value = parseCell(row, column, ctx, DECIMAL_CELL_PATTERN);
  if (value === null) return null;
  if (value === 0) return 0;
  if (value === 1) return 1;
  return throwDataError("INVALID_CELL", `Column ${column} must be 0 or 1, got ${value}`, {
    ...ctx,
    column,
    value,
  });
}

function parseCell(
  row: CsvRow,
  column: string | undefined,
  ctx: CellContext,
  pattern: RegExp,
): number | null {
  const text = readCell(row, column);
  if (text === null) return null;
  const value = Number(text);
  if (!pattern.test(text) || !Number.isFinite(value)) {
    throwDataError("INVALID_CELL", `Column ${column} holds non-numeric value "${text}"`, {
      ...ctx,
      column,
      value: text,
    });
  }
  return value;
}
