/**
 * Builders for small in-memory wide extracts and chat logs.
 */

import type { CsvTable } from "../../../lib/csv.ts";

export type Cell = string | number;

export interface ObservationCells {
  round?: Cell;
  period?: Cell;
  idInGroup?: Cell;
  sold?: Cell;
  sellClickTime?: Cell;
  signal?: Cell;
  price?: Cell;
  state?: Cell;
  payoff?: Cell;
  /** round N → round_N_payoff cell */
  roundPayoffs?: Record<number, Cell>;
  group?: Cell;
}

/**
 * Cells of one column-period for one participant.
 */
export function periodCells(
  segment: string,
  column: number,
  cells: ObservationCells,
): Record<string, string> {
  const prefix = `${segment}.${column}.player.`;
  const out: Record<string, string> = {
    [`${prefix}id_in_group`]: String(cells.idInGroup ?? 1),
    [`${prefix}round_number_in_segment`]: String(cells.round ?? ""),
    [`${prefix}period_in_round`]: String(cells.period ?? ""),
    [`${prefix}sold`]: String(cells.sold ?? 0),
    [`${prefix}sell_click_time`]: String(cells.sellClickTime ?? ""),
    [`${prefix}signal`]: String(cells.signal ?? ""),
    [`${prefix}price`]: String(cells.price ?? ""),
    [`${prefix}state`]: String(cells.state ?? 0),
    [`${prefix}payoff`]: String(cells.payoff ?? ""),
  };
  for (const [round, value] of Object.entries(cells.roundPayoffs ?? {})) {
    out[`${prefix}round_${round}_payoff`] = String(value);
  }
  if (cells.group !== undefined) {
    out[`${segment}.${column}.group.id_in_subsession`] = String(cells.group);
  }
  return out;
}

/**
 * One participant row: identity columns plus any number of cell blocks.
 */
export function participantRow(
  label: string,
  idInSession: number,
  ...blocks: Record<string, string>[]
): Record<string, string> {
  const row: Record<string, string> = {
    "participant.label": label,
    "participant.id_in_session": String(idInSession),
  };
  for (const block of blocks) Object.assign(row, block);
  return row;
}

/**
 * Assemble rows into a table. Headers are the union of row keys in first-seen
 * order; cells a row lacks read as empty strings.
 */
export function wideTable(rows: Record<string, string>[], source = "fixture.csv"): CsvTable {
  const headers: string[] = [];
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        headers.push(key);
      }
    }
  }
  const filled = rows.map((row) =>
    Object.fromEntries(headers.map((h) => [h, row[h] ?? ""])),
  );
  return { headers, rows: filled, source };
}

export interface ChatCells {
  session?: string;
  segment: string;
  channel: number;
  nickname: string;
  body?: string;
  timestamp: number;
  participantCode?: string;
  idInSession?: number;
}

export function chatTable(messages: ChatCells[]): CsvTable {
  const headers = [
    "session_code",
    "channel",
    "nickname",
    "body",
    "timestamp",
    "participant_code",
    "id_in_session",
  ];
  const rows = messages.map((m) => ({
    session_code: m.session ?? "sess1",
    channel: `1-${m.segment}-${m.channel}`,
    nickname: m.nickname,
    body: m.body ?? `msg from ${m.nickname}`,
    timestamp: String(m.timestamp),
    participant_code: m.participantCode ?? `p_${m.nickname}`,
    id_in_session: String(m.idInSession ?? 1),
  }));
  return { headers, rows, source: "chat-fixture.csv" };
}
