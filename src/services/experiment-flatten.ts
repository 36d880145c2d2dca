/**
 * Experiment Flatten & Export
 *
 * Projects the experiment graph into flat rows for downstream dataset
 * builders, and renders those rows as CSV or JSONL.
 *
 * Levels:
 * - period: one row per (session, segment, round, period, player)
 * - round: one row per (session, segment, round, player present in the round),
 *   taken from the player's last observation of the round
 *
 * Both projections are pure: the graph is only read.
 */

import { toCsvText } from "../lib/csv.ts";
import type { Experiment } from "./experiment-model.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type FlattenLevel = "period" | "round";

export type ExportFormat = "csv" | "jsonl";

export interface PeriodRow {
  sessionCode: string;
  segment: string;
  round: number;
  period: number;
  label: string;
  participantId: number;
  idInGroup: number;
  sold: 0 | 1;
  soldThisPeriod: boolean;
  signal: number | null;
  price: number | null;
  sellTimestamp: number | null;
  state: 0 | 1;
  payoff: number | null;
  roundPayoff: number | null;
  groupId: number | null;
}

export interface RoundRow {
  sessionCode: string;
  segment: string;
  round: number;
  label: string;
  participantId: number;
  idInGroup: number;
  finalSold: 0 | 1;
  /** Period of the sale, null when the player held through the round */
  soldPeriod: number | null;
  roundPayoff: number | null;
  totalSellersInRound: number;
  periodCount: number;
  /** Messages in the player's group chat room for this round */
  chatMessageCount: number;
  groupId: number | null;
}

export const PERIOD_ROW_COLUMNS: readonly (keyof PeriodRow)[] = [
  "sessionCode",
  "segment",
  "round",
  "period",
  "label",
  "participantId",
  "idInGroup",
  "sold",
  "soldThisPeriod",
  "signal",
  "price",
  "sellTimestamp",
  "state",
  "payoff",
  "roundPayoff",
  "groupId",
];

export const ROUND_ROW_COLUMNS: readonly (keyof RoundRow)[] = [
  "sessionCode",
  "segment",
  "round",
  "label",
  "participantId",
  "idInGroup",
  "finalSold",
  "soldPeriod",
  "roundPayoff",
  "totalSellersInRound",
  "periodCount",
  "chatMessageCount",
  "groupId",
];

// ---------------------------------------------------------------------------
// Projections
// ---------------------------------------------------------------------------

export function flattenPeriods(experiment: Experiment): PeriodRow[] {
  const rows: PeriodRow[] = [];

  for (const session of experiment.sessions) {
    for (const segment of session.segments.values()) {
      for (const round of segment.rounds.values()) {
        for (const period of round.periods.values()) {
          for (const obs of period.observations.values()) {
            rows.push({
              sessionCode: session.sessionCode,
              segment: segment.name,
              round: round.roundIndex,
              period: period.periodIndex,
              label: obs.label,
              participantId: obs.participantId,
              idInGroup: obs.idInGroup,
              sold: obs.soldCumulative,
              soldThisPeriod: obs.soldThisPeriod,
              signal: obs.signal,
              price: obs.price,
              sellTimestamp: obs.sellTimestamp,
              state: obs.state,
              payoff: obs.payoff,
              roundPayoff: round.terminalPayoff(obs.label),
              groupId: segment.getGroupByPlayer(obs.label)?.groupId ?? null,
            });
          }
        }
      }
    }
  }

  return rows;
}

export function flattenRounds(experiment: Experiment): RoundRow[] {
  const rows: RoundRow[] = [];

  for (const session of experiment.sessions) {
    for (const segment of session.segments.values()) {
      for (const round of segment.rounds.values()) {
        const totalSellers = round.totalSellers;
        for (const label of session.participantLabels.values()) {
          const last = round.lastObservation(label);
          if (!last) continue;
          const group = segment.getGroupByPlayer(label);
          rows.push({
            sessionCode: session.sessionCode,
            segment: segment.name,
            round: round.roundIndex,
            label,
            participantId: last.participantId,
            idInGroup: last.idInGroup,
            finalSold: last.soldCumulative,
            soldPeriod: round.sellerPeriod(label),
            roundPayoff: round.terminalPayoff(label),
            totalSellersInRound: totalSellers,
            periodCount: round.periodCount,
            chatMessageCount: group ? round.chatForGroup(group.groupId).length : 0,
            groupId: group?.groupId ?? null,
          });
        }
      }
    }
  }

  return rows;
}

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

/**
 * Render flattened rows. CSV uses the fixed column order of the level;
 * JSONL writes one object per line.
 */
export function serializeRows(
  rows: readonly PeriodRow[] | readonly RoundRow[],
  level: FlattenLevel,
  format: ExportFormat,
): string {
  if (format === "jsonl") {
    return rows.map((row) => JSON.stringify(row)).join("\n");
  }
  const columns = level === "round" ? ROUND_ROW_COLUMNS : PERIOD_ROW_COLUMNS;
  return toCsvText(columns, rows);
}
