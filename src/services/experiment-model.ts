/**
 * Market Runs Experiment Model
 *
 * Read-only object graph rebuilt from a wide experiment extract:
 *
 *   Experiment → Session → Segment → Round → Period → PlayerPeriodData
 *
 * with a per-segment Group index and per-round chat logs. Every entity is
 * created by the experiment builder; consumers only navigate. The one
 * mutation after construction is the chat pass appending messages to
 * already-built rounds.
 *
 * Groups do not point back at their segment. They carry the owning
 * (sessionCode, segmentName) key and navigation methods take the segment
 * (or experiment) from the caller.
 */

import { mean } from "../lib/math-utils.ts";
import { throwDataError } from "../lib/errors.ts";
import {
  flattenPeriods,
  flattenRounds,
  type FlattenLevel,
  type PeriodRow,
  type RoundRow,
} from "./experiment-flatten.ts";

// ---------------------------------------------------------------------------
// Values
// ---------------------------------------------------------------------------

/** One player's state in one period */
export interface PlayerPeriodData {
  readonly participantId: number;
  /** Player label (A, B, C, ...) */
  readonly label: string;
  readonly idInGroup: number;
  /** Whether the player has sold at any point so far in the round */
  readonly soldCumulative: 0 | 1;
  /** Whether the sale happened in this period */
  readonly soldThisPeriod: boolean;
  readonly signal: number | null;
  readonly price: number | null;
  /** Unix seconds of the sell click, when the sale happened this period */
  readonly sellTimestamp: number | null;
  /** Market state */
  readonly state: 0 | 1;
  readonly payoff: number | null;
}

export interface ChatMessage {
  /** Sender's player label */
  readonly senderLabel: string;
  readonly body: string;
  /** Unix seconds */
  readonly timestamp: number;
  readonly participantCode: string;
  readonly idInSession: number;
  /** Row position in the chat table (0-based) */
  readonly sequenceId: number;
}

export function createObservation(data: PlayerPeriodData): PlayerPeriodData {
  return Object.freeze({ ...data });
}

export function createChatMessage(data: ChatMessage): ChatMessage {
  return Object.freeze({ ...data });
}

export function sellDate(observation: PlayerPeriodData): Date | null {
  return observation.sellTimestamp !== null
    ? new Date(observation.sellTimestamp * 1000)
    : null;
}

// ---------------------------------------------------------------------------
// Period
// ---------------------------------------------------------------------------

export class Period {
  readonly periodIndex: number;
  /** Observations by label, in participant order */
  readonly observations: ReadonlyMap<string, PlayerPeriodData>;

  constructor(periodIndex: number, observations: Iterable<PlayerPeriodData>) {
    this.periodIndex = periodIndex;
    this.observations = new Map([...observations].map((o) => [o.label, o]));
  }

  getPlayer(label: string): PlayerPeriodData | null {
    return this.observations.get(label) ?? null;
  }

  /** Labels of the players who sold in this period */
  get sellers(): string[] {
    return [...this.observations.values()]
      .filter((o) => o.soldThisPeriod)
      .map((o) => o.label);
  }

  get sellerCount(): number {
    return this.sellers.length;
  }

  /** Mean price among this period's sellers that have a price */
  get meanSalePrice(): number | null {
    const prices: number[] = [];
    for (const o of this.observations.values()) {
      if (o.soldThisPeriod && o.price !== null) prices.push(o.price);
    }
    return prices.length > 0 ? mean(prices) : null;
  }
}

// ---------------------------------------------------------------------------
// Round
// ---------------------------------------------------------------------------

export class Round {
  readonly roundIndex: number;
  /** Periods in column order */
  readonly periods: ReadonlyMap<number, Period>;
  /** Authoritative end-of-round payoff per label */
  readonly terminalPayoffs: ReadonlyMap<string, number>;

  private readonly chat: ChatMessage[] = [];
  private readonly chatByGroup = new Map<number, ChatMessage[]>();
  private readonly channelByGroup = new Map<number, number>();

  constructor(
    roundIndex: number,
    periods: readonly Period[],
    terminalPayoffs: ReadonlyMap<string, number>,
  ) {
    this.roundIndex = roundIndex;
    this.periods = new Map(periods.map((p) => [p.periodIndex, p]));
    this.terminalPayoffs = new Map(terminalPayoffs);
  }

  getPeriod(periodIndex: number): Period | null {
    return this.periods.get(periodIndex) ?? null;
  }

  get lastPeriod(): Period | null {
    let last: Period | null = null;
    for (const period of this.periods.values()) last = period;
    return last;
  }

  get periodCount(): number {
    return this.periods.size;
  }

  /** Players who sold at some point in the round */
  get totalSellers(): number {
    return this.sellersWithPeriods().size;
  }

  terminalPayoff(label: string): number | null {
    return this.terminalPayoffs.get(label) ?? null;
  }

  playerAcrossPeriods(label: string): PlayerPeriodData[] {
    const rows: PlayerPeriodData[] = [];
    for (const period of this.periods.values()) {
      const obs = period.observations.get(label);
      if (obs) rows.push(obs);
    }
    return rows;
  }

  /** The player's observation in the latest period they appear in */
  lastObservation(label: string): PlayerPeriodData | null {
    const rows = this.playerAcrossPeriods(label);
    return rows.length > 0 ? rows[rows.length - 1] : null;
  }

  /** Period in which the player sold, or null if they never sold */
  sellerPeriod(label: string): number | null {
    for (const [index, period] of this.periods) {
      if (period.observations.get(label)?.soldThisPeriod) return index;
    }
    return null;
  }

  /** label → period of sale */
  sellersWithPeriods(): Map<string, number> {
    const sellers = new Map<string, number>();
    for (const [index, period] of this.periods) {
      for (const label of period.sellers) {
        if (!sellers.has(label)) sellers.set(label, index);
      }
    }
    return sellers;
  }

  /** period → labels that sold in it (periods without sellers omitted) */
  sellersByPeriod(): Map<number, string[]> {
    const byPeriod = new Map<number, string[]>();
    for (const [index, period] of this.periods) {
      const sellers = period.sellers;
      if (sellers.length > 0) byPeriod.set(index, sellers);
    }
    return byPeriod;
  }

  /** Every message attached to the round, in timestamp order */
  get chatMessages(): readonly ChatMessage[] {
    return this.chat;
  }

  get chatCount(): number {
    return this.chat.length;
  }

  chatByPlayer(label: string): ChatMessage[] {
    return this.chat.filter((m) => m.senderLabel === label);
  }

  chatForGroup(groupId: number): readonly ChatMessage[] {
    return this.chatByGroup.get(groupId) ?? [];
  }

  chatChannelFor(groupId: number): number | null {
    return this.channelByGroup.get(groupId) ?? null;
  }

  /**
   * Append one message of a group's chat room. Used by the chat aligner
   * only; callers must append in timestamp order.
   */
  attachChatMessage(groupId: number, channel: number, message: ChatMessage): void {
    if (!this.channelByGroup.has(groupId)) {
      this.channelByGroup.set(groupId, channel);
    }
    this.chat.push(message);
    const groupChat = this.chatByGroup.get(groupId) ?? [];
    groupChat.push(message);
    this.chatByGroup.set(groupId, groupChat);
  }
}

// ---------------------------------------------------------------------------
// Group
// ---------------------------------------------------------------------------

export class Group {
  readonly groupId: number;
  /** Sorted member labels, fixed for the segment */
  readonly memberLabels: readonly string[];
  readonly sessionCode: string;
  readonly segmentName: string;

  constructor(
    groupId: number,
    memberLabels: Iterable<string>,
    sessionCode: string,
    segmentName: string,
  ) {
    this.groupId = groupId;
    this.memberLabels = Object.freeze([...new Set(memberLabels)].sort());
    this.sessionCode = sessionCode;
    this.segmentName = segmentName;
  }

  get size(): number {
    return this.memberLabels.length;
  }

  /** Find the owning segment in an experiment */
  resolveSegment(experiment: Experiment): Segment | null {
    return experiment.getSegment(this.sessionCode, this.segmentName);
  }

  playersInPeriod(
    segment: Segment,
    roundIndex: number,
    periodIndex: number,
  ): Map<string, PlayerPeriodData> {
    const players = new Map<string, PlayerPeriodData>();
    if (!this.owns(segment)) return players;
    const period = segment.getRound(roundIndex)?.getPeriod(periodIndex);
    if (!period) return players;
    for (const label of this.memberLabels) {
      const obs = period.getPlayer(label);
      if (obs) players.set(label, obs);
    }
    return players;
  }

  playersInRound(segment: Segment, roundIndex: number): Map<string, PlayerPeriodData[]> {
    const players = new Map<string, PlayerPeriodData[]>();
    if (!this.owns(segment)) return players;
    const round = segment.getRound(roundIndex);
    if (!round) return players;
    for (const label of this.memberLabels) {
      players.set(label, round.playerAcrossPeriods(label));
    }
    return players;
  }

  playersAcrossSegment(segment: Segment): Map<string, Map<number, PlayerPeriodData[]>> {
    const players = new Map<string, Map<number, PlayerPeriodData[]>>();
    if (!this.owns(segment)) return players;
    for (const label of this.memberLabels) {
      players.set(label, segment.playerAcrossRounds(label));
    }
    return players;
  }

  /** This group's chat room messages in one round */
  chatForRound(segment: Segment, roundIndex: number): readonly ChatMessage[] {
    if (!this.owns(segment)) return [];
    return segment.getRound(roundIndex)?.chatForGroup(this.groupId) ?? [];
  }

  /** round → this group's messages, for rounds where the group chatted */
  chatAcrossSegment(segment: Segment): Map<number, readonly ChatMessage[]> {
    const chat = new Map<number, readonly ChatMessage[]>();
    if (!this.owns(segment)) return chat;
    for (const [index, round] of segment.rounds) {
      const messages = round.chatForGroup(this.groupId);
      if (messages.length > 0) chat.set(index, messages);
    }
    return chat;
  }

  private owns(segment: Segment): boolean {
    return (
      segment.name === this.segmentName && segment.sessionCode === this.sessionCode
    );
  }
}

// ---------------------------------------------------------------------------
// Segment
// ---------------------------------------------------------------------------

export class Segment {
  readonly name: string;
  readonly sessionCode: string;
  readonly rounds: ReadonlyMap<number, Round>;
  /** Groups by ascending id */
  readonly groups: ReadonlyMap<number, Group>;

  private readonly groupByLabel = new Map<string, Group>();

  constructor(
    name: string,
    sessionCode: string,
    rounds: readonly Round[],
    groups: readonly Group[],
  ) {
    this.name = name;
    this.sessionCode = sessionCode;
    this.rounds = new Map(rounds.map((r) => [r.roundIndex, r]));
    this.groups = new Map(
      [...groups].sort((a, b) => a.groupId - b.groupId).map((g) => [g.groupId, g]),
    );

    for (const group of this.groups.values()) {
      for (const label of group.memberLabels) {
        const existing = this.groupByLabel.get(label);
        if (existing) {
          throwDataError(
            "GROUP_CONFLICT",
            `Player ${label} belongs to groups ${existing.groupId} and ${group.groupId} in segment ${name}`,
            { sessionCode, segment: name, label, groupIds: [existing.groupId, group.groupId] },
          );
        }
        this.groupByLabel.set(label, group);
      }
    }
  }

  getRound(roundIndex: number): Round | null {
    return this.rounds.get(roundIndex) ?? null;
  }

  getGroup(groupId: number): Group | null {
    return this.groups.get(groupId) ?? null;
  }

  getGroupByPlayer(label: string): Group | null {
    return this.groupByLabel.get(label) ?? null;
  }

  get roundCount(): number {
    return this.rounds.size;
  }

  get groupCount(): number {
    return this.groups.size;
  }

  /** round → the player's observations in that round */
  playerAcrossRounds(label: string): Map<number, PlayerPeriodData[]> {
    const rows = new Map<number, PlayerPeriodData[]>();
    for (const [index, round] of this.rounds) {
      rows.set(index, round.playerAcrossPeriods(label));
    }
    return rows;
  }
}

// ---------------------------------------------------------------------------
// Session
// ---------------------------------------------------------------------------

export type SessionMetadataValue = string | number | boolean | null;

export class Session {
  readonly sessionCode: string;
  /** Segments in sorted-name order */
  readonly segments: ReadonlyMap<string, Segment>;
  /** participant id in session → label */
  readonly participantLabels: ReadonlyMap<number, string>;
  readonly metadata: Readonly<Record<string, SessionMetadataValue>>;

  constructor(
    sessionCode: string,
    segments: readonly Segment[],
    participantLabels: ReadonlyMap<number, string>,
    metadata: Record<string, SessionMetadataValue> = {},
  ) {
    this.sessionCode = sessionCode;
    this.segments = new Map(segments.map((s) => [s.name, s]));
    this.participantLabels = new Map(participantLabels);
    this.metadata = Object.freeze({ ...metadata });
  }

  getSegment(name: string): Segment | null {
    return this.segments.get(name) ?? null;
  }

  get segmentNames(): string[] {
    return [...this.segments.keys()];
  }

  get participantCount(): number {
    return this.participantLabels.size;
  }

  labelFor(participantId: number): string | null {
    return this.participantLabels.get(participantId) ?? null;
  }

  /** segment → round → the player's observations */
  playerAcrossSession(label: string): Map<string, Map<number, PlayerPeriodData[]>> {
    const rows = new Map<string, Map<number, PlayerPeriodData[]>>();
    for (const [name, segment] of this.segments) {
      rows.set(name, segment.playerAcrossRounds(label));
    }
    return rows;
  }
}

// ---------------------------------------------------------------------------
// Experiment
// ---------------------------------------------------------------------------

export class Experiment {
  readonly name: string;
  readonly sessions: readonly Session[];

  constructor(name: string, sessions: readonly Session[]) {
    this.name = name;
    this.sessions = Object.freeze([...sessions]);
  }

  get sessionCodes(): string[] {
    return this.sessions.map((s) => s.sessionCode);
  }

  get sessionCount(): number {
    return this.sessions.length;
  }

  get totalParticipants(): number {
    return this.sessions.reduce((sum, s) => sum + s.participantCount, 0);
  }

  getSession(sessionCode: string): Session | null {
    return this.sessions.find((s) => s.sessionCode === sessionCode) ?? null;
  }

  getSegment(sessionCode: string, segmentName: string): Segment | null {
    return this.getSession(sessionCode)?.getSegment(segmentName) ?? null;
  }

  getRound(sessionCode: string, segmentName: string, roundIndex: number): Round | null {
    return this.getSegment(sessionCode, segmentName)?.getRound(roundIndex) ?? null;
  }

  getPeriod(
    sessionCode: string,
    segmentName: string,
    roundIndex: number,
    periodIndex: number,
  ): Period | null {
    return this.getRound(sessionCode, segmentName, roundIndex)?.getPeriod(periodIndex) ?? null;
  }

  getPlayer(
    sessionCode: string,
    segmentName: string,
    roundIndex: number,
    periodIndex: number,
    label: string,
  ): PlayerPeriodData | null {
    return (
      this.getPeriod(sessionCode, segmentName, roundIndex, periodIndex)?.getPlayer(label) ??
      null
    );
  }

  getGroupByPlayer(sessionCode: string, segmentName: string, label: string): Group | null {
    return this.getSegment(sessionCode, segmentName)?.getGroupByPlayer(label) ?? null;
  }

  /**
   * Tabular projection of the whole graph. Pure: repeated calls return
   * equal rows.
   */
  flatten(level?: "period"): PeriodRow[];
  flatten(level: "round"): RoundRow[];
  flatten(level: FlattenLevel): PeriodRow[] | RoundRow[];
  flatten(level: FlattenLevel = "period"): PeriodRow[] | RoundRow[] {
    return level === "round" ? flattenRounds(this) : flattenPeriods(this);
  }
}
