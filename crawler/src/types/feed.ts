/** One normalized price observation. Price stays a decimal string end to end. */
export interface PriceTick {
  symbol: string;
  price: string;
}

export type GameStatus = 'scheduled' | 'inprogress' | 'closed';

export interface TeamInfo {
  id: string;
  name: string;
  alias: string;
}

export interface SeasonInfo {
  id: string;
  year: number;
  type: string;
}

export interface GameUpdate {
  externalGameId: string;
  /** Provider status as received; unknown values are treated as scheduled downstream. */
  status: string;
  scheduledTime: Date | null;
  homeTeam: TeamInfo;
  awayTeam: TeamInfo;
  homeScore?: number;
  awayScore?: number;
  seasonInfo: SeasonInfo;
  /** Upstream fields kept verbatim in `event.info` for audit. */
  rawPayload: Record<string, unknown>;
}

/** GUIDs a feed writes under, resolved once at startup. */
export interface FeedContext {
  categoryGuid: string;
  ecosystemGuid: string;
  languageGuid: string;
}

/** What one inbound stream frame turned out to be. */
export type DecodedFrame =
  | { kind: 'ticks'; ticks: PriceTick[] }
  | { kind: 'ack' }
  | { kind: 'rejected'; reason: string }
  | { kind: 'ignored' };
