/**
 * NBA stats API result-set parsing
 * Responses look like { resultSets: [{ name, headers, rowSet }] }
 */

import { GameInfo, RawBoxScoreRow, RawPlayByPlayRow } from '../../types';
import { DataError } from '../../utils/errorHandler';

export type StatsRecord = Record<string, unknown>;

export interface TeamGameLogEntry extends GameInfo {
  teamId?: number;
  teamAbbreviation: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pull a named result set out of a stats payload and zip headers with rows.
 */
export function parseResultSet(payload: unknown, name: string): StatsRecord[] {
  if (!isRecord(payload)) {
    throw new DataError(`Malformed stats response while looking for ${name}`);
  }

  const sets = Array.isArray(payload.resultSets)
    ? payload.resultSets
    : payload.resultSet !== undefined
      ? [payload.resultSet]
      : [];

  const resultSet = sets.find((set: unknown) => isRecord(set) && set.name === name);
  if (!isRecord(resultSet)) {
    throw new DataError(`Result set ${name} missing from stats response`, {
      available: sets.filter(isRecord).map(set => set.name)
    });
  }

  const headers = resultSet.headers;
  const rowSet = resultSet.rowSet;
  if (!Array.isArray(headers) || !Array.isArray(rowSet)) {
    throw new DataError(`Result set ${name} has no headers or rows`);
  }

  return rowSet.map((row: unknown, rowIndex: number) => {
    if (!Array.isArray(row)) {
      throw new DataError(`Row ${rowIndex} of ${name} is not an array`);
    }
    const record: StatsRecord = {};
    headers.forEach((header: unknown, index: number) => {
      record[String(header)] = row[index];
    });
    return record;
  });
}

function text(value: unknown): string {
  if (value === null || value === undefined) return '';
  return String(value).trim();
}

/**
 * Stat value: null/blank (did not play) is 0, anything unparseable is NaN.
 */
function stat(value: unknown): number {
  if (value === null || value === undefined) return 0;
  if (typeof value === 'number') return value;
  const raw = String(value).trim();
  if (raw === '') return 0;
  return Number(raw);
}

function optionalStat(record: StatsRecord, key: string): number | undefined {
  return key in record ? stat(record[key]) : undefined;
}

function optionalId(value: unknown): number | undefined {
  const id = Number(value);
  return value === null || value === undefined || value === '' || isNaN(id) ? undefined : id;
}

export function toPlayByPlayRow(record: StatsRecord): RawPlayByPlayRow {
  const description = [record.HOMEDESCRIPTION, record.NEUTRALDESCRIPTION, record.VISITORDESCRIPTION]
    .map(text)
    .filter(part => part !== '')
    .join(' | ');

  const margin = record.SCOREMARGIN;
  const eventType = optionalId(record.EVENTMSGTYPE);

  return {
    period: Number(record.PERIOD),
    scoreMargin: typeof margin === 'number' || typeof margin === 'string' ? margin : null,
    clock: text(record.PCTIMESTRING),
    description,
    ...(eventType !== undefined ? { eventType } : {}),
    score: text(record.SCORE) || null
  };
}

export function toBoxScoreRow(record: StatsRecord, fallbackGameId: string = ''): RawBoxScoreRow {
  const teamId = optionalId(record.TEAM_ID);
  const teamAbbreviation = text(record.TEAM_ABBREVIATION) || undefined;
  const reb = optionalStat(record, 'REB');
  const ast = optionalStat(record, 'AST');

  return {
    gameId: text(record.GAME_ID) || fallbackGameId,
    ...(teamId !== undefined ? { teamId } : {}),
    ...(teamAbbreviation ? { teamAbbreviation } : {}),
    playerName: text(record.PLAYER_NAME) || text(record.TEAM_ABBREVIATION),
    fgm: stat(record.FGM),
    fga: stat(record.FGA),
    fg3m: stat(record.FG3M),
    fg3a: stat(record.FG3A),
    pts: stat(record.PTS),
    ...(reb !== undefined ? { reb } : {}),
    ...(ast !== undefined ? { ast } : {})
  };
}

/**
 * Game finder rows are one per team per game.
 */
export function toTeamGameLogEntry(record: StatsRecord): TeamGameLogEntry {
  const teamId = optionalId(record.TEAM_ID);
  return {
    gameId: text(record.GAME_ID),
    gameDate: text(record.GAME_DATE).slice(0, 10),
    matchup: text(record.MATCHUP),
    teamAbbreviation: text(record.TEAM_ABBREVIATION),
    ...(teamId !== undefined ? { teamId } : {})
  };
}
