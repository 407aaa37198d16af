/**
 * CSV Data Loader
 * Loads play-by-play and box-score exports (provider column names) for offline scoring
 */

import * as fs from 'fs';
import { parse } from 'csv-parse/sync';
import { RawBoxScoreRow, RawPlayByPlayRow } from '../../types';
import { DataError } from '../../utils/errorHandler';
import { StatsRecord, toBoxScoreRow, toPlayByPlayRow } from '../nba/resultSetParser';

const PLAY_BY_PLAY_COLUMNS = ['PERIOD', 'PCTIMESTRING', 'SCOREMARGIN'];
const BOX_SCORE_COLUMNS = ['FGM', 'FGA', 'FG3M', 'FG3A', 'PTS'];

export function parseCsvRecords(content: string): StatsRecord[] {
  const records: Record<string, string>[] = parse(content, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    bom: true
  });
  return records;
}

function requireColumns(records: StatsRecord[], required: string[], source: string): void {
  if (records.length === 0) return;
  const missing = required.filter(column => !(column in records[0]));
  if (missing.length > 0) {
    throw new DataError(`${source} is missing columns: ${missing.join(', ')}`, { missing });
  }
}

export function parsePlayByPlayCsv(content: string, source: string = 'play-by-play CSV'): RawPlayByPlayRow[] {
  const records = parseCsvRecords(content);
  requireColumns(records, PLAY_BY_PLAY_COLUMNS, source);
  return records.map(toPlayByPlayRow);
}

export function parseBoxScoreCsv(
  content: string,
  fallbackGameId: string = '',
  source: string = 'box-score CSV'
): RawBoxScoreRow[] {
  const records = parseCsvRecords(content);
  requireColumns(records, BOX_SCORE_COLUMNS, source);
  return records.map(record => toBoxScoreRow(record, fallbackGameId));
}

function readFile(filePath: string): string {
  if (!fs.existsSync(filePath)) {
    throw new DataError(`File not found: ${filePath}`);
  }
  return fs.readFileSync(filePath, 'utf-8');
}

export function loadPlayByPlayCsv(filePath: string): RawPlayByPlayRow[] {
  return parsePlayByPlayCsv(readFile(filePath), filePath);
}

export function loadBoxScoreCsv(filePath: string, fallbackGameId: string = ''): RawBoxScoreRow[] {
  return parseBoxScoreCsv(readFile(filePath), fallbackGameId, filePath);
}
