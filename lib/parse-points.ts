import { readFile } from 'fs/promises';
import Papa from 'papaparse';
import { z } from 'zod';
import type { ChartedPoint, DroppedRow, MatchMeta } from '@/types/match-data';
import { loadConfig } from '@/lib/config';
import type { ChartingConfig } from '@/lib/config';
import { isNotationError } from '@/lib/errors';
import { decodeShotSequence } from '@/lib/shot-sequence';
import type { DecodeOptions } from '@/lib/shot-sequence';

export class MatchIdFormatError extends Error {
  readonly matchId: string;

  constructor(matchId: string) {
    super(`Unreadable match id "${matchId}"`);
    this.name = 'MatchIdFormatError';
    this.matchId = matchId;
  }
}

// 20190128-M-Australian_Open-F-Novak_Djokovic-Rafael_Nadal
const MATCH_ID_PATTERN = /^(\d{4})(\d{2})(\d{2})-([MW])-([^-]+)-([^-]+)-([^-]+)-([^-]+)$/;

const pointRowSchema = z.object({
  match_id: z.string().trim().min(1),
  Pt: z.coerce.number().int().positive(),
  Svr: z.coerce.number().int().min(1).max(2),
  '1st': z.string().default(''),
  '2nd': z.string().nullish().transform((value) => value ?? ''),
  PtWinner: z.coerce.number().int().min(1).max(2),
  Pts: z.string().nullish(),
  // '7 (3)': game 7 of the match, game 3 of the set
  'Gm#': z
    .string()
    .nullish()
    .transform((value) => {
      const match = value?.trim().match(/^(\d+)/);
      return match ? Number(match[1]) : null;
    }),
  Notes: z.string().nullish(),
});

export interface ParsePointsOptions {
  // Player names to use instead of the ones in match_id.
  players?: { player1: string; player2: string };
  // Overrides the stray second-code setting of `config`.
  decode?: DecodeOptions;
  config?: ChartingConfig; // read from process.env when absent
}

export interface ChartingParseResult {
  matches: MatchMeta[];
  points: ChartedPoint[];
  dropped: DroppedRow[];
}

function fromUnderscores(value: string) {
  return value.replace(/_/g, ' ').trim();
}

function emptyToNull(value: string | null | undefined) {
  const clean = value?.trim() ?? '';
  return clean.length > 0 ? clean : null;
}

export function parseMatchId(matchId: string): MatchMeta {
  const match = matchId.trim().match(MATCH_ID_PATTERN);
  if (!match) throw new MatchIdFormatError(matchId);

  const [, year, month, day, gender, tournament, round, player1, player2] = match;

  return {
    matchId: matchId.trim(),
    date: `${year}-${month}-${day}`,
    gender: gender === 'W' ? 'W' : 'M',
    tournament: fromUnderscores(tournament),
    round,
    player1: fromUnderscores(player1),
    player2: fromUnderscores(player2),
  };
}

/**
 * Decode every point of a charting CSV (one row per point).
 *
 * A row that fails validation or decoding is recorded in `dropped` and the
 * rest of the file carries on; anything other than a data error is rethrown.
 */
export function parsePointsCSV(csvText: string, options: ParsePointsOptions = {}): ChartingParseResult {
  const config = options.config ?? loadConfig();
  const decodeOptions: DecodeOptions = {
    allowStraySecondCode: options.decode?.allowStraySecondCode ?? !config.strictSecondCode,
  };
  const results = Papa.parse<Record<string, string>>(csvText, {
    header: true,
    skipEmptyLines: true,
    dynamicTyping: false, // '4' and '6' are serve codes, not numbers
    transformHeader: (header) => header.trim(),
  });

  const matches = new Map<string, MatchMeta>();
  const points: ChartedPoint[] = [];
  const dropped: DroppedRow[] = [];

  const drop = (entry: DroppedRow) => {
    dropped.push(entry);
    if (config.logDroppedPoints) {
      console.warn('[charting.parse] dropped-point', entry);
    }
  };

  results.data.forEach((row, index) => {
    const rowNumber = index + 1;
    const parsedRow = pointRowSchema.safeParse(row);

    if (!parsedRow.success) {
      drop({
        rowNumber,
        matchId: emptyToNull(row.match_id),
        reason: parsedRow.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
      });
      return;
    }

    const data = parsedRow.data;

    try {
      let meta = matches.get(data.match_id);
      if (!meta) {
        meta = parseMatchId(data.match_id);
        if (options.players) {
          meta = { ...meta, player1: options.players.player1, player2: options.players.player2 };
        }
        matches.set(data.match_id, meta);
      }

      const server = data.Svr === 1 ? meta.player1 : meta.player2;
      const returner = data.Svr === 1 ? meta.player2 : meta.player1;

      const sequence = decodeShotSequence(
        {
          server,
          returner,
          serverWon: data.PtWinner === data.Svr,
          firstCode: data['1st'],
          secondCode: data['2nd'],
        },
        decodeOptions
      );

      points.push({
        matchId: data.match_id,
        pointNumber: data.Pt,
        gameNumber: data['Gm#'],
        gameScore: emptyToNull(data.Pts),
        notes: emptyToNull(data.Notes),
        sequence,
      });
    } catch (error) {
      if (isNotationError(error) || error instanceof MatchIdFormatError) {
        drop({ rowNumber, matchId: data.match_id, reason: error.message });
        return;
      }
      throw error;
    }
  });

  if (config.debug) {
    console.info('[charting.parse] completed', {
      rows: results.data.length,
      points: points.length,
      dropped: dropped.length,
      csv_errors: results.errors.length,
    });
  }

  return { matches: Array.from(matches.values()), points, dropped };
}

export async function loadPointsFile(path: string, options: ParsePointsOptions = {}): Promise<ChartingParseResult> {
  const csvText = await readFile(path, 'utf8');
  return parsePointsCSV(csvText, options);
}
