import { z } from 'zod';
import type { CompletedMatch, DroppedRow, ParsedScore } from '@/types/match-data';
import { loadConfig } from '@/lib/config';
import type { ChartingConfig } from '@/lib/config';
import { ScoreFormattingError, parseScore } from '@/lib/parse-score';

const KNOWN_COLUMNS = new Set([
  'winner',
  'loser',
  'start_date',
  'tournament_name',
  'score',
  'surface',
  'round_number',
  'winner_odds',
  'loser_odds',
]);

const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) return null;
    const text = String(value).trim();
    return text.length > 0 ? text : null;
  });

const optionalNumber = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined || value === '') return null;
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  });

const matchResultRowSchema = z
  .object({
    winner: z.string().trim().min(1),
    loser: z.string().trim().min(1),
    start_date: z.string().trim().regex(/^\d{4}-\d{2}-\d{2}$/, 'start_date must be YYYY-MM-DD'),
    tournament_name: z.string().trim().min(1),
    score: z.string(),
    surface: optionalText,
    round_number: optionalText,
    winner_odds: optionalNumber,
    loser_odds: optionalNumber,
  })
  .passthrough();

/** One already-parsed match result row, as handed over by the tabular layer. */
export type MatchResultRow = z.input<typeof matchResultRowSchema>;

type BuildOutcome = { match: CompletedMatch } | { reason: string };

function collectStats(row: Record<string, unknown>): Record<string, number> {
  const stats: Record<string, number> = {};

  for (const [key, value] of Object.entries(row)) {
    if (KNOWN_COLUMNS.has(key)) continue;
    if (typeof value !== 'number' && typeof value !== 'string') continue;
    if (typeof value === 'string' && value.trim() === '') continue;
    const parsed = Number(value);
    if (Number.isFinite(parsed)) stats[key] = parsed;
  }

  return stats;
}

function toCompletedMatch(row: MatchResultRow): BuildOutcome {
  const parsed = matchResultRowSchema.safeParse(row);
  if (!parsed.success) {
    return { reason: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ') };
  }

  const data = parsed.data;

  let score: ParsedScore;
  try {
    score = parseScore(data.score);
  } catch (error) {
    if (error instanceof ScoreFormattingError) return { reason: error.message };
    throw error;
  }

  if (score.sets.length < 2) {
    return { reason: `Score "${data.score}" has fewer than two sets` };
  }

  const odds =
    data.winner_odds !== null && data.loser_odds !== null
      ? { [data.winner]: data.winner_odds, [data.loser]: data.loser_odds }
      : null;

  return {
    match: {
      p1: data.winner,
      p2: data.loser,
      winner: data.winner,
      date: data.start_date,
      tournamentName: data.tournament_name,
      surface: data.surface,
      round: data.round_number,
      score,
      stats: collectStats(data),
      odds,
    },
  };
}

/**
 * Turn one result row into a CompletedMatch. Rows whose score cannot be read,
 * or that finished in fewer than two sets, give null.
 */
export function buildCompletedMatch(row: MatchResultRow): CompletedMatch | null {
  const outcome = toCompletedMatch(row);
  return 'match' in outcome ? outcome.match : null;
}

export function buildCompletedMatches(
  rows: MatchResultRow[],
  options: { config?: ChartingConfig } = {}
): { matches: CompletedMatch[]; dropped: DroppedRow[] } {
  const config = options.config ?? loadConfig();
  const matches: CompletedMatch[] = [];
  const dropped: DroppedRow[] = [];

  rows.forEach((row, index) => {
    const outcome = toCompletedMatch(row);
    if ('match' in outcome) {
      matches.push(outcome.match);
      return;
    }

    dropped.push({ rowNumber: index + 1, matchId: null, reason: outcome.reason });
  });

  if (dropped.length > 0 && config.logDroppedPoints) {
    console.warn('[matches.build] dropped-rows', { kept: matches.length, dropped: dropped.length });
  }

  return { matches, dropped };
}
