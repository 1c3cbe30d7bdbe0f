import type { ParsedScore, SetScore } from '@/types/match-data';

export class ScoreFormattingError extends Error {
  readonly score: string;

  constructor(message: string, score: string) {
    super(`${message} (score "${score}")`);
    this.name = 'ScoreFormattingError';
    this.score = score;
  }
}

const SET_PATTERN = /^(\d{1,2})-(\d{1,2})(?:\((\d{1,2})\))?$/;
const RETIREMENT_MARKERS = new Set(['RET', 'RET.', 'DEF', 'DEF.', 'ABD', 'ABN']);
const WALKOVER_MARKERS = new Set(['W/O', 'WO', 'WALKOVER']);
const MAX_SETS = 5;

function validateSet(set: SetScore, raw: string) {
  const high = Math.max(set.winnerGames, set.loserGames);
  const low = Math.min(set.winnerGames, set.loserGames);
  const label = `${set.winnerGames}-${set.loserGames}`;

  if (set.tiebreak !== null) {
    if (high !== low + 1 || high < 7) {
      throw new ScoreFormattingError(`Tiebreak recorded on set ${label}`, raw);
    }
    return;
  }

  if (high < 6) throw new ScoreFormattingError(`Set ${label} is unfinished`, raw);
  if (high === 6 && low <= 4) return;
  if (high >= 7 && high - low === 2) return;
  // Tiebreak sets charted without the tiebreak score.
  if ((high === 7 || high === 13) && low === high - 1) return;

  throw new ScoreFormattingError(`Set ${label} is not a valid set score`, raw);
}

/**
 * Parse a match score such as `6-4 3-6 7-6(5)`, written from the match
 * winner's side. A retirement marker (`RET`, `DEF`, `ABD`) may close the score
 * and leaves the last set unfinished; `W/O` stands alone and has no sets.
 */
export function parseScore(raw: string): ParsedScore {
  const clean = raw.replace(/\s+/g, ' ').trim();
  if (!clean) throw new ScoreFormattingError('Score is empty', raw);

  const tokens = clean.split(' ');

  if (WALKOVER_MARKERS.has(tokens[0].toUpperCase())) {
    if (tokens.length > 1) throw new ScoreFormattingError('Walkover with set scores', raw);
    return { raw, sets: [], retired: false, walkover: true };
  }

  const sets: SetScore[] = [];
  let retired = false;

  tokens.forEach((token, index) => {
    if (RETIREMENT_MARKERS.has(token.toUpperCase())) {
      if (index !== tokens.length - 1) throw new ScoreFormattingError('Retirement marker before the last set', raw);
      retired = true;
      return;
    }

    const match = token.match(SET_PATTERN);
    if (!match) throw new ScoreFormattingError(`Unreadable set "${token}"`, raw);

    sets.push({
      winnerGames: Number(match[1]),
      loserGames: Number(match[2]),
      tiebreak: match[3] === undefined ? null : Number(match[3]),
    });
  });

  if (sets.length === 0) throw new ScoreFormattingError('Score has no sets', raw);
  if (sets.length > MAX_SETS) throw new ScoreFormattingError(`Score has more than ${MAX_SETS} sets`, raw);

  sets.forEach((set, index) => {
    const unfinished = retired && index === sets.length - 1;
    if (!unfinished) validateSet(set, raw);
  });

  return { raw, sets, retired, walkover: false };
}
