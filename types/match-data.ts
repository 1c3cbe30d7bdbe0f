import type { ShotSequence } from '@/types/shot-data';

export interface MatchMeta {
  matchId: string;
  date: string; // YYYY-MM-DD
  gender: 'M' | 'W';
  tournament: string;
  round: string;
  player1: string;
  player2: string;
}

export interface ChartedPoint {
  matchId: string;
  pointNumber: number;
  gameNumber: number | null; // game of the match
  gameScore: string | null; // e.g. '15-30', server first
  notes: string | null;
  sequence: ShotSequence;
}

export interface DroppedRow {
  rowNumber: number; // 1-based, header excluded
  matchId: string | null;
  reason: string;
}

export interface SetScore {
  winnerGames: number;
  loserGames: number;
  tiebreak: number | null; // loser's points in the tiebreak, as charted in parentheses
}

export interface ParsedScore {
  raw: string;
  sets: SetScore[];
  retired: boolean;
  walkover: boolean;
}

export interface CompletedMatch {
  p1: string;
  p2: string;
  winner: string;
  date: string;
  tournamentName: string;
  surface: string | null;
  round: string | null;
  score: ParsedScore;
  stats: Record<string, number>;
  odds: Record<string, number> | null;
}
