import type { CodedPoint, ShotSequence } from '@/types/shot-data';
import { allShots, isCoded, terminatingServe } from '@/lib/shot-sequence';

export type PointEndingKind =
  | 'ace'
  | 'unreturnable'
  | 'double_fault'
  | 'winner'
  | 'forced_error'
  | 'unforced_error'
  | 'penalty'
  | 'not_coded'
  | 'unfinished';

export interface PointEnding {
  kind: PointEndingKind;
  player: string | null; // who hit the last ball (or served the double fault)
}

/**
 * Number of shots after the serve, return included. Aces, unreturnable serves
 * and double faults have length 0.
 */
export function rallyLength(sequence: ShotSequence): number {
  return allShots(sequence).length;
}

/**
 * How the point ended, according to its shot-level detail
 */
export function pointEnding(sequence: ShotSequence): PointEnding {
  if (sequence.kind === 'not_coded') return { kind: 'not_coded', player: null };
  if (sequence.kind !== 'coded') return { kind: 'penalty', player: null };

  const serve = terminatingServe(sequence);

  if (serve.outcome === 'fault') return { kind: 'double_fault', player: serve.server };
  if (serve.outcome === 'ace' || serve.outcome === 'unreturnable') {
    return { kind: serve.outcome, player: serve.server };
  }

  const shots = allShots(sequence);
  const lastShot = shots[shots.length - 1];

  if (!lastShot || lastShot.outcome === 'in_play') {
    return { kind: 'unfinished', player: lastShot?.player ?? null };
  }

  return { kind: lastShot.outcome, player: lastShot.player };
}

export interface RallyLengthBucket {
  label: string;
  min: number;
  max: number | null;
  points: number;
  serverWon: number;
}

export interface RallyStats {
  totalPoints: number;
  codedPoints: number;
  averageRallyLength: number;
  longestRally: CodedPoint | null;
  shortestRally: CodedPoint | null;
  lengthBuckets: RallyLengthBucket[];
}

const BUCKETS: Array<Pick<RallyLengthBucket, 'label' | 'min' | 'max'>> = [
  { label: '0-3', min: 0, max: 3 },
  { label: '4-6', min: 4, max: 6 },
  { label: '7-9', min: 7, max: 9 },
  { label: '10+', min: 10, max: null },
];

/**
 * Rally statistics over a set of points. Shortcut points count towards the
 * total but carry no rally.
 */
export function calculateRallyStats(sequences: ShotSequence[]): RallyStats {
  const coded = sequences.filter(isCoded);
  const lengthBuckets = BUCKETS.map((bucket) => ({ ...bucket, points: 0, serverWon: 0 }));

  if (coded.length === 0) {
    return {
      totalPoints: sequences.length,
      codedPoints: 0,
      averageRallyLength: 0,
      longestRally: null,
      shortestRally: null,
      lengthBuckets,
    };
  }

  const totalShots = coded.reduce((sum, point) => sum + rallyLength(point), 0);

  const longestRally = coded.reduce((longest, current) =>
    rallyLength(current) > rallyLength(longest) ? current : longest
  );

  const shortestRally = coded.reduce((shortest, current) =>
    rallyLength(current) < rallyLength(shortest) ? current : shortest
  );

  for (const point of coded) {
    const length = rallyLength(point);
    const bucket = lengthBuckets.find((b) => length >= b.min && (b.max === null || length <= b.max));
    if (!bucket) continue;
    bucket.points += 1;
    if (point.serverWon) bucket.serverWon += 1;
  }

  return {
    totalPoints: sequences.length,
    codedPoints: coded.length,
    averageRallyLength: totalShots / coded.length,
    longestRally,
    shortestRally,
    lengthBuckets,
  };
}

/**
 * Filter charted points by rally criteria
 */
export function filterRallies(
  sequences: ShotSequence[],
  filters: {
    minShots?: number;
    maxShots?: number;
    server?: string;
    serverWon?: boolean;
    endedBy?: PointEndingKind;
  }
): CodedPoint[] {
  return sequences.filter(isCoded).filter((point) => {
    const length = rallyLength(point);
    if (filters.minShots !== undefined && length < filters.minShots) return false;
    if (filters.maxShots !== undefined && length > filters.maxShots) return false;
    if (filters.server !== undefined && point.server !== filters.server) return false;
    if (filters.serverWon !== undefined && point.serverWon !== filters.serverWon) return false;
    if (filters.endedBy !== undefined && pointEnding(point).kind !== filters.endedBy) return false;
    return true;
  });
}
