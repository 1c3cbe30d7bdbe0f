import type { Shot, ShotSequence } from '@/types/shot-data';
import type { ShotType } from '@/lib/notation';
import { wasFault } from '@/lib/decode-serve';
import { allShots, isCoded, terminatingServe } from '@/lib/shot-sequence';

export interface ServeStats {
  player: string;
  servicePoints: number; // coded points only
  firstServesIn: number;
  firstServePercentage: number;
  firstServePointsWon: number;
  secondServePoints: number;
  secondServePointsWon: number;
  aces: number;
  unreturnable: number;
  doubleFaults: number;
}

export interface PlayerStats {
  player: string;
  totalShots: number;
  winners: number;
  forcedErrors: number;
  unforcedErrors: number;
  winnerRate: number;
  errorRate: number;
  shotTypeDistribution: Record<string, number>;
  directionDistribution: Record<string, number>;
  serve: ServeStats;
}

export interface ShotTypeStats {
  shotType: ShotType;
  count: number;
  winners: number;
  forcedErrors: number;
  unforcedErrors: number;
  successRate: number;
}

export interface OverallStats {
  totalPoints: number;
  codedPoints: number;
  totalShots: number;
  totalWinners: number;
  totalErrors: number;
  shotTypeStats: ShotTypeStats[];
}

function shotsOf(sequences: ShotSequence[]): Shot[] {
  return sequences.flatMap((sequence) => allShots(sequence));
}

function isError(shot: Shot) {
  return shot.outcome === 'forced_error' || shot.outcome === 'unforced_error';
}

/**
 * Serve statistics for one player over the coded points they served
 */
export function calculateServeStats(sequences: ShotSequence[], player: string): ServeStats {
  const served = sequences.filter(isCoded).filter((point) => point.server === player);

  let firstServesIn = 0;
  let firstServePointsWon = 0;
  let secondServePoints = 0;
  let secondServePointsWon = 0;
  let aces = 0;
  let unreturnable = 0;
  let doubleFaults = 0;

  for (const point of served) {
    if (!wasFault(point.firstServe)) {
      firstServesIn += 1;
      if (point.serverWon) firstServePointsWon += 1;
    }

    if (point.secondServe) {
      secondServePoints += 1;
      if (point.serverWon) secondServePointsWon += 1;
      if (wasFault(point.secondServe)) doubleFaults += 1;
    }

    const serve = terminatingServe(point);
    if (serve.outcome === 'ace') aces += 1;
    if (serve.outcome === 'unreturnable') unreturnable += 1;
  }

  return {
    player,
    servicePoints: served.length,
    firstServesIn,
    firstServePercentage: served.length > 0 ? firstServesIn / served.length : 0,
    firstServePointsWon,
    secondServePoints,
    secondServePointsWon,
    aces,
    unreturnable,
    doubleFaults,
  };
}

/**
 * Calculate statistics for a specific player
 */
export function calculatePlayerStats(sequences: ShotSequence[], player: string): PlayerStats {
  const playerShots = shotsOf(sequences).filter((shot) => shot.player === player);
  const serve = calculateServeStats(sequences, player);

  if (playerShots.length === 0) {
    return {
      player,
      totalShots: 0,
      winners: 0,
      forcedErrors: 0,
      unforcedErrors: 0,
      winnerRate: 0,
      errorRate: 0,
      shotTypeDistribution: {},
      directionDistribution: {},
      serve,
    };
  }

  const winners = playerShots.filter((shot) => shot.outcome === 'winner').length;
  const forcedErrors = playerShots.filter((shot) => shot.outcome === 'forced_error').length;
  const unforcedErrors = playerShots.filter((shot) => shot.outcome === 'unforced_error').length;

  const shotTypeDistribution: Record<string, number> = {};
  playerShots.forEach((shot) => {
    shotTypeDistribution[shot.shotType] = (shotTypeDistribution[shot.shotType] || 0) + 1;
  });

  // Uncharted directions are left out
  const directionDistribution: Record<string, number> = {};
  playerShots.forEach((shot) => {
    if (shot.direction !== 'unknown') {
      directionDistribution[shot.direction] = (directionDistribution[shot.direction] || 0) + 1;
    }
  });

  return {
    player,
    totalShots: playerShots.length,
    winners,
    forcedErrors,
    unforcedErrors,
    winnerRate: winners / playerShots.length,
    errorRate: (forcedErrors + unforcedErrors) / playerShots.length,
    shotTypeDistribution,
    directionDistribution,
    serve,
  };
}

/**
 * Calculate statistics for every player who served or hit a shot
 */
export function calculateAllPlayerStats(sequences: ShotSequence[]): PlayerStats[] {
  const players = Array.from(new Set(sequences.flatMap((sequence) => [sequence.server, sequence.returner])));

  return players
    .map((player) => calculatePlayerStats(sequences, player))
    .filter((stats) => stats.totalShots > 0 || stats.serve.servicePoints > 0)
    .sort((a, b) => b.totalShots - a.totalShots);
}

/**
 * Calculate statistics by shot type
 */
export function calculateShotTypeStats(sequences: ShotSequence[]): ShotTypeStats[] {
  const shots = shotsOf(sequences);
  const shotTypes = Array.from(new Set(shots.map((shot) => shot.shotType)));

  return shotTypes
    .map((shotType) => {
      const typeShots = shots.filter((shot) => shot.shotType === shotType);
      const winners = typeShots.filter((shot) => shot.outcome === 'winner').length;
      const forcedErrors = typeShots.filter((shot) => shot.outcome === 'forced_error').length;
      const unforcedErrors = typeShots.filter((shot) => shot.outcome === 'unforced_error').length;
      const errors = forcedErrors + unforcedErrors;

      return {
        shotType,
        count: typeShots.length,
        winners,
        forcedErrors,
        unforcedErrors,
        successRate: winners / (winners + errors || 1),
      };
    })
    .sort((a, b) => b.count - a.count);
}

/**
 * Calculate overall statistics
 */
export function calculateOverallStats(sequences: ShotSequence[]): OverallStats {
  const shots = shotsOf(sequences);

  return {
    totalPoints: sequences.length,
    codedPoints: sequences.filter(isCoded).length,
    totalShots: shots.length,
    totalWinners: shots.filter((shot) => shot.outcome === 'winner').length,
    totalErrors: shots.filter(isError).length,
    shotTypeStats: calculateShotTypeStats(sequences),
  };
}
