import type { Serve, Shot, ShotSequence } from '@/types/shot-data';
import type { CourtPosition, ReturnDepth, ServeDirection, ShotDirection } from '@/lib/notation';
import { pointEnding } from '@/lib/rally-analyzer';

const SERVE_DIRECTION_PHRASES: Record<ServeDirection, string> = {
  wide: 'wide',
  body: 'to the body',
  t: 'down the T',
  unknown: 'direction not charted',
};

const SHOT_DIRECTION_PHRASES: Record<Exclude<ShotDirection, 'unknown'>, string> = {
  forehand_side: 'to the forehand side',
  middle: 'down the middle',
  backhand_side: 'to the backhand side',
};

const POSITION_PHRASES: Record<CourtPosition, string> = {
  approach: 'approach',
  net: 'at the net',
  baseline: 'from the baseline',
};

const DEPTH_PHRASES: Record<ReturnDepth, string> = {
  service_box: 'landing in the service boxes',
  mid_court: 'landing behind the service line',
  baseline: 'landing near the baseline',
};

function humanize(value: string) {
  return value.replace(/_/g, ' ');
}

export function describeShot(shot: Shot): string {
  const parts: string[] = [humanize(shot.shotType)];

  if (shot.stopVolley) parts.push('(stop volley)');
  if (shot.position) parts.push(POSITION_PHRASES[shot.position]);
  if (shot.netCord) parts.push('off the net cord');
  if (shot.direction !== 'unknown') parts.push(SHOT_DIRECTION_PHRASES[shot.direction]);
  if (shot.depth) parts.push(DEPTH_PHRASES[shot.depth]);

  let text = `${shot.player}: ${parts.join(' ')}`;

  if (shot.outcome !== 'in_play') {
    text += `, ${humanize(shot.outcome)}`;
    if (shot.errorKind) text += ` (${humanize(shot.errorKind)})`;
  }

  return text;
}

export function describeServe(serve: Serve): string {
  const label = serve.attempt === 'first' ? 'First serve' : 'Second serve';
  let text = `${label} by ${serve.server}: ${SERVE_DIRECTION_PHRASES[serve.direction]}`;

  if (serve.lets > 0) text += serve.lets === 1 ? ', 1 let' : `, ${serve.lets} lets`;
  if (serve.serveAndVolley) text += ', serve and volley';

  switch (serve.outcome) {
    case 'fault':
      text += serve.faultKind ? `, fault (${humanize(serve.faultKind)})` : ', fault';
      break;
    case 'ace':
      text += ', ace';
      break;
    case 'unreturnable':
      text += ', unreturnable';
      break;
    case 'returned':
      text += ', returned';
      break;
  }

  return text;
}

export function describePointEnding(sequence: ShotSequence): string {
  const winner = sequence.serverWon ? sequence.server : sequence.returner;
  const ending = pointEnding(sequence);
  const by = ending.player ?? sequence.server;

  switch (ending.kind) {
    case 'not_coded':
      return `Point to ${winner}, not charted`;
    case 'penalty':
      return `Point to ${winner} on a penalty`;
    case 'unfinished':
      return `Point to ${winner}, ending not charted`;
    case 'double_fault':
      return `Double fault by ${by}`;
    case 'ace':
      return `Ace by ${by}`;
    case 'unreturnable':
      return `Unreturnable serve by ${by}`;
    case 'winner':
      return `Winner by ${by}`;
    case 'forced_error':
      return `Forced error by ${by}`;
    case 'unforced_error':
      return `Unforced error by ${by}`;
  }
}

/**
 * Debug dump of a point: serves, then rally shots in the order they were hit,
 * then how the point ended.
 */
export function formatSequence(sequence: ShotSequence): string[] {
  if (sequence.kind !== 'coded') return [describePointEnding(sequence)];

  const lines = [describeServe(sequence.firstServe)];
  if (sequence.secondServe) lines.push(describeServe(sequence.secondServe));

  sequence.rally?.shots.forEach((shot, index) => {
    lines.push(`${index + 1}. ${describeShot(shot)}`);
  });

  lines.push(describePointEnding(sequence));
  return lines;
}

export function printSequence(sequence: ShotSequence): void {
  for (const line of formatSequence(sequence)) {
    console.log(line);
  }
}
