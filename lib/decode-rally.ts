import type { Players, Rally, Shot } from '@/types/shot-data';
import { MalformedSequenceError, UnknownCodeError } from '@/lib/errors';
import {
  COURT_POSITIONS,
  ERROR_KINDS,
  NET_CORD_CODE,
  RETURN_DEPTHS,
  SHOT_DIRECTIONS,
  SHOT_OUTCOMES,
  SHOT_TYPES,
  STOP_VOLLEY_CODE,
  codeFor,
  isCourtPositionCode,
  isErrorCode,
  isReturnDepthCode,
  isShotDirectionCode,
  isShotOutcomeCode,
  isShotTypeCode,
} from '@/lib/notation';
import type { CourtPosition, ErrorKind, ReturnDepth, ShotDirection, ShotOutcome } from '@/lib/notation';

function isModifierCode(char: string) {
  return (
    isShotDirectionCode(char) ||
    isReturnDepthCode(char) ||
    isCourtPositionCode(char) ||
    isErrorCode(char) ||
    isShotOutcomeCode(char) ||
    char === NET_CORD_CODE ||
    char === STOP_VOLLEY_CODE
  );
}

/**
 * Decode one token: a shot-type letter followed by its modifiers. The outcome
 * marker, when present, must be the last character of the token.
 */
function decodeShotToken(token: string, player: string, fullCode: string): Shot {
  const typeCode = token[0];
  if (!isShotTypeCode(typeCode)) {
    throw new UnknownCodeError('Unknown shot type', typeCode, fullCode);
  }

  let direction: ShotDirection | null = null;
  let depth: ReturnDepth | null = null;
  let position: CourtPosition | null = null;
  let errorKind: ErrorKind | null = null;
  let outcome: ShotOutcome = 'in_play';
  let netCord = false;
  let stopVolley = false;

  for (let i = 1; i < token.length; i++) {
    const char = token[i];

    if (outcome !== 'in_play') {
      throw new MalformedSequenceError('Modifier after the point outcome', token, fullCode);
    }

    if (isShotDirectionCode(char)) {
      if (direction !== null) throw new MalformedSequenceError('Shot direction charted twice', token, fullCode);
      direction = SHOT_DIRECTIONS[char];
    } else if (isReturnDepthCode(char)) {
      if (depth !== null) throw new MalformedSequenceError('Return depth charted twice', token, fullCode);
      depth = RETURN_DEPTHS[char];
    } else if (isCourtPositionCode(char)) {
      if (position !== null) throw new MalformedSequenceError('Court position charted twice', token, fullCode);
      position = COURT_POSITIONS[char];
    } else if (char === NET_CORD_CODE) {
      netCord = true;
    } else if (char === STOP_VOLLEY_CODE) {
      stopVolley = true;
    } else if (isErrorCode(char)) {
      if (errorKind !== null) throw new MalformedSequenceError('Error type charted twice', token, fullCode);
      errorKind = ERROR_KINDS[char];
    } else if (isShotOutcomeCode(char)) {
      outcome = SHOT_OUTCOMES[char];
    } else {
      throw new UnknownCodeError(`Unknown modifier in shot "${token}"`, char, fullCode);
    }
  }

  if (errorKind !== null && outcome !== 'forced_error' && outcome !== 'unforced_error') {
    throw new MalformedSequenceError('Error type without an error marker', token, fullCode);
  }

  return Object.freeze({
    player,
    shotType: SHOT_TYPES[typeCode],
    direction: direction ?? 'unknown',
    depth,
    position,
    netCord,
    stopVolley,
    errorKind,
    outcome,
    raw: token,
  });
}

/**
 * Stream the shots of a rally, returner first, then alternating.
 *
 * Each call starts from the beginning of `code`, so the stream can be
 * restarted at will; consuming it to the end verifies the whole code.
 */
export function* iterateShots(code: string, players: Players, fullCode: string = code): Generator<Shot, void, undefined> {
  let index = 0;
  let returnerToHit = true;
  let pointOver = false;

  while (index < code.length) {
    const char = code[index];

    if (pointOver) {
      throw new MalformedSequenceError('Shots charted after the point ended', code.slice(index), fullCode);
    }

    if (!isShotTypeCode(char)) {
      if (isModifierCode(char)) {
        throw new MalformedSequenceError('Modifier without a shot', code.slice(index), fullCode);
      }
      throw new UnknownCodeError('Unknown shot type', char, fullCode);
    }

    let end = index + 1;
    while (end < code.length && !isShotTypeCode(code[end])) end += 1;

    const shot = decodeShotToken(code.slice(index, end), returnerToHit ? players.returner : players.server, fullCode);
    yield shot;

    pointOver = shot.outcome !== 'in_play';
    returnerToHit = !returnerToHit;
    index = end;
  }
}

export function decodeRally(code: string, players: Players, fullCode: string = code): Rally {
  if (!code) {
    throw new MalformedSequenceError('Rally code is empty', code, fullCode);
  }

  const shots = Array.from(iterateShots(code, players, fullCode));
  return Object.freeze({ code, shots: Object.freeze(shots) });
}

export function encodeShot(shot: Shot): string {
  let token: string = codeFor(SHOT_TYPES, shot.shotType);

  if (shot.position) token += codeFor(COURT_POSITIONS, shot.position);
  if (shot.stopVolley) token += STOP_VOLLEY_CODE;
  if (shot.netCord) token += NET_CORD_CODE;
  if (shot.direction !== 'unknown') token += codeFor(SHOT_DIRECTIONS, shot.direction);
  if (shot.depth) token += codeFor(RETURN_DEPTHS, shot.depth);
  if (shot.errorKind) token += codeFor(ERROR_KINDS, shot.errorKind);
  if (shot.outcome !== 'in_play') token += codeFor(SHOT_OUTCOMES, shot.outcome);

  return token;
}

export function encodeRally(rally: Rally): string {
  return rally.shots.map(encodeShot).join('');
}
