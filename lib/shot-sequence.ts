import type {
  CodedPoint,
  FirstServe,
  PointCodes,
  Rally,
  SecondServe,
  Serve,
  Shot,
  ShotSequence,
  ShotSequenceKind,
} from '@/types/shot-data';
import { decodeRally, encodeRally } from '@/lib/decode-rally';
import { decodeServe, encodeServe, hadRally, wasFault } from '@/lib/decode-serve';
import { MalformedSequenceError, MissingRequiredServeError, UnknownCodeError } from '@/lib/errors';
import { UNKNOWN_DIRECTION_CODE, classifySingleCharacter } from '@/lib/notation';

export interface ShotSequenceFields {
  server: string;
  returner: string;
  serverWon: boolean;
  firstServe?: FirstServe | null;
  secondServe?: SecondServe | null;
  rally?: Rally | null;
  notCoded?: boolean;
  serverLostOutright?: boolean;
  serverWonOutright?: boolean;
}

export interface PointInput {
  server: string;
  returner: string;
  serverWon: boolean;
  firstCode: string;
  secondCode?: string | null;
}

export interface DecodeOptions {
  allowStraySecondCode?: boolean; // default false
}

type ShortcutKind = Exclude<ShotSequenceKind, 'coded'>;

function shortcutPoint(kind: ShortcutKind, server: string, returner: string, serverWon: boolean): ShotSequence {
  const point: Exclude<ShotSequence, CodedPoint> = { kind, server, returner, serverWon };
  return Object.freeze(point);
}

/**
 * Build a point from already-decoded parts.
 *
 * Exactly one shape must be given: one of the three shortcut flags, or a
 * first serve. A coded point must also agree with its own serves: a second
 * serve exactly when the first was a fault, a rally exactly when the serve
 * that ended the serving was returned.
 */
export function createShotSequence(fields: ShotSequenceFields): ShotSequence {
  const { server, returner, serverWon } = fields;
  const firstServe = fields.firstServe ?? null;
  const secondServe = fields.secondServe ?? null;
  const rally = fields.rally ?? null;

  const claimed: ShotSequenceKind[] = [];
  if (fields.notCoded) claimed.push('not_coded');
  if (fields.serverLostOutright) claimed.push('server_lost_outright');
  if (fields.serverWonOutright) claimed.push('server_won_outright');
  if (firstServe) claimed.push('coded');

  if (claimed.length > 1) {
    throw new MalformedSequenceError(`Point has more than one shape (${claimed.join(', ')})`, '');
  }

  const kind = claimed.length === 1 ? claimed[0] : null;

  if (kind !== null && kind !== 'coded') {
    if (secondServe || rally) {
      throw new MalformedSequenceError('Shortcut point cannot carry a second serve or a rally', '');
    }
    return shortcutPoint(kind, server, returner, serverWon);
  }

  if (!firstServe) {
    throw new MissingRequiredServeError('Charted point has no first serve');
  }

  if (wasFault(firstServe) && !secondServe) {
    throw new MissingRequiredServeError('First serve was a fault but there is no second serve', firstServe.rawCode);
  }

  if (!wasFault(firstServe) && secondServe) {
    throw new MalformedSequenceError(
      'Second serve recorded although the first serve went in',
      secondServe.rawCode,
      firstServe.rawCode
    );
  }

  const lastServe: Serve = secondServe ?? firstServe;

  if (hadRally(lastServe) && !rally) {
    throw new MalformedSequenceError('Returned serve has no rally', lastServe.rawCode);
  }

  if (rally && !hadRally(lastServe)) {
    throw new MalformedSequenceError('Rally recorded after a serve that ended the point', rally.code, lastServe.rawCode);
  }

  if (rally && rally.shots.length === 0) {
    throw new MalformedSequenceError('Rally has no shots', rally.code);
  }

  const point: CodedPoint = { kind: 'coded', server, returner, serverWon, firstServe, secondServe, rally };
  return Object.freeze(point);
}

/**
 * Decode one charted point from its first- and second-serve codes.
 *
 * Single-character first codes are dispatched before anything else: the four
 * shortcuts end decoding on the spot (the second code is never looked at), a
 * bare fault letter becomes a fault of unknown direction, and any other single
 * character is rejected.
 */
export function decodeShotSequence(input: PointInput, options: DecodeOptions = {}): ShotSequence {
  const { server, returner, serverWon } = input;
  let firstCode = input.firstCode.trim();

  if (!firstCode) {
    throw new MissingRequiredServeError('Point has no first-serve code');
  }

  if (firstCode.length === 1) {
    const single = classifySingleCharacter(firstCode);

    switch (single.kind) {
      case 'shortcut':
        return shortcutPoint(single.shape, server, returner, serverWon);
      case 'bare_fault':
        firstCode = UNKNOWN_DIRECTION_CODE + firstCode;
        break;
      case 'unknown':
        throw new UnknownCodeError('Unknown single-character code', single.code);
    }
  }

  const players = { server, returner };
  const secondCode = (input.secondCode ?? '').trim();
  const first = decodeServe(firstCode, server, 'first');

  let secondServe: SecondServe | null = null;
  let rally: Rally | null = null;

  if (wasFault(first.serve)) {
    if (!secondCode) {
      throw new MissingRequiredServeError('First serve was a fault but no second-serve code was charted', firstCode);
    }

    const second = decodeServe(secondCode, server, 'second');
    secondServe = second.serve;

    if (hadRally(second.serve)) {
      rally = decodeRally(second.remaining, players, secondCode);
    }
  } else {
    const allowStraySecondCode = options.allowStraySecondCode ?? false;
    if (secondCode && !allowStraySecondCode) {
      throw new MalformedSequenceError('Second-serve code charted although the first serve went in', secondCode, firstCode);
    }

    if (hadRally(first.serve)) {
      rally = decodeRally(first.remaining, players, firstCode);
    }
  }

  return createShotSequence({ server, returner, serverWon, firstServe: first.serve, secondServe, rally });
}

export function isCoded(sequence: ShotSequence): sequence is CodedPoint {
  return sequence.kind === 'coded';
}

/** The serve that was either put in play or double-faulted. */
export function terminatingServe(sequence: CodedPoint): Serve {
  return sequence.secondServe ?? sequence.firstServe;
}

export function allShots(sequence: ShotSequence): readonly Shot[] {
  if (sequence.kind !== 'coded' || !sequence.rally) return [];
  return sequence.rally.shots;
}

/** Encode a point back into charting codes. */
export function encodeShotSequence(sequence: ShotSequence): PointCodes {
  switch (sequence.kind) {
    case 'not_coded':
      return { firstCode: sequence.serverWon ? 'S' : 'R', secondCode: '' };
    case 'server_lost_outright':
      return { firstCode: 'P', secondCode: '' };
    case 'server_won_outright':
      return { firstCode: 'Q', secondCode: '' };
    case 'coded': {
      const rallyCode = sequence.rally ? encodeRally(sequence.rally) : '';
      if (sequence.secondServe) {
        return {
          firstCode: encodeServe(sequence.firstServe),
          secondCode: encodeServe(sequence.secondServe) + rallyCode,
        };
      }
      return { firstCode: encodeServe(sequence.firstServe) + rallyCode, secondCode: '' };
    }
  }
}
