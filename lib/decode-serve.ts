import type { FirstServe, SecondServe, Serve, ServeAttempt } from '@/types/shot-data';
import { MalformedSequenceError, MissingRequiredServeError, UnknownCodeError } from '@/lib/errors';
import {
  FAULT_KINDS,
  LET_CODE,
  SERVE_AND_VOLLEY_CODE,
  SERVE_DIRECTIONS,
  SERVE_OUTCOMES,
  codeFor,
  isFaultCode,
  isServeDirectionCode,
  isServeOutcomeCode,
} from '@/lib/notation';
import type { FaultKind, ServeDirection, ServeOutcome } from '@/lib/notation';

export interface DecodedServe<S extends Serve = Serve> {
  serve: S;
  remaining: string; // rally input, empty unless the serve was returned
}

/**
 * Decode one serve attempt.
 *
 * Layout: optional lets (`c`), a direction digit, optional serve-and-volley
 * (`+`), then a fault letter, an ace/unreturnable marker, or the rally. A
 * fault letter with no direction digit in front of it is read as a fault with
 * unknown direction.
 */
export function decodeServe(code: string, server: string, attempt: 'first'): DecodedServe<FirstServe>;
export function decodeServe(code: string, server: string, attempt: 'second'): DecodedServe<SecondServe>;
export function decodeServe(code: string, server: string, attempt: ServeAttempt): DecodedServe {
  if (!code) {
    throw new MissingRequiredServeError(`No code for the ${attempt} serve`, code);
  }

  let index = 0;
  let lets = 0;
  while (code[index] === LET_CODE) {
    lets += 1;
    index += 1;
  }

  if (index >= code.length) {
    throw new MalformedSequenceError('Lets charted without a serve', code, code);
  }

  const lead = code[index];
  let direction: ServeDirection;

  if (isServeDirectionCode(lead)) {
    direction = SERVE_DIRECTIONS[lead];
    index += 1;
  } else if (isFaultCode(lead)) {
    direction = 'unknown';
  } else {
    throw new UnknownCodeError(`Unknown ${attempt} serve code`, lead, code);
  }

  let serveAndVolley = false;
  if (code[index] === SERVE_AND_VOLLEY_CODE) {
    serveAndVolley = true;
    index += 1;
  }

  const next = code.slice(index, index + 1);
  let faultKind: FaultKind | null = null;
  let outcome: ServeOutcome;

  if (isFaultCode(next)) {
    faultKind = FAULT_KINDS[next];
    outcome = 'fault';
    index += 1;
  } else if (isServeOutcomeCode(next)) {
    outcome = SERVE_OUTCOMES[next];
    index += 1;
  } else if (next) {
    outcome = 'returned';
  } else {
    throw new MalformedSequenceError('Serve charted in play without a rally', code, code);
  }

  const remaining = code.slice(index);
  if (outcome !== 'returned' && remaining) {
    const reason = outcome === 'fault' ? 'Characters after a fault' : 'Characters after the serve ended the point';
    throw new MalformedSequenceError(reason, remaining, code);
  }

  const fields = { server, rawCode: code, direction, lets, serveAndVolley, faultKind, outcome };
  const serve: Serve = attempt === 'first' ? { ...fields, attempt: 'first' } : { ...fields, attempt: 'second' };

  return { serve: Object.freeze(serve), remaining };
}

export function wasFault(serve: Serve): boolean {
  return serve.faultKind !== null;
}

/** True when the return came back and the point went on with a rally. */
export function hadRally(serve: Serve): boolean {
  return serve.outcome === 'returned';
}

/** Re-encode a serve; the rally of a returned serve is encoded separately. */
export function encodeServe(serve: Serve): string {
  let code = LET_CODE.repeat(serve.lets) + codeFor(SERVE_DIRECTIONS, serve.direction);

  if (serve.serveAndVolley) code += SERVE_AND_VOLLEY_CODE;
  if (serve.faultKind) code += codeFor(FAULT_KINDS, serve.faultKind);
  if (serve.outcome === 'ace' || serve.outcome === 'unreturnable') code += codeFor(SERVE_OUTCOMES, serve.outcome);

  return code;
}
