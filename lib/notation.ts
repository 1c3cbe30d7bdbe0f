/**
 * Character tables of the point-charting notation.
 *
 * These tables are a compatibility contract with existing charted datasets:
 * every character below means exactly what the public charting notation
 * documents, and nothing outside them is accepted.
 */

export const SHOT_TYPES = {
  f: 'forehand',
  b: 'backhand',
  r: 'forehand_slice',
  s: 'backhand_slice',
  v: 'forehand_volley',
  z: 'backhand_volley',
  o: 'overhead',
  p: 'backhand_overhead',
  u: 'forehand_drop_shot',
  y: 'backhand_drop_shot',
  l: 'forehand_lob',
  m: 'backhand_lob',
  h: 'forehand_half_volley',
  i: 'backhand_half_volley',
  j: 'forehand_swinging_volley',
  k: 'backhand_swinging_volley',
  t: 'trick_shot',
  q: 'unknown_shot',
} as const;

export const SERVE_DIRECTIONS = {
  '4': 'wide',
  '5': 'body',
  '6': 't',
  '0': 'unknown',
} as const;

export const SHOT_DIRECTIONS = {
  '1': 'forehand_side',
  '2': 'middle',
  '3': 'backhand_side',
  '0': 'unknown',
} as const;

export const RETURN_DEPTHS = {
  '7': 'service_box',
  '8': 'mid_court',
  '9': 'baseline',
} as const;

export const COURT_POSITIONS = {
  '+': 'approach',
  '-': 'net',
  '=': 'baseline',
} as const;

export const FAULT_KINDS = {
  n: 'net',
  w: 'wide',
  d: 'deep',
  x: 'wide_and_deep',
  g: 'foot_fault',
  e: 'unknown',
  '!': 'shank',
  V: 'time_violation',
} as const;

export const ERROR_KINDS = {
  n: 'net',
  w: 'wide',
  d: 'deep',
  x: 'wide_and_deep',
  '!': 'shank',
  e: 'unknown',
} as const;

export const SHOT_OUTCOMES = {
  '*': 'winner',
  '#': 'forced_error',
  '@': 'unforced_error',
} as const;

export const SERVE_OUTCOMES = {
  '*': 'ace',
  '#': 'unreturnable',
} as const;

export const SHORTCUTS = {
  S: 'not_coded',
  R: 'not_coded',
  P: 'server_lost_outright',
  Q: 'server_won_outright',
} as const;

export const LET_CODE = 'c';
export const SERVE_AND_VOLLEY_CODE = '+';
export const NET_CORD_CODE = ';';
export const STOP_VOLLEY_CODE = '^';
export const UNKNOWN_DIRECTION_CODE = '0';

export type ShotTypeCode = keyof typeof SHOT_TYPES;
export type ShotType = (typeof SHOT_TYPES)[ShotTypeCode];
export type ServeDirectionCode = keyof typeof SERVE_DIRECTIONS;
export type ServeDirection = (typeof SERVE_DIRECTIONS)[ServeDirectionCode];
export type ShotDirectionCode = keyof typeof SHOT_DIRECTIONS;
export type ShotDirection = (typeof SHOT_DIRECTIONS)[ShotDirectionCode];
export type ReturnDepthCode = keyof typeof RETURN_DEPTHS;
export type ReturnDepth = (typeof RETURN_DEPTHS)[ReturnDepthCode];
export type CourtPositionCode = keyof typeof COURT_POSITIONS;
export type CourtPosition = (typeof COURT_POSITIONS)[CourtPositionCode];
export type FaultCode = keyof typeof FAULT_KINDS;
export type FaultKind = (typeof FAULT_KINDS)[FaultCode];
export type ErrorCode = keyof typeof ERROR_KINDS;
export type ErrorKind = (typeof ERROR_KINDS)[ErrorCode];
export type ShotOutcomeCode = keyof typeof SHOT_OUTCOMES;
export type ShotOutcome = 'in_play' | (typeof SHOT_OUTCOMES)[ShotOutcomeCode];
export type ServeOutcomeCode = keyof typeof SERVE_OUTCOMES;
export type ServeOutcome = 'fault' | 'returned' | (typeof SERVE_OUTCOMES)[ServeOutcomeCode];
export type ShortcutCode = keyof typeof SHORTCUTS;
export type ShortcutShape = (typeof SHORTCUTS)[ShortcutCode];

function hasCode<T extends object>(table: T, char: string): char is Extract<keyof T, string> {
  return Object.prototype.hasOwnProperty.call(table, char);
}

export function isShotTypeCode(char: string): char is ShotTypeCode {
  return hasCode(SHOT_TYPES, char);
}

export function isServeDirectionCode(char: string): char is ServeDirectionCode {
  return hasCode(SERVE_DIRECTIONS, char);
}

export function isShotDirectionCode(char: string): char is ShotDirectionCode {
  return hasCode(SHOT_DIRECTIONS, char);
}

export function isReturnDepthCode(char: string): char is ReturnDepthCode {
  return hasCode(RETURN_DEPTHS, char);
}

export function isCourtPositionCode(char: string): char is CourtPositionCode {
  return hasCode(COURT_POSITIONS, char);
}

export function isFaultCode(char: string): char is FaultCode {
  return hasCode(FAULT_KINDS, char);
}

export function isErrorCode(char: string): char is ErrorCode {
  return hasCode(ERROR_KINDS, char);
}

export function isShotOutcomeCode(char: string): char is ShotOutcomeCode {
  return hasCode(SHOT_OUTCOMES, char);
}

export function isServeOutcomeCode(char: string): char is ServeOutcomeCode {
  return hasCode(SERVE_OUTCOMES, char);
}

export function isShortcutCode(char: string): char is ShortcutCode {
  return hasCode(SHORTCUTS, char);
}

export type SingleCharacterCode =
  | { kind: 'shortcut'; code: ShortcutCode; shape: ShortcutShape }
  | { kind: 'bare_fault'; code: FaultCode; faultKind: FaultKind }
  | { kind: 'unknown'; code: string };

/**
 * One-character first codes mean two unrelated things: a whole-point shortcut,
 * or a fault charted without a serve direction. Shortcuts win.
 */
export function classifySingleCharacter(char: string): SingleCharacterCode {
  if (isShortcutCode(char)) {
    return { kind: 'shortcut', code: char, shape: SHORTCUTS[char] };
  }
  if (isFaultCode(char)) {
    return { kind: 'bare_fault', code: char, faultKind: FAULT_KINDS[char] };
  }
  return { kind: 'unknown', code: char };
}

/** Reverse lookup: the notation character for a decoded value. */
export function codeFor<T extends Record<string, string>>(table: T, value: T[keyof T]): Extract<keyof T, string> {
  for (const key of Object.keys(table)) {
    if (hasCode(table, key) && table[key] === value) return key;
  }
  throw new Error(`No notation character for "${String(value)}"`);
}

/**
 * Shot-type letters start a new token in a rally, so no modifier character may
 * double as one. Throws at load time if the tables are edited into conflict.
 */
export function assertVocabulary(): void {
  const modifierTables: Record<string, object> = {
    SHOT_DIRECTIONS,
    RETURN_DEPTHS,
    COURT_POSITIONS,
    ERROR_KINDS,
    SHOT_OUTCOMES,
  };
  const modifiers = new Set<string>([NET_CORD_CODE, STOP_VOLLEY_CODE]);

  for (const [name, table] of Object.entries(modifierTables)) {
    for (const char of Object.keys(table)) {
      if (isShotTypeCode(char)) {
        throw new Error(`Notation table ${name} reuses shot-type character "${char}"`);
      }
      modifiers.add(char);
    }
  }

  for (const char of Object.keys(FAULT_KINDS)) {
    if (isServeDirectionCode(char) || char === LET_CODE || char === SERVE_AND_VOLLEY_CODE) {
      throw new Error(`Fault character "${char}" collides with the serve alphabet`);
    }
  }

  for (const char of Object.keys(SHORTCUTS)) {
    if (isFaultCode(char)) {
      throw new Error(`Shortcut character "${char}" is also a fault character`);
    }
  }

  if (modifiers.has(LET_CODE) || isShotTypeCode(LET_CODE)) {
    throw new Error(`Let character "${LET_CODE}" collides with the rally alphabet`);
  }
}

assertVocabulary();
