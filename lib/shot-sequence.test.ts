import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { decodeRally } from '@/lib/decode-rally';
import { decodeServe, hadRally } from '@/lib/decode-serve';
import { MalformedSequenceError, MissingRequiredServeError, UnknownCodeError } from '@/lib/errors';
import {
  allShots,
  createShotSequence,
  decodeShotSequence,
  encodeShotSequence,
  terminatingServe,
} from '@/lib/shot-sequence';

const point = (firstCode: string, secondCode: string | null = null, serverWon = true) =>
  decodeShotSequence({ server: 'A', returner: 'B', serverWon, firstCode, secondCode });

describe('decodeShotSequence', () => {
  it('decodes S as a point that was not coded', () => {
    assert.deepEqual(point('S'), { kind: 'not_coded', server: 'A', returner: 'B', serverWon: true });
  });

  it('never reads the second code of a shortcut', () => {
    assert.deepEqual(point('R', 'not a serve', false), { kind: 'not_coded', server: 'A', returner: 'B', serverWon: false });
    assert.equal(point('P', '???').kind, 'server_lost_outright');
    assert.equal(point(' Q ', '6*').kind, 'server_won_outright');
  });

  it('reads a bare fault letter as a fault of unknown direction', () => {
    const sequence = point('n', '5f28b1*');
    assert.equal(sequence.kind, 'coded');
    if (sequence.kind !== 'coded') return;

    assert.equal(sequence.firstServe.faultKind, 'net');
    assert.equal(sequence.firstServe.direction, 'unknown');
    assert.equal(sequence.secondServe?.direction, 'body');
    assert.equal(sequence.rally?.code, 'f28b1*');
    assert.equal(allShots(sequence).length, 2);
  });

  it('requires a second code after a bare fault letter', () => {
    assert.throws(() => point('n'), MissingRequiredServeError);
    assert.throws(() => point('n', '   '), MissingRequiredServeError);
  });

  it('decodes an ace with no rally and no second serve', () => {
    const sequence = point('6*');
    assert.equal(sequence.kind, 'coded');
    if (sequence.kind !== 'coded') return;

    assert.equal(sequence.firstServe.outcome, 'ace');
    assert.equal(hadRally(sequence.firstServe), false);
    assert.equal(sequence.secondServe, null);
    assert.equal(sequence.rally, null);
  });

  it('alternates a three-shot rally starting with the returner', () => {
    const sequence = point('4f1b2f3*', null, false);
    assert.deepEqual(
      allShots(sequence).map((shot) => shot.player),
      ['B', 'A', 'B']
    );
  });

  it('names an unknown single character', () => {
    assert.throws(
      () => point('Z'),
      (error: unknown) =>
        error instanceof UnknownCodeError && error.fragment === 'Z' && error.message === 'Unknown single-character code: "Z"'
    );
  });

  it('rejects an empty first code', () => {
    assert.throws(() => point('  '), MissingRequiredServeError);
  });

  it('rejects a second code after a first serve that went in', () => {
    assert.throws(
      () => point('6*', '4n'),
      (error: unknown) => error instanceof MalformedSequenceError && error.fragment === '4n' && error.code === '6*'
    );
  });

  it('does not read the stray second-code setting from the environment', () => {
    const previous = process.env.CHARTING_STRICT_SECOND_CODE;
    process.env.CHARTING_STRICT_SECOND_CODE = 'false';
    try {
      assert.throws(() => point('6*', '4n'), MalformedSequenceError);
    } finally {
      if (previous === undefined) delete process.env.CHARTING_STRICT_SECOND_CODE;
      else process.env.CHARTING_STRICT_SECOND_CODE = previous;
    }
  });

  it('can let a stray second code through', () => {
    const sequence = decodeShotSequence(
      { server: 'A', returner: 'B', serverWon: true, firstCode: '6*', secondCode: '4n' },
      { allowStraySecondCode: true }
    );
    assert.equal(sequence.kind === 'coded' ? sequence.secondServe : undefined, null);
  });

  it('keeps a double fault without a rally', () => {
    const sequence = point('4n', '5d', false);
    assert.equal(sequence.kind, 'coded');
    if (sequence.kind !== 'coded') return;

    assert.equal(terminatingServe(sequence).faultKind, 'deep');
    assert.equal(sequence.rally, null);
  });

  it('has a second serve exactly when the first serve faulted', () => {
    const cases: Array<[string, string | null]> = [
      ['6*', null],
      ['4f1*', null],
      ['5n', '6#'],
      ['w', '4b2@'],
    ];

    for (const [firstCode, secondCode] of cases) {
      const sequence = point(firstCode, secondCode);
      if (sequence.kind !== 'coded') throw new Error(`expected a coded point for ${firstCode}`);
      assert.equal(sequence.secondServe !== null, sequence.firstServe.faultKind !== null);
      assert.equal(sequence.rally !== null, hadRally(terminatingServe(sequence)));
    }
  });

  it('is deterministic', () => {
    assert.deepEqual(point('c5+f37v2*', null), point('c5+f37v2*', null));
  });

  it('propagates rally errors with the full code', () => {
    assert.throws(
      () => point('4n', '6f1*b2'),
      (error: unknown) => error instanceof MalformedSequenceError && error.fragment === 'b2' && error.code === '6f1*b2'
    );
  });
});

describe('encodeShotSequence', () => {
  it('re-encodes shortcuts', () => {
    assert.deepEqual(encodeShotSequence(point('S')), { firstCode: 'S', secondCode: '' });
    assert.deepEqual(encodeShotSequence(point('R', null, false)), { firstCode: 'R', secondCode: '' });
    assert.deepEqual(encodeShotSequence(point('Q')), { firstCode: 'Q', secondCode: '' });
  });

  it('re-encodes an equivalent token stream', () => {
    const codes = encodeShotSequence(point('4f18b2;f3@'));
    assert.deepEqual(codes, { firstCode: '4f18b;2f3@', secondCode: '' });
    assert.deepEqual(encodeShotSequence(point(codes.firstCode)), codes);
  });

  it('puts the rally after the second serve', () => {
    assert.deepEqual(encodeShotSequence(point('n', '5f28b1*')), { firstCode: '0n', secondCode: '5f28b1*' });
  });
});

describe('createShotSequence', () => {
  const base = { server: 'A', returner: 'B', serverWon: true };

  it('builds a shortcut point from its flag', () => {
    assert.equal(createShotSequence({ ...base, serverWonOutright: true }).kind, 'server_won_outright');
  });

  it('needs some shape', () => {
    assert.throws(() => createShotSequence(base), MissingRequiredServeError);
  });

  it('rejects more than one shape', () => {
    assert.throws(() => createShotSequence({ ...base, notCoded: true, serverLostOutright: true }), MalformedSequenceError);
  });

  it('requires a second serve after a fault', () => {
    const firstServe = decodeServe('4w', 'A', 'first').serve;
    assert.throws(() => createShotSequence({ ...base, firstServe }), MissingRequiredServeError);
  });

  it('requires a rally after a returned serve', () => {
    const firstServe = decodeServe('4f1', 'A', 'first').serve;
    assert.throws(() => createShotSequence({ ...base, firstServe }), MalformedSequenceError);

    const rally = decodeRally('f1*', { server: 'A', returner: 'B' });
    const sequence = createShotSequence({ ...base, firstServe, rally });
    assert.equal(allShots(sequence).length, 1);
  });

  it('rejects a rally after an ace', () => {
    const firstServe = decodeServe('6*', 'A', 'first').serve;
    const rally = decodeRally('f1*', { server: 'A', returner: 'B' });
    assert.throws(() => createShotSequence({ ...base, firstServe, rally }), MalformedSequenceError);
  });

  it('freezes the point', () => {
    const firstServe = decodeServe('6*', 'A', 'first').serve;
    assert.equal(Object.isFrozen(createShotSequence({ ...base, firstServe })), true);
  });
});
