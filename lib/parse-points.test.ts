import { after, before, describe, it, mock } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { allShots } from '@/lib/shot-sequence';
import type { ChartingConfig } from '@/lib/config';
import { MatchIdFormatError, loadPointsFile, parseMatchId, parsePointsCSV } from '@/lib/parse-points';

const quiet: ChartingConfig = { logDroppedPoints: false, strictSecondCode: true, debug: false };
const loud: ChartingConfig = { ...quiet, logDroppedPoints: true };

const MATCH_ID = '20240114-W-Harbour_Open-F-Ana_Lima-Bea_Costa';

const csv = [
  'match_id,Pt,Pts,Svr,1st,2nd,Notes,PtWinner',
  `${MATCH_ID},1,0-0,1,6*,,,1`,
  `${MATCH_ID},2,15-0,1,4n,5f1b2@,,2`,
  `${MATCH_ID},3,15-15,1,Z,,,2`,
  `${MATCH_ID},4,15-30,2,S,,"Rain delay, resumed",2`,
  `${MATCH_ID},x,0-0,2,S,,,2`,
  '',
].join('\n');

describe('parseMatchId', () => {
  it('splits the id into match details', () => {
    assert.deepEqual(parseMatchId(MATCH_ID), {
      matchId: MATCH_ID,
      date: '2024-01-14',
      gender: 'W',
      tournament: 'Harbour Open',
      round: 'F',
      player1: 'Ana Lima',
      player2: 'Bea Costa',
    });
  });

  it('rejects ids with the wrong number of parts', () => {
    assert.throws(() => parseMatchId('20240114-W-Harbour_Open-F-Ana_Lima'), MatchIdFormatError);
  });
});

describe('parsePointsCSV', () => {
  it('decodes good rows and drops bad ones', () => {
    const warn = mock.method(console, 'warn', () => {});
    try {
      const { matches, points, dropped } = parsePointsCSV(csv, { config: loud });

      assert.equal(matches.length, 1);
      assert.deepEqual(
        points.map((point) => [point.pointNumber, point.sequence.kind, point.sequence.server, point.sequence.serverWon]),
        [
          [1, 'coded', 'Ana Lima', true],
          [2, 'coded', 'Ana Lima', false],
          [4, 'not_coded', 'Bea Costa', true],
        ]
      );

      assert.equal(dropped.length, 2);
      assert.deepEqual(dropped[0], { rowNumber: 3, matchId: MATCH_ID, reason: 'Unknown single-character code: "Z"' });
      assert.equal(dropped[1].rowNumber, 5);
      assert.equal(dropped[1].matchId, MATCH_ID);
      assert.equal(warn.mock.callCount(), 2);
      assert.deepEqual(warn.mock.calls[0].arguments, ['[charting.parse] dropped-point', dropped[0]]);
    } finally {
      warn.mock.restore();
    }
  });

  it('keeps the game score and notes', () => {
    const warn = mock.method(console, 'warn', () => {});
    try {
      const { points } = parsePointsCSV(csv);
      assert.equal(points[0].gameScore, '0-0');
      assert.equal(points[0].notes, null);
      assert.equal(points[2].notes, 'Rain delay, resumed');
    } finally {
      warn.mock.restore();
    }
  });

  it('gives the return to the player who did not serve', () => {
    const warn = mock.method(console, 'warn', () => {});
    try {
      const { points } = parsePointsCSV(csv);
      assert.deepEqual(
        allShots(points[1].sequence).map((shot) => shot.player),
        ['Bea Costa', 'Ana Lima']
      );
    } finally {
      warn.mock.restore();
    }
  });

  it('reads the game number', () => {
    const text = ['match_id,Pt,Gm#,Svr,1st,2nd,PtWinner', `${MATCH_ID},1,7 (3),1,6*,,1`, `${MATCH_ID},2,,1,6*,,1`].join('\n');
    const { points } = parsePointsCSV(text, { config: quiet });
    assert.deepEqual(
      points.map((point) => point.gameNumber),
      [7, null]
    );
  });

  it('drops rows whose match id cannot be read', () => {
    const warn = mock.method(console, 'warn', () => {});
    try {
      const { points, dropped } = parsePointsCSV(['match_id,Pt,Svr,1st,2nd,PtWinner', 'bad-id,1,1,S,,1'].join('\n'));
      assert.equal(points.length, 0);
      assert.deepEqual(dropped, [{ rowNumber: 1, matchId: 'bad-id', reason: 'Unreadable match id "bad-id"' }]);
    } finally {
      warn.mock.restore();
    }
  });

  it('takes player names and decode options from the caller', () => {
    const text = ['match_id,Pt,Svr,1st,2nd,PtWinner', `${MATCH_ID},1,2,6*,4n,2`].join('\n');
    const { points, dropped } = parsePointsCSV(text, {
      players: { player1: 'P1', player2: 'P2' },
      decode: { allowStraySecondCode: true },
    });

    assert.equal(dropped.length, 0);
    assert.equal(points[0].sequence.server, 'P2');
    assert.equal(points[0].sequence.returner, 'P1');
  });
});

describe('parsePointsCSV configuration', () => {
  const stray = ['match_id,Pt,Svr,1st,2nd,PtWinner', `${MATCH_ID},1,1,6*,4n,1`].join('\n');

  it('drops a stray second code unless the config allows it', () => {
    assert.equal(parsePointsCSV(stray, { config: quiet }).dropped.length, 1);

    const { points, dropped } = parsePointsCSV(stray, { config: { ...quiet, strictSecondCode: false } });
    assert.equal(dropped.length, 0);
    assert.equal(points[0].sequence.kind, 'coded');
  });

  it('lets decode options win over the config', () => {
    const { dropped } = parsePointsCSV(stray, {
      config: { ...quiet, strictSecondCode: false },
      decode: { allowStraySecondCode: false },
    });
    assert.equal(dropped.length, 1);
  });

  it('stays silent when dropped-row logging is off', () => {
    const warn = mock.method(console, 'warn', () => {});
    const info = mock.method(console, 'info', () => {});
    try {
      const { dropped } = parsePointsCSV(csv, { config: quiet });
      assert.equal(dropped.length, 2);
      assert.equal(warn.mock.callCount(), 0);
      assert.equal(info.mock.callCount(), 0);
    } finally {
      warn.mock.restore();
      info.mock.restore();
    }
  });

  it('logs a summary in debug mode', () => {
    const info = mock.method(console, 'info', () => {});
    try {
      parsePointsCSV(csv, { config: { ...quiet, debug: true } });
      assert.equal(info.mock.callCount(), 1);
      assert.deepEqual(info.mock.calls[0].arguments, [
        '[charting.parse] completed',
        { rows: 5, points: 3, dropped: 2, csv_errors: 0 },
      ]);
    } finally {
      info.mock.restore();
    }
  });
});

describe('loadPointsFile', () => {
  let dir = '';

  before(async () => {
    dir = await mkdtemp(join(tmpdir(), 'charting-'));
  });

  after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads a charting file from disk', async () => {
    const path = join(dir, 'points.csv');
    await writeFile(path, ['match_id,Pt,Svr,1st,2nd,PtWinner', `${MATCH_ID},1,1,4f1*,,2`].join('\n'), 'utf8');

    const { points } = await loadPointsFile(path);
    assert.equal(points.length, 1);
    assert.equal(allShots(points[0].sequence)[0].outcome, 'winner');
  });
});
