import { describe, it, expect } from 'vitest';
import { topPlayers } from './ranking.js';
import { formatLeader, formatStat } from './format.js';
import { createRecord } from './record.js';
import { qualified, battingAverage } from './metrics.js';
import { InvalidArgumentError } from './errors.js';
import type { BattingRecord } from './types.js';

describe('Ranker', () => {
  // AVG: able .250, baker .320, charlie .300, dog .250, easy .400 (100 AB)
  const records: BattingRecord[] = [
    createRecord({ playerId: 'able01', year: 1976, atBats: 600, hits: 150, walks: 90, singles: 100, doubles: 30, triples: 0, homeRuns: 20 }),
    createRecord({ playerId: 'baker01', year: 1976, atBats: 500, hits: 160, walks: 20, singles: 140, doubles: 20 }),
    createRecord({ playerId: 'charlie01', year: 1976, atBats: 600, hits: 180, walks: 40, singles: 120, doubles: 30, triples: 5, homeRuns: 25 }),
    createRecord({ playerId: 'dog01', year: 1976, atBats: 520, hits: 130, walks: 10, singles: 130 }),
    createRecord({ playerId: 'easy01', year: 1976, atBats: 100, hits: 40, walks: 5, singles: 40 }),
  ];

  describe('topPlayers', () => {
    it('should return the top N by metric, best first', () => {
      const leaders = topPlayers(records, 'avg', 3);
      expect(leaders.map((l) => l.playerId)).toEqual(['easy01', 'baker01', 'charlie01']);
      expect(leaders[0].value).toBe(0.4);
      expect(leaders[1].value).toBe(0.32);
      expect(leaders[2].value).toBe(0.3);
    });

    it('should return every record when N exceeds the input', () => {
      const leaders = topPlayers(records, 'avg', 50);
      expect(leaders.map((l) => l.playerId)).toEqual(['easy01', 'baker01', 'charlie01', 'able01', 'dog01']);
    });

    it('should keep input order for ties', () => {
      const leaders = topPlayers(records, 'avg', 5);
      expect(leaders[3]).toEqual({ playerId: 'able01', value: 0.25 });
      expect(leaders[4]).toEqual({ playerId: 'dog01', value: 0.25 });
    });

    it('should return an empty list for N <= 0', () => {
      expect(topPlayers(records, 'avg', 0)).toEqual([]);
      expect(topPlayers(records, 'avg', -3)).toEqual([]);
    });

    it('should return an empty list for empty input', () => {
      expect(topPlayers([], 'slg', 10)).toEqual([]);
    });

    it('should accept a custom metric function', () => {
      const homeRuns = (r: BattingRecord) => r.homeRuns;
      expect(topPlayers(records, homeRuns, 2)).toEqual([
        { playerId: 'charlie01', value: 25 },
        { playerId: 'able01', value: 20 },
      ]);
    });

    it('should rank by a qualified metric', () => {
      const leaders = topPlayers(records, qualified(battingAverage, 500), 2);
      expect(leaders.map((l) => l.playerId)).toEqual(['baker01', 'charlie01']);
    });

    it('should rank by OBP', () => {
      // easy 45/105, able 240/690, baker 180/520, charlie 220/640
      const leaders = topPlayers(records, 'obp', 3);
      expect(leaders.map((l) => l.playerId)).toEqual(['easy01', 'able01', 'baker01']);
    });

    it('should reject an unknown metric name', () => {
      expect(() => topPlayers(records, 'war', 5)).toThrow(InvalidArgumentError);
    });

    it('should reject a non-finite count', () => {
      expect(() => topPlayers(records, 'avg', Number.NaN)).toThrow(
        'Leaderboard size must be a finite number, got NaN'
      );
      expect(() => topPlayers(records, 'avg', Number.POSITIVE_INFINITY)).toThrow(
        'Leaderboard size must be a finite number, got Infinity'
      );
    });

    it('should floor a fractional count', () => {
      expect(topPlayers(records, 'avg', 2.9).map((l) => l.playerId)).toEqual(['easy01', 'baker01']);
      expect(topPlayers(records, 'avg', 0.5)).toEqual([]);
    });

    it('should rank NaN metric values after every number', () => {
      const scores: Record<string, number> = { able01: 10, baker01: Number.NaN, charlie01: 30, dog01: 40 };
      const unguarded = (r: BattingRecord) => scores[r.playerId] ?? Number.NaN;
      const leaders = topPlayers(records.slice(0, 4), unguarded, 4);
      expect(leaders.map((l) => l.playerId)).toEqual(['dog01', 'charlie01', 'able01', 'baker01']);
      expect(leaders[3].value).toBeNaN();
    });

    it('should keep input order among NaN values', () => {
      const homeRunRate = (r: BattingRecord) => r.homeRuns / r.atBats;
      const blanks = [
        createRecord({ playerId: 'zero01', year: 1976 }),
        createRecord({ playerId: 'slugger01', year: 1976, atBats: 100, hits: 30, homeRuns: 10 }),
        createRecord({ playerId: 'zero02', year: 1976 }),
      ];
      expect(topPlayers(blanks, homeRunRate, 3).map((l) => l.playerId)).toEqual(['slugger01', 'zero01', 'zero02']);
    });
  });

  describe('formatLeader', () => {
    it('should format the value with three decimals and the display name', () => {
      expect(formatLeader({ playerId: 'baker01', value: 0.32 }, 'Sam Baker')).toBe('0.320 --- Sam Baker');
    });

    it('should fall back to the player id', () => {
      expect(formatLeader({ playerId: 'baker01', value: 1 / 3 })).toBe('0.333 --- baker01');
    });

    it('should round rate stats', () => {
      expect(formatStat(200 / 550)).toBe('0.364');
    });
  });
});
