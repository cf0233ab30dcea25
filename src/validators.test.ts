import { describe, it, expect } from 'vitest';
import {
  BackfillArgsSchema,
  LearnerHistoryArgsSchema,
  PeriodLeaderboardArgsSchema,
  parseArgs,
} from './validators.js';

describe('validators', () => {
  describe('PeriodLeaderboardArgsSchema', () => {
    it('defaults to the weekly period', () => {
      expect(parseArgs(PeriodLeaderboardArgsSchema, undefined)).toEqual({ period: 'weekly' });
    });

    it('accepts a custom range', () => {
      expect(
        parseArgs(PeriodLeaderboardArgsSchema, { period: 'custom', from: '2024-03-01', to: ' 2024-03-05 ' })
      ).toEqual({ period: 'custom', from: '2024-03-01', to: '2024-03-05' });
    });

    it('rejects unknown periods and impossible dates', () => {
      expect(() => parseArgs(PeriodLeaderboardArgsSchema, { period: 'yearly' })).toThrow('Invalid arguments: period:');
      expect(() => parseArgs(PeriodLeaderboardArgsSchema, { from: '2024-02-30' })).toThrow(
        'Invalid arguments: from: Expected a date as YYYY-MM-DD'
      );
    });

    it('rejects inverted ranges', () => {
      expect(() => parseArgs(PeriodLeaderboardArgsSchema, { from: '2024-03-05', to: '2024-03-01' })).toThrow(
        'Invalid arguments: "from" must not be after "to"'
      );
    });
  });

  describe('LearnerHistoryArgsSchema', () => {
    it('requires a learner', () => {
      expect(() => parseArgs(LearnerHistoryArgsSchema, { learner: '  ' })).toThrow(
        'Invalid arguments: learner: learner is required'
      );
      expect(parseArgs(LearnerHistoryArgsSchema, { learner: ' amy ' })).toEqual({ learner: 'amy' });
    });
  });

  describe('BackfillArgsSchema', () => {
    it('coerces the pause and defaults it to two seconds', () => {
      expect(parseArgs(BackfillArgsSchema, { start: '2024-03-01' })).toEqual({ start: '2024-03-01', sleep: 2 });
      expect(parseArgs(BackfillArgsSchema, { start: '2024-03-01', end: '2024-03-02', sleep: '0' })).toEqual({
        start: '2024-03-01',
        end: '2024-03-02',
        sleep: 0,
      });
    });

    it('rejects a negative pause', () => {
      expect(() => parseArgs(BackfillArgsSchema, { start: '2024-03-01', sleep: '-1' })).toThrow('sleep');
    });
  });
});
