import { describe, it, expect } from 'vitest';
import { evaluateAlerts } from './alert-evaluator.js';
import { DEFAULT_TRACKER_CONFIG } from '../config/tracker-config.js';
import type { DailyMetricsRow, LeaderboardEntry } from '../types/metrics.js';

const NOW = new Date('2024-03-20T12:00:00Z');
const config = DEFAULT_TRACKER_CONFIG;

function activeRow(username: string, date: string): DailyMetricsRow {
  return {
    username,
    date,
    commits: 1,
    prsOpened: 0,
    prsMerged: 0,
    issuesOpened: 0,
    issueComments: 0,
    reviewCommentsGiven: 0,
    linesAdded: 0,
    linesDeleted: 0,
    avgMergeTimeHours: 0,
    rejectionRate: 0,
    lastUpdated: `${date}T23:00:00Z`,
  };
}

function makeEntry(username: string, totalScore: number, lastActive = 'N/A'): LeaderboardEntry {
  return {
    rank: 1,
    username,
    metrics: {
      totalCommits: 0,
      weeklyCommits: 0,
      activeDays: 0,
      linesAdded: 0,
      linesDeleted: 0,
      prsOpened: 0,
      prsMerged: 0,
      commentsReceived: 0,
      commentsGiven: 0,
      issuesOpened: 0,
      avgMergeTimeHours: 0,
      rejectionRate: 0,
      lastActive,
      lastComment: '',
      lastCommentAt: '',
    },
    scores: {
      consistency: 0,
      collaboration: 0,
      codeVolume: 0,
      quality: 0,
      totalScore,
      classification: 'GOOD',
    },
  };
}

describe('evaluateAlerts', () => {
  it('flags a learner last active exactly at the inactivity cutoff', () => {
    const alerts = evaluateAlerts([makeEntry('amy', 70)], [activeRow('amy', '2024-03-13')], config, NOW);

    expect(alerts).toEqual([
      {
        username: 'amy',
        alertType: 'INACTIVE',
        details: 'No activity in 7+ days',
        lastActive: '2024-03-13',
        score: 70,
      },
    ]);
  });

  it('stays quiet for a recently active learner with a good score', () => {
    expect(evaluateAlerts([makeEntry('amy', 70)], [activeRow('amy', '2024-03-14')], config, NOW)).toEqual([]);
  });

  it('suppresses DECLINING when INACTIVE is raised', () => {
    const alerts = evaluateAlerts([makeEntry('amy', 10)], [], config, NOW);

    expect(alerts.map((a) => [a.alertType, a.details, a.lastActive])).toEqual([
      ['INACTIVE', 'No activity in 7+ days', 'N/A'],
      ['AT RISK', 'Score 10 below 30', 'N/A'],
    ]);
  });

  it('falls back to the entry last-active date when the ledger has none', () => {
    const alerts = evaluateAlerts([makeEntry('amy', 70, '2024-03-01')], [], config, NOW);

    expect(alerts).toHaveLength(1);
    expect(alerts[0]?.lastActive).toBe('2024-03-01');
  });

  it('uses "Never" when nothing records activity', () => {
    const alerts = evaluateAlerts([makeEntry('amy', 70, '')], [], config, NOW);

    expect(alerts[0]?.lastActive).toBe('Never');
  });

  it('flags a sliding learner with one active day', () => {
    const alerts = evaluateAlerts([makeEntry('bob', 45)], [activeRow('bob', '2024-03-18')], config, NOW);

    expect(alerts).toEqual([
      {
        username: 'bob',
        alertType: 'DECLINING',
        details: 'Score 45 (below 50), only 1 active day in last 7 days',
        lastActive: '2024-03-18',
        score: 45,
      },
    ]);
  });

  it('does not flag a score exactly at the declining threshold', () => {
    expect(evaluateAlerts([makeEntry('bob', 50)], [activeRow('bob', '2024-03-18')], config, NOW)).toEqual([]);
  });

  it('pluralizes active days', () => {
    const alerts = evaluateAlerts(
      [makeEntry('bob', 40)],
      [activeRow('bob', '2024-03-18'), activeRow('bob', '2024-03-19')],
      { ...config, decliningActiveDaysMin: 3 },
      NOW
    );

    expect(alerts.map((a) => a.details)).toEqual(['Score 40 (below 50), only 2 active days in last 7 days']);
  });

  it('raises AT RISK and DECLINING together', () => {
    const alerts = evaluateAlerts([makeEntry('cat', 20.5)], [activeRow('cat', '2024-03-19')], config, NOW);

    expect(alerts.map((a) => [a.alertType, a.details])).toEqual([
      ['AT RISK', 'Score 20.5 below 30'],
      ['DECLINING', 'Score 20.5 (below 50), only 1 active day in last 7 days'],
    ]);
  });

  it('matches ledger rows to learners case-insensitively and skips idle rows', () => {
    const idle = { ...activeRow('amy', '2024-03-19'), commits: 0 };
    const alerts = evaluateAlerts([makeEntry('amy', 70)], [activeRow('Amy', '2024-03-12'), idle], config, NOW);

    expect(alerts.map((a) => [a.alertType, a.lastActive])).toEqual([['INACTIVE', '2024-03-12']]);
  });
});
