import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  CONFIG_DEFAULTS,
  DEFAULT_TRACKER_CONFIG,
  ensureConfigDefaults,
  loadTrackerConfig,
  parseTrackerConfig,
  setConfigValue,
} from './tracker-config.js';
import { SqliteTabularStore, CONFIG_TAB } from '../history/tabular-store.js';

describe('tracker-config', () => {
  describe('CONFIG_DEFAULTS', () => {
    it('lists every key once, starting with the bootcamp start date', () => {
      const keys = CONFIG_DEFAULTS.map(([key]) => key);
      expect(keys).toHaveLength(36);
      expect(new Set(keys).size).toBe(36);
      expect(CONFIG_DEFAULTS[0]).toEqual(['bootcamp_start_date', '2026-02-23']);
      expect(CONFIG_DEFAULTS.at(-2)).toEqual(['base_repos', 'ed-donner/llm_engineering']);
      expect(CONFIG_DEFAULTS.at(-1)).toEqual(['last_poll_timestamp', '']);
    });

    it('renders fractional defaults as plain numbers', () => {
      const map = new Map(CONFIG_DEFAULTS);
      expect(map.get('review_points_each')).toBe('1.5');
      expect(map.get('comment_points_each')).toBe('0.5');
      expect(map.get('manual_users')).toBe('');
    });

    it('resolves back to the defaults', () => {
      expect(parseTrackerConfig(Object.fromEntries(CONFIG_DEFAULTS))).toEqual(DEFAULT_TRACKER_CONFIG);
    });
  });

  describe('parseTrackerConfig', () => {
    it('returns defaults for an empty map', () => {
      expect(parseTrackerConfig({})).toEqual(DEFAULT_TRACKER_CONFIG);
    });

    it('applies overrides while keeping other defaults', () => {
      const config = parseTrackerConfig({
        at_risk_score_threshold: '25.5',
        collab_pr_cap: ' 10 ',
      });

      expect(config.atRiskScoreThreshold).toBe(25.5);
      expect(config.collabPrCap).toBe(10);
      expect(config.decliningScoreThreshold).toBe(50);
    });

    it('falls back silently on malformed values', () => {
      const config = parseTrackerConfig({
        inactive_threshold_days: 'seven',
        quality_max_points: '',
        classify_good: 'Infinity',
        bootcamp_start_date: '2026-02-30',
      });

      expect(config.inactiveThresholdDays).toBe(7);
      expect(config.qualityMaxPoints).toBe(20);
      expect(config.classifyGood).toBe(60);
      expect(config.bootcampStartDate).toBe('2026-02-23');
    });

    it('keeps the default line scales when set to zero or below', () => {
      const config = parseTrackerConfig({
        lines_added_max_scale: '0',
        lines_deleted_max_scale: '-50',
      });
      expect(config.linesAddedMaxScale).toBe(500);
      expect(config.linesDeletedMaxScale).toBe(200);
      expect(parseTrackerConfig({ lines_added_max_scale: '250' }).linesAddedMaxScale).toBe(250);
    });

    it('truncates day counts to whole numbers', () => {
      const config = parseTrackerConfig({
        inactive_threshold_days: '10.9',
        declining_active_days_min: '3.2',
      });
      expect(config.inactiveThresholdDays).toBe(10);
      expect(config.decliningActiveDaysMin).toBe(3);
    });

    it('reads custom leaderboard dates only when valid', () => {
      expect(
        parseTrackerConfig({
          custom_leaderboard_start: '2026-03-01',
          custom_leaderboard_end: 'soon',
        })
      ).toMatchObject({ customLeaderboardStart: '2026-03-01', customLeaderboardEnd: undefined });
    });

    it('splits comma lists and drops blanks', () => {
      const config = parseTrackerConfig({
        excluded_users: ' ed-donner, ,Bot ',
        manual_users: 'amy, bob:bob/course',
        base_repos: 'a/one, b/two',
      });

      expect(config.excludedUsers).toEqual(['ed-donner', 'Bot']);
      expect(config.manualUsers).toEqual(['amy', 'bob:bob/course']);
      expect(config.baseRepos).toEqual(['a/one', 'b/two']);
    });

    it('reads the last poll timestamp only when well formed', () => {
      expect(parseTrackerConfig({ last_poll_timestamp: '2026-03-01T08:30:00Z' }).lastPollTimestamp).toBe(
        '2026-03-01T08:30:00Z'
      );
      expect(parseTrackerConfig({ last_poll_timestamp: '2026-03-01' }).lastPollTimestamp).toBeUndefined();
      expect(parseTrackerConfig({ last_poll_timestamp: '2026-02-30T08:30:00Z' }).lastPollTimestamp).toBeUndefined();
    });

    it('keeps the default base repo when the value is blank', () => {
      expect(parseTrackerConfig({ base_repos: ' , ' }).baseRepos).toEqual(['ed-donner/llm_engineering']);
    });
  });

  describe('store round trip', () => {
    let store: SqliteTabularStore;

    beforeEach(() => {
      store = new SqliteTabularStore(':memory:');
    });

    afterEach(() => {
      store.close();
    });

    it('seeds a new Config tab with a header and every default', () => {
      const added = ensureConfigDefaults(store);

      const rows = store.readAll(CONFIG_TAB);
      expect(added).toHaveLength(36);
      expect(rows[0]).toEqual(['Key', 'Value']);
      expect(rows[1]).toEqual(['bootcamp_start_date', '2026-02-23']);
      expect(rows).toHaveLength(37);
    });

    it('appends only missing keys and preserves edited values', () => {
      store.clearAndWrite(CONFIG_TAB, ['Key', 'Value'], [['inactive_threshold_days', '3']]);

      const added = ensureConfigDefaults(store);

      expect(added).not.toContain('inactive_threshold_days');
      expect(added).toHaveLength(35);
      expect(store.readAll(CONFIG_TAB)[1]).toEqual(['inactive_threshold_days', '3']);
      expect(loadTrackerConfig(store).inactiveThresholdDays).toBe(3);
      expect(ensureConfigDefaults(store)).toEqual([]);
    });

    it('sets a known key in place', () => {
      setConfigValue(store, 'declining_score_threshold', '45');

      expect(loadTrackerConfig(store).decliningScoreThreshold).toBe(45);
      expect(store.readAll(CONFIG_TAB)).toHaveLength(37);
    });

    it('rejects unknown keys', () => {
      expect(() => setConfigValue(store, 'declining_treshold', '45')).toThrow('Unknown config key');
    });
  });
});
