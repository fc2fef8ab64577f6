/**
 * Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import { heavySlotsFor, loadConfig, parseConfig } from '../../src/config/schema.js';
import { applyOverrides } from '../../src/config/overrides.js';
import { ConfigError } from '../../src/errors.js';
import { rawConfig, testConfig } from '../helpers/fakes.js';

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) return error.issues;
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('parseConfig', () => {
  it('normalises a valid document', () => {
    const config = testConfig();

    expect(config.slotsPerDay).toBe(4);
    expect(config.startingAgents).toBe(10);
    expect(config.hourlyActivity).toEqual({ 0: 0.5, 1: 0.5, 2: 0.5, 3: 0.5 });
    expect(config.pageHourlyActivity).toEqual(config.hourlyActivity);
    expect(config.actionWeights).toEqual({ post: 1, read: 1 });
    expect(config.pageActionWeights).toEqual({ post: 1 });
    expect(config.recruitment).toEqual({ mode: 'none' });
    expect(config.churn).toEqual({ mode: 'none' });
    expect(config.resources).toMatchObject({ heavySlots: 10, cpuWorkers: 4, parallel: true });
    expect(config.recsys).toEqual({ content: 'reverse_chrono', follow: 'preferential_attachment', neighbors: 10, leaningBias: 1 });
  });

  it('accepts action names in any case', () => {
    const config = testConfig((raw) => {
      raw.simulation.actions_likelihood = { Post: 1, READ: 2 };
    });
    expect(config.actionWeights).toEqual({ post: 1, read: 2 });
  });

  it('rejects unknown actions', () => {
    const issues = issuesOf(() =>
      testConfig((raw) => {
        raw.simulation.actions_likelihood = { dance: 1 };
      })
    );
    expect(issues).toEqual([
      'simulation.actions_likelihood: unknown action "dance" (expected one of post, comment, read, share, reply, search, follow, cast, react)',
    ]);
  });

  it('rejects hours outside the day', () => {
    const issues = issuesOf(() =>
      testConfig((raw) => {
        raw.simulation.hourly_activity = { '0': 0.5, '4': 0.5 };
      })
    );
    expect(issues).toEqual(['simulation.hourly_activity: hour "4" is outside 0..3']);
  });

  it('rejects fractions outside [0, 1]', () => {
    const issues = issuesOf(() =>
      testConfig((raw) => {
        raw.simulation.hourly_activity = { '0': 1.5 };
      })
    );
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^simulation\.hourly_activity\.0: /);
  });

  it('rejects an empty hourly table', () => {
    const issues = issuesOf(() =>
      testConfig((raw) => {
        raw.simulation.hourly_activity = {};
      })
    );
    expect(issues).toEqual(['simulation.hourly_activity: table is empty']);
  });

  it('rejects a fixed count and a percentage for the same phase', () => {
    const issues = issuesOf(() =>
      parseConfig(
        {
          ...rawConfig(),
          simulation: { ...rawConfig().simulation, removed_agents_iteration: 2, percentage_removed_agents_iteration: 0.1 },
        },
        {}
      )
    );
    expect(issues).toEqual(['simulation: churn sets both a fixed count and a percentage']);
  });

  it('reads growth rules', () => {
    const config = parseConfig(
      {
        ...rawConfig(),
        simulation: { ...rawConfig().simulation, new_agents_iteration: 3, percentage_removed_agents_iteration: 0.2 },
      },
      {}
    );
    expect(config.recruitment).toEqual({ mode: 'fixed', count: 3 });
    expect(config.churn).toEqual({ mode: 'percentage', rate: 0.2 });
  });

  it('rejects a heavy unit larger than the accelerators', () => {
    const issues = issuesOf(() =>
      testConfig((raw) => {
        raw.resources.heavy_unit = 2;
      })
    );
    expect(issues).toEqual(['resources.heavy_unit (2) exceeds resources.accelerators (1)']);
  });

  it('defaults the reading, feed and opinion settings', () => {
    const config = testConfig();

    expect(config.agents.attentionWindow).toBe(336);
    expect(config.agents.followerReadingRatio).toBe(0.6);
    expect(config.pages.feeds).toEqual([]);
    expect(config.opinions).toBeUndefined();
  });

  it('creates one page per configured feed', () => {
    const config = testConfig((raw) => {
      Object.assign(raw.pages, {
        feeds: [
          { topic: 'economy', feed_url: 'https://news.test/economy.xml' },
          { name: 'TechWire', topic: 'technology', feed_url: 'https://news.test/tech.xml' },
        ],
      });
    });

    expect(config.pages.count).toBe(2);
    expect(config.pages.topics).toEqual(['economy', 'technology']);
    expect(config.pages.feeds).toEqual([
      { name: undefined, topic: 'economy', feedUrl: 'https://news.test/economy.xml' },
      { name: 'TechWire', topic: 'technology', feedUrl: 'https://news.test/tech.xml' },
    ]);
  });

  it('rejects a page count that disagrees with the feeds', () => {
    const issues = issuesOf(() =>
      testConfig((raw) => {
        raw.pages.count = 3;
        Object.assign(raw.pages, { feeds: [{ topic: 'economy', feed_url: 'https://news.test/economy.xml' }] });
      })
    );
    expect(issues).toEqual(['pages: count (3) disagrees with the 1 configured feeds']);
  });

  it('rejects a feed without a valid URL', () => {
    const issues = issuesOf(() =>
      testConfig((raw) => {
        Object.assign(raw.pages, { feeds: [{ topic: 'economy', feed_url: 'not a url' }] });
      })
    );
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^pages\.feeds\.0\.feed_url: /);
  });

  it('fills in opinion dynamics defaults', () => {
    const config = testConfig((raw) => {
      Object.assign(raw.simulation, { opinion_dynamics: { epsilon: 0.1 } });
    });

    expect(config.opinions).toMatchObject({ epsilon: 0.1, mu: 0.5, theta: 0, coldStart: 'neutral' });
    expect(config.opinions?.groups.neutral).toEqual([0.4, 0.6]);
  });

  it('rejects an inverted opinion group', () => {
    const issues = issuesOf(() =>
      testConfig((raw) => {
        Object.assign(raw.simulation, { opinion_dynamics: { opinion_groups: { odd: [0.6, 0.2] } } });
      })
    );
    expect(issues).toEqual(['simulation.opinion_dynamics.opinion_groups.odd: min must be <= max']);
  });

  it('takes server endpoints and keys from the environment', () => {
    const config = parseConfig(rawConfig(), {
      FEEDSIM_API_URL: 'http://svc.test/',
      FEEDSIM_LLM_URL: 'http://llm.test/v1',
      LLM_API_KEY: 'test-secret',
      ANTHROPIC_API_KEY: 'test-anthropic',
    });
    expect(config.servers).toMatchObject({
      api: 'http://svc.test/',
      llm: 'http://llm.test/v1',
      llmApiKey: 'test-secret',
      anthropicApiKey: 'test-anthropic',
    });
  });
});

describe('heavySlotsFor', () => {
  it('floors accelerators over the unit', () => {
    expect(heavySlotsFor(1, 0.1)).toBe(10);
    expect(heavySlotsFor(2, 0.3)).toBe(6);
    expect(heavySlotsFor(1, 1)).toBe(1);
  });
});

describe('loadConfig', () => {
  it('loads the example config', () => {
    const config = loadConfig('config/config.example.json', {});
    expect(config.name).toBe('local-test');
    expect(config.pages.count).toBe(2);
    expect(config.recruitment).toEqual({ mode: 'percentage', rate: 0.05 });
    expect(config.churn).toEqual({ mode: 'percentage', rate: 0.02 });
    expect(Object.keys(config.hourlyActivity)).toHaveLength(24);
  });

  it('reports a missing file as a ConfigError', () => {
    expect(() => loadConfig('config/does-not-exist.json', {})).toThrow(ConfigError);
  });
});

describe('applyOverrides', () => {
  it('applies command-line values', () => {
    const config = applyOverrides(testConfig(), {
      contentRecsys: 'ReverseChronoFollowers',
      followRecsys: 'jaccard',
      seed: '99',
      days: '3',
      sequential: true,
    });
    expect(config.recsys.content).toBe('reverse_chrono_followers');
    expect(config.recsys.follow).toBe('jaccard');
    expect(config.seed).toBe(99);
    expect(config.days).toBe(3);
    expect(config.resources.parallel).toBe(false);
  });

  it('leaves the config alone without overrides', () => {
    const base = testConfig();
    expect(applyOverrides(base, {})).toEqual(base);
  });

  it('rejects unknown strategies and bad numbers', () => {
    expect(issuesOf(() => applyOverrides(testConfig(), { contentRecsys: 'magic' }))).toEqual([
      '--content-recsys: unknown strategy "magic"',
    ]);
    expect(issuesOf(() => applyOverrides(testConfig(), { days: '-1' }))).toEqual([
      '--days must be an integer >= 0, got "-1"',
    ]);
  });
});
