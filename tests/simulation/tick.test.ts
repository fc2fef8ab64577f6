/**
 * Simulation Loop Tests
 */

import { describe, it, expect } from 'vitest';
import { runSimulation, type SimulationResult } from '../../src/simulation/tick.js';
import type { SimulationConfig } from '../../src/config/schema.js';
import type { DayReport, SlotReport } from '../../src/types.js';
import { FakeBackend, FakeContentService, FakeNewsSource, testConfig } from '../helpers/fakes.js';

function twoDayConfig(parallel = true): SimulationConfig {
  return testConfig((raw) => {
    raw.simulation.days = 2;
    Object.assign(raw.simulation, {
      percentage_removed_agents_iteration: 0.2,
      new_agents_iteration: 1,
    });
    Object.assign(raw, { agents: { probability_of_daily_follow: 1 } });
    raw.pages.count = 1;
    raw.resources.parallel = parallel;
  });
}

async function run(config: SimulationConfig, service = new FakeContentService()): Promise<SimulationResult> {
  return runSimulation({ config, service, backend: new FakeBackend() });
}

describe('runSimulation', () => {
  it('runs every slot and evolves the population at each day boundary', async () => {
    const service = new FakeContentService();
    const result = await run(twoDayConfig(), service);

    expect(result.slots.map((s) => s.slot)).toEqual([
      { slot: 0, day: 0, hour: 0 },
      { slot: 1, day: 0, hour: 1 },
      { slot: 2, day: 0, hour: 2 },
      { slot: 3, day: 0, hour: 3 },
      { slot: 4, day: 1, hour: 0 },
      { slot: 5, day: 1, hour: 1 },
      { slot: 6, day: 1, hour: 2 },
      { slot: 7, day: 1, hour: 3 },
    ]);
    expect(result.days.map((d) => [d.day, d.populationBefore, d.churned.length, d.recruited.length, d.populationAfter])).toEqual([
      [0, 11, 2, 1, 10],
      [1, 10, 1, 1, 10],
    ]);
    expect(result.days.map((d) => d.followEvaluations.length)).toEqual([10, 9]);
    expect(result.issuedIds).toBe(13);
    expect(result.nextSlot).toBe(8);
    expect(result.registry.size).toBe(13);
    expect(result.registry.live()).toHaveLength(10);

    // 10 users + 1 page at start, then one recruit per day
    expect(service.registered).toHaveLength(13);
    expect(service.churned).toHaveLength(3);
    expect(service.calls).not.toContain('reset');
  });

  it('only samples live actors', async () => {
    const result = await run(twoDayConfig());
    const day1 = result.slots.filter((s) => s.slot.day === 1);

    expect(day1.every((s) => s.livePopulation === 10)).toBe(true);
    const churnedOnDay0 = new Set<string>(result.days[0].churned);
    const actedOnDay1 = day1.flatMap((s) => s.results.map((r): string => r.actorId));
    expect(actedOnDay1.filter((id) => churnedOnDay0.has(id))).toEqual([]);
  });

  it('reports every slot and day to the callbacks', async () => {
    const slotReports: SlotReport[] = [];
    const dayReports: DayReport[] = [];

    const result = await runSimulation(
      { config: twoDayConfig(), service: new FakeContentService(), backend: new FakeBackend() },
      {
        onSlot: (report) => {
          slotReports.push(report);
        },
        onDay: async (report) => {
          dayReports.push(report);
        },
      }
    );

    expect(slotReports).toEqual(result.slots);
    expect(dayReports).toEqual(result.days);
    expect(result.summary.slots).toBe(8);
    expect(result.summary.days).toBe(2);
  });

  it('produces the same actions in parallel and sequential mode', async () => {
    const outline = (r: SimulationResult) =>
      r.slots.flatMap((s) => s.results.map((a) => `${s.slot.slot}:${a.actorId}:${a.kind}:${a.status}`));

    const parallel = await run(twoDayConfig(true));
    const sequential = await run(twoDayConfig(false));

    expect(outline(sequential)).toEqual(outline(parallel));
    expect(outline(parallel).length).toBeGreaterThan(0);
  });

  it('does nothing for a zero-day run', async () => {
    const config = testConfig((raw) => {
      raw.simulation.days = 0;
    });
    const result = await run(config);

    expect(result.slots).toEqual([]);
    expect(result.days).toEqual([]);
    expect(result.registry.size).toBe(10);
  });

  it('continues from a restored population', async () => {
    const first = await run(twoDayConfig());
    const liveIds = first.registry.live().map((a) => a.id);
    const earlier = new Set<string>(first.registry.all().map((a) => a.id));
    const service = new FakeContentService();

    const second = await runSimulation(
      { config: twoDayConfig(), service, backend: new FakeBackend() },
      {
        population: {
          actors: first.registry.all(),
          edges: [...first.graph.edges()],
          issuedIds: first.issuedIds,
          nextSlot: first.nextSlot,
        },
        resetService: true,
      }
    );

    expect(service.calls[0]).toBe('reset');
    // The 10 live actors are re-registered, then one recruit per day
    expect(service.registered.slice(0, 10)).toEqual(liveIds);
    expect(second.days[0].populationBefore).toBe(10);
    expect(second.issuedIds).toBe(15);

    // The clock carries on after the first run's last slot (7)
    expect(second.slots[0].slot).toEqual({ slot: 8, day: 2, hour: 0 });
    expect(second.slots.map((s) => s.slot.slot)).toEqual([8, 9, 10, 11, 12, 13, 14, 15]);
    expect(second.days.map((d) => d.day)).toEqual([2, 3]);
    expect(second.nextSlot).toBe(16);

    const recruits = second.days.flatMap((d) => d.recruited);
    expect(recruits).toHaveLength(2);
    expect(recruits.filter((id) => earlier.has(id))).toEqual([]);
  });

  it('keeps end-of-day follows apart from the last slot\'s actions', async () => {
    const config = testConfig((raw) => {
      raw.simulation.hourly_activity = { '3': 1 };
      raw.simulation.actions_likelihood = { read: 1 };
      Object.assign(raw, { agents: { probability_of_daily_follow: 1 } });
    });

    const result = await run(config);

    const inSlot = result.slots.flatMap((s) => s.results);
    const follows = result.days[0].followEvaluations;
    expect(inSlot.map((r) => [r.slot, r.kind, r.phase])).toEqual(Array.from({ length: 10 }, () => [3, 'read', 'slot']));
    expect(follows.map((r) => [r.slot, r.kind, r.phase])).toEqual(
      Array.from({ length: 10 }, () => [3, 'follow', 'day-boundary'])
    );

    const slotKeys = inSlot.map((r) => `${r.actorId}:${r.slot}`);
    expect(new Set(slotKeys).size).toBe(10);
    const allKeys = [...inSlot, ...follows].map((r) => `${r.actorId}:${r.slot}:${r.phase}`);
    expect(new Set(allKeys).size).toBe(20);
    // A follow at the boundary is not slot activity
    expect(result.registry.liveUsers().every((a) => a.state.lastActiveSlot === 3)).toBe(true);
  });

  it('sends the configured follower ratio with follower-aware feeds', async () => {
    const service = new FakeContentService();
    const config = testConfig((raw) => {
      raw.simulation.hourly_activity = { '0': 1 };
      raw.simulation.actions_likelihood = { read: 1 };
      Object.assign(raw, {
        agents: { reading_from_follower_ratio: 0.25 },
        recsys: { content: 'reverse_chrono_followers' },
      });
    });

    await run(config, service);

    // A feed and a mentions query per reader
    expect(service.feedQueries).toHaveLength(20);
    expect(service.feedQueries.every((q) => q.followersRatio === 0.25)).toBe(true);
  });

  it('creates one page per configured feed and publishes its articles', async () => {
    const service = new FakeContentService();
    const news = new FakeNewsSource({
      'https://news.test/rss': [{ title: 'Rates rise', summary: '', link: 'https://news.test/a1' }],
    });
    const config = testConfig((raw) => {
      raw.simulation.starting_agents = 0;
      raw.simulation.hourly_activity = { '0': 1 };
      Object.assign(raw.pages, {
        feeds: [{ name: 'EconomyWire', topic: 'economy', feed_url: 'https://news.test/rss' }],
      });
    });

    const result = await runSimulation({ config, service, backend: new FakeBackend(), news });

    const [page] = result.registry.all();
    expect(result.registry.size).toBe(1);
    expect(page.profile).toMatchObject({ topic: 'economy', feedUrl: 'https://news.test/rss' });
    expect(service.articles.map((a) => [a.publisher, a.link, a.slot])).toEqual([['EconomyWire', 'https://news.test/a1', 0]]);
    expect(news.requests).toEqual([{ feedUrl: 'https://news.test/rss', day: 0 }]);
  });

  it('seeds an opinion per interest when opinion dynamics are on', async () => {
    const config = testConfig((raw) => {
      raw.simulation.days = 0;
      Object.assign(raw.simulation, { opinion_dynamics: {} });
    });

    const result = await run(config);

    for (const actor of result.registry.all()) {
      expect(Object.keys(actor.state.opinions)).toEqual(actor.profile.interests);
    }
  });
});
