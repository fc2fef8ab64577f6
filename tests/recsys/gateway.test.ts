/**
 * Recommender Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ServiceRecommenderGateway, contentModeFor, type GatewayOptions } from '../../src/recsys/gateway.js';
import { parseContentStrategy, parseFollowStrategy } from '../../src/recsys/strategies.js';
import { createActorId } from '../../src/types.js';
import { FakeContentService, makeActor } from '../helpers/fakes.js';

describe('strategy names', () => {
  it('accepts canonical, dashed and class-style names', () => {
    expect(parseContentStrategy('reverse-chrono')).toBe('reverse_chrono');
    expect(parseContentStrategy('SimilarUsersReactions')).toBe('similar_users_react');
    expect(parseContentStrategy('ContentRecSys')).toBe('default');
    expect(parseFollowStrategy('Adamic-Adar')).toBe('adamic_adar');
    expect(parseFollowStrategy('PreferentialAttachment')).toBe('preferential_attachment');
  });

  it('returns undefined for unknown names', () => {
    expect(parseContentStrategy('nope')).toBeUndefined();
    expect(parseFollowStrategy('nope')).toBeUndefined();
  });

  it('maps strategies to service modes', () => {
    expect(contentModeFor('reverse_chrono')).toBe('rchrono');
    expect(contentModeFor('similar_users_react')).toBe('similar_users');
    expect(contentModeFor('common_interests')).toBe('common_interests');
  });
});

describe('ServiceRecommenderGateway', () => {
  let service: FakeContentService;
  const base: GatewayOptions = {
    content: 'reverse_chrono',
    follow: 'jaccard',
    feedSize: 10,
    visibilityRounds: 36,
    neighbors: 5,
    leaningBias: 1,
    followersRatio: 0.6,
  };

  beforeEach(() => {
    service = new FakeContentService();
  });

  it('sends the content mode with the feed query', async () => {
    const gateway = new ServiceRecommenderGateway(service, base, () => true);
    await gateway.readFeed(makeActor('a'));

    expect(service.feedQueries).toEqual([{ mode: 'rchrono', limit: 10, visibilityRounds: 36 }]);
  });

  it('adds the configured followers ratio for follower-aware strategies', async () => {
    const gateway = new ServiceRecommenderGateway(
      service,
      { ...base, content: 'reverse_chrono_followers', followersRatio: 0.3 },
      () => true
    );
    await gateway.readFeed(makeActor('a'), { articles: true });

    expect(service.feedQueries[0]).toEqual({
      mode: 'rchrono_followers',
      limit: 10,
      visibilityRounds: 36,
      followersRatio: 0.3,
      articles: true,
    });
  });

  it('filters follow suggestions to live actors other than the requester', async () => {
    const live = new Set(['a', 'b']);
    service.suggestions = [
      { actorId: createActorId('a'), score: 5 },
      { actorId: createActorId('b'), score: 2 },
      { actorId: createActorId('gone'), score: 9 },
    ];
    const gateway = new ServiceRecommenderGateway(service, base, (id) => live.has(id));

    const suggestions = await gateway.followSuggestions(makeActor('a'));

    expect(suggestions).toEqual([{ actorId: 'b', score: 2 }]);
    expect(service.followQueries).toEqual([{ mode: 'jaccard', neighbors: 5, leaningBias: 1 }]);
  });
});
