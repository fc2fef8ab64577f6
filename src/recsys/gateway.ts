/**
 * Recommender gateway
 *
 * Actors ask the gateway for feeds and follow suggestions; the gateway turns
 * the configured strategy into the service's mode parameters. Scores are the
 * service's business, not ours.
 */

import type { ActorId, ActorRecord, FollowCandidate, PostRef } from '../types.js';
import type { ContentService, FeedQuery, FollowQuery } from '../service/client.js';
import type { ContentStrategy, FollowStrategy } from './strategies.js';

export interface RecommenderGateway {
  readFeed(actor: ActorRecord, options?: { articles?: boolean; signal?: AbortSignal }): Promise<PostRef[]>;
  search(actor: ActorRecord, signal?: AbortSignal): Promise<PostRef[]>;
  readMentions(actor: ActorRecord, signal?: AbortSignal): Promise<PostRef[]>;
  followSuggestions(actor: ActorRecord, signal?: AbortSignal): Promise<FollowCandidate[]>;
}

export interface GatewayOptions {
  content: ContentStrategy;
  follow: FollowStrategy;
  feedSize: number;
  visibilityRounds: number;
  neighbors: number;
  leaningBias: number;
  /** Share of the feed drawn from followed accounts; only sent for follower-aware modes */
  followersRatio: number;
}

// The service names some modes differently from the strategy names
const CONTENT_MODES: Record<ContentStrategy, string> = {
  default: 'default',
  reverse_chrono: 'rchrono',
  reverse_chrono_popularity: 'rchrono_popularity',
  reverse_chrono_followers: 'rchrono_followers',
  reverse_chrono_followers_popularity: 'rchrono_followers_popularity',
  reverse_chrono_comments: 'rchrono_comments',
  common_interests: 'common_interests',
  common_user_interests: 'common_user_interests',
  similar_users_react: 'similar_users',
  similar_users_posts: 'similar_users_posts',
};

const FOLLOWER_AWARE: ReadonlySet<ContentStrategy> = new Set([
  'reverse_chrono_followers',
  'reverse_chrono_followers_popularity',
  'reverse_chrono_comments',
  'common_interests',
  'common_user_interests',
  'similar_users_react',
  'similar_users_posts',
]);

export function contentModeFor(strategy: ContentStrategy): string {
  return CONTENT_MODES[strategy];
}

export class ServiceRecommenderGateway implements RecommenderGateway {
  constructor(
    private readonly service: ContentService,
    private readonly options: GatewayOptions,
    /** Whether an actor id belongs to the live population */
    private readonly isLive: (id: ActorId) => boolean
  ) {}

  readFeed(actor: ActorRecord, options: { articles?: boolean; signal?: AbortSignal } = {}): Promise<PostRef[]> {
    return this.service.read(actor.id, this.feedQuery(options.articles), options.signal);
  }

  search(actor: ActorRecord, signal?: AbortSignal): Promise<PostRef[]> {
    return this.service.search(actor.id, this.feedQuery(), signal);
  }

  readMentions(actor: ActorRecord, signal?: AbortSignal): Promise<PostRef[]> {
    return this.service.readMentions(actor.id, this.feedQuery(), signal);
  }

  async followSuggestions(actor: ActorRecord, signal?: AbortSignal): Promise<FollowCandidate[]> {
    const query: FollowQuery = {
      mode: this.options.follow,
      neighbors: this.options.neighbors,
      leaningBias: this.options.leaningBias,
    };
    const candidates = await this.service.followSuggestions(actor.id, query, signal);
    return candidates.filter((c) => c.actorId !== actor.id && this.isLive(c.actorId));
  }

  private feedQuery(articles?: boolean): FeedQuery {
    const strategy = this.options.content;
    return {
      mode: CONTENT_MODES[strategy],
      limit: this.options.feedSize,
      visibilityRounds: this.options.visibilityRounds,
      followersRatio: FOLLOWER_AWARE.has(strategy) ? this.options.followersRatio : undefined,
      articles: articles || undefined,
    };
  }
}
