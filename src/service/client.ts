/**
 * Content/graph service client
 *
 * The service owns posts, reactions, follows and the recommendation
 * endpoints. Everything the simulation writes or reads about content goes
 * through `ContentService`; `HttpContentService` is the REST implementation.
 */

import { z } from 'zod';
import type { ActorId, ActorRecord, FollowCandidate, PostId, PostRef, Reaction } from '../types.js';
import { createActorId, createPostId } from '../types.js';
import { ServiceError } from '../errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('ContentService');

// =============================================================================
// TYPES
// =============================================================================

export interface PublishInput {
  actorId: ActorId;
  text: string;
  hashtags: string[];
  mentions: string[];
  emotions: string[];
  slot: number;
}

export interface CommentInput extends PublishInput {
  postId: PostId;
}

export interface ArticleInput extends PublishInput {
  title: string;
  summary: string;
  link: string;
  /** Page publishing the article */
  publisher: string;
  feedUrl: string;
  topics: string[];
}

export interface InterestQuery {
  slot: number;
  count: number;
  /** Slots of history to look back over */
  window: number;
}

export interface ShareInput {
  actorId: ActorId;
  postId: PostId;
  text: string;
  slot: number;
}

/** D / R / U on the wire: left, right, undecided. */
export type Vote = 'left' | 'right' | 'none';

export interface FeedQuery {
  /** Strategy mode as the service names it */
  mode: string;
  limit: number;
  visibilityRounds: number;
  followersRatio?: number;
  articles?: boolean;
}

export interface FollowQuery {
  mode: string;
  neighbors: number;
  leaningBias: number;
}

export interface ContentService {
  reset(signal?: AbortSignal): Promise<void>;
  registerActor(actor: ActorRecord, day: number, signal?: AbortSignal): Promise<void>;
  churnActor(actorId: ActorId, slot: number, signal?: AbortSignal): Promise<void>;

  createPost(input: PublishInput, signal?: AbortSignal): Promise<PostId>;
  publishArticle(input: ArticleInput, signal?: AbortSignal): Promise<PostId>;
  comment(input: CommentInput, signal?: AbortSignal): Promise<PostId>;
  share(input: ShareInput, signal?: AbortSignal): Promise<PostId>;
  react(actorId: ActorId, postId: PostId, reaction: Reaction, slot: number, signal?: AbortSignal): Promise<void>;
  castPreference(actorId: ActorId, postId: PostId, vote: Vote, slot: number, signal?: AbortSignal): Promise<void>;
  follow(actorId: ActorId, targetId: ActorId, slot: number, signal?: AbortSignal): Promise<void>;

  getThread(postId: PostId, signal?: AbortSignal): Promise<PostRef[]>;
  recentInterests(actorId: ActorId, query: InterestQuery, signal?: AbortSignal): Promise<string[]>;
  updateInterests(actorId: ActorId, interests: string[], slot: number, signal?: AbortSignal): Promise<void>;

  read(actorId: ActorId, query: FeedQuery, signal?: AbortSignal): Promise<PostRef[]>;
  search(actorId: ActorId, query: FeedQuery, signal?: AbortSignal): Promise<PostRef[]>;
  readMentions(actorId: ActorId, query: FeedQuery, signal?: AbortSignal): Promise<PostRef[]>;
  followSuggestions(actorId: ActorId, query: FollowQuery, signal?: AbortSignal): Promise<FollowCandidate[]>;
}

// =============================================================================
// WIRE SCHEMAS
// =============================================================================

const idSchema = z.union([z.string(), z.number()]).transform(String);

const PostSchema = z
  .object({
    id: idSchema,
    author_id: idSchema,
    text: z.string().default(''),
    is_article: z.boolean().optional(),
    topics: z.array(z.string()).optional(),
  })
  .transform(
    (p): PostRef => ({
      id: createPostId(p.id),
      authorId: createActorId(p.author_id),
      text: p.text,
      isArticle: p.is_article,
      topics: p.topics,
    })
  );

const PostListSchema = z.array(PostSchema);
const CreatedSchema = z.object({ id: idSchema });
const InterestListSchema = z
  .array(z.union([z.string(), z.object({ topic: z.string() }).transform((i) => i.topic)]))
  .nullable()
  .transform((list) => list ?? []);
// Suggestions arrive as { actorId: score }
const SuggestionSchema = z.record(z.string(), z.number());

const VOTE_CODES: Record<Vote, string> = { left: 'D', right: 'R', none: 'U' };

// =============================================================================
// HTTP IMPLEMENTATION
// =============================================================================

export class HttpContentService implements ContentService {
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly fetchImpl: typeof fetch = fetch
  ) {
    this.baseUrl = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  }

  async reset(signal?: AbortSignal): Promise<void> {
    await this.request('reset', {}, signal);
  }

  async registerActor(actor: ActorRecord, day: number, signal?: AbortSignal): Promise<void> {
    const p = actor.profile;
    await this.request(
      'register',
      {
        user_id: actor.id,
        name: actor.name,
        email: actor.email,
        kind: actor.kind,
        age: p.age,
        gender: p.gender,
        leaning: p.leaning,
        interests: p.interests,
        toxicity: p.toxicity,
        language: p.language,
        education_level: p.education,
        personality: p.personality,
        topic: p.topic,
        feed_url: p.feedUrl,
        model: p.model,
        joined_on: day,
      },
      signal
    );
  }

  async churnActor(actorId: ActorId, slot: number, signal?: AbortSignal): Promise<void> {
    await this.request('churn', { user_id: actorId, left_on: slot }, signal);
  }

  async createPost(input: PublishInput, signal?: AbortSignal): Promise<PostId> {
    const body = await this.request(
      'post',
      {
        user_id: input.actorId,
        tweet: input.text,
        hashtags: input.hashtags,
        mentions: input.mentions,
        emotions: input.emotions,
        tid: input.slot,
      },
      signal
    );
    return createPostId(CreatedSchema.parse(body).id);
  }

  async publishArticle(input: ArticleInput, signal?: AbortSignal): Promise<PostId> {
    const body = await this.request(
      'news',
      {
        user_id: input.actorId,
        tweet: input.text,
        hashtags: input.hashtags,
        mentions: input.mentions,
        emotions: input.emotions,
        tid: input.slot,
        title: input.title,
        summary: input.summary,
        link: input.link,
        publisher: input.publisher,
        rss: input.feedUrl,
        topics: input.topics,
      },
      signal
    );
    return createPostId(CreatedSchema.parse(body).id);
  }

  async comment(input: CommentInput, signal?: AbortSignal): Promise<PostId> {
    const body = await this.request(
      'comment',
      {
        user_id: input.actorId,
        post_id: input.postId,
        text: input.text,
        hashtags: input.hashtags,
        mentions: input.mentions,
        emotions: input.emotions,
        tid: input.slot,
      },
      signal
    );
    return createPostId(CreatedSchema.parse(body).id);
  }

  async share(input: ShareInput, signal?: AbortSignal): Promise<PostId> {
    const body = await this.request(
      'share',
      { user_id: input.actorId, post_id: input.postId, text: input.text, tid: input.slot },
      signal
    );
    return createPostId(CreatedSchema.parse(body).id);
  }

  async react(actorId: ActorId, postId: PostId, reaction: Reaction, slot: number, signal?: AbortSignal): Promise<void> {
    await this.request('reaction', { user_id: actorId, post_id: postId, type: reaction, tid: slot }, signal);
  }

  async castPreference(actorId: ActorId, postId: PostId, vote: Vote, slot: number, signal?: AbortSignal): Promise<void> {
    await this.request(
      'cast_preference',
      { user_id: actorId, post_id: postId, content_type: 'Post', vote: VOTE_CODES[vote], tid: slot },
      signal
    );
  }

  async follow(actorId: ActorId, targetId: ActorId, slot: number, signal?: AbortSignal): Promise<void> {
    await this.request('follow', { user_id: actorId, target: targetId, action: 'follow', tid: slot }, signal);
  }

  async getThread(postId: PostId, signal?: AbortSignal): Promise<PostRef[]> {
    return PostListSchema.parse(await this.request('post_thread', { post_id: postId }, signal));
  }

  async recentInterests(actorId: ActorId, query: InterestQuery, signal?: AbortSignal): Promise<string[]> {
    const body = await this.request(
      'get_user_interests',
      { user_id: actorId, round_id: query.slot, n_interests: query.count, time_window: query.window },
      signal
    );
    return InterestListSchema.parse(body);
  }

  async updateInterests(actorId: ActorId, interests: string[], slot: number, signal?: AbortSignal): Promise<void> {
    await this.request('set_user_interests', { user_id: actorId, interests, round: slot }, signal);
  }

  async read(actorId: ActorId, query: FeedQuery, signal?: AbortSignal): Promise<PostRef[]> {
    return PostListSchema.parse(await this.request('read', { uid: actorId, ...feedParams(query) }, signal));
  }

  async search(actorId: ActorId, query: FeedQuery, signal?: AbortSignal): Promise<PostRef[]> {
    return PostListSchema.parse(await this.request('search', { uid: actorId, ...feedParams(query) }, signal));
  }

  async readMentions(actorId: ActorId, query: FeedQuery, signal?: AbortSignal): Promise<PostRef[]> {
    return PostListSchema.parse(await this.request('read_mentions', { uid: actorId, ...feedParams(query) }, signal));
  }

  async followSuggestions(actorId: ActorId, query: FollowQuery, signal?: AbortSignal): Promise<FollowCandidate[]> {
    const body = await this.request(
      'follow_suggestions',
      {
        user_id: actorId,
        mode: query.mode,
        n_neighbors: query.neighbors,
        leaning_biased: query.leaningBias,
      },
      signal
    );
    return Object.entries(SuggestionSchema.parse(body)).map(([id, score]) => ({
      actorId: createActorId(id),
      score,
    }));
  }

  private async request(endpoint: string, payload: Record<string, unknown>, signal?: AbortSignal): Promise<unknown> {
    const url = `${this.baseUrl}${endpoint}`;
    const response = await this.fetchImpl(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
      signal,
    });

    if (!response.ok) {
      const text = await response.text();
      throw new ServiceError(endpoint, response.status, text);
    }

    const text = await response.text();
    if (text.length === 0) return null;
    try {
      return JSON.parse(text);
    } catch {
      log.debug(`Non-JSON response from ${endpoint}`);
      return text;
    }
  }
}

function feedParams(query: FeedQuery): Record<string, unknown> {
  return {
    mode: query.mode,
    limit: query.limit,
    visibility_rounds: query.visibilityRounds,
    followers_ratio: query.followersRatio,
    articles: query.articles,
  };
}
