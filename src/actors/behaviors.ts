/**
 * Actor Behaviours
 *
 * One handler per action kind. Handlers are free functions over an actor
 * record and an explicit context; they never call back into other actors.
 * A handler may mutate only the state of the actor it was given, and the
 * selector guarantees one action per actor per slot.
 */

import type { ActionKind, ActorRecord, PostId, PostRef, SlotInfo } from '../types.js';
import type { ContentService, Vote } from '../service/client.js';
import type { RecommenderGateway } from '../recsys/gateway.js';
import type { LanguageBackend } from '../models/router.js';
import type { FollowGraph } from '../simulation/graph.js';
import type { ActionOutcome } from '../simulation/dispatcher.js';
import type { NewsSource } from '../news/feeds.js';
import { adoptOpinions, type OpinionView } from '../simulation/opinions.js';
import { LanguageBackendError } from '../errors.js';
import { pick, weightedChoice, type Rng } from '../utils/random.js';
import { cleanEmotions, cleanText, extractComponents, firstKeyword } from './text.js';
import {
  castPrompt,
  commentPrompt,
  emotionPrompt,
  newsPrompt,
  postPrompt,
  reactPrompt,
  replyPrompt,
  roleplayPrompt,
  sharePrompt,
} from './prompts.js';

const RECENTLY_SEEN_LIMIT = 100;
const RECENT_INTERESTS = 2;

export interface BehaviorSettings {
  maxThreadLength: number;
  /** Emotion labels to annotate generated text with; empty disables annotation */
  emotions: readonly string[];
  /** Slots of history used to find a user's recent interests */
  attentionWindow: number;
}

export interface ActionContext {
  slot: SlotInfo;
  signal: AbortSignal;
  /** Stream derived from (seed, slot, actor) */
  rng: Rng;
  service: ContentService;
  recommender: RecommenderGateway;
  backend: LanguageBackend;
  graph: FollowGraph;
  news: NewsSource;
  /** Present when opinion dynamics are on */
  opinions?: OpinionView;
  settings: BehaviorSettings;
}

type Behavior = (actor: ActorRecord, ctx: ActionContext) => Promise<ActionOutcome>;

// =============================================================================
// HELPERS
// =============================================================================

async function generate(actor: ActorRecord, ctx: ActionContext, prompt: string, purpose: ActionKind | 'emotions'): Promise<string> {
  const result = await ctx.backend.complete(
    { model: actor.profile.model, system: roleplayPrompt(actor, ctx.opinions?.dynamics.groups), prompt, purpose },
    ctx.signal
  );
  return result.text;
}

async function generateContent(actor: ActorRecord, ctx: ActionContext, prompt: string, purpose: ActionKind): Promise<string> {
  const text = cleanText(await generate(actor, ctx, prompt, purpose), actor.name);
  if (text.length === 0) {
    throw new LanguageBackendError(`Empty ${purpose} generated for ${actor.id}`);
  }
  return text;
}

async function annotateEmotions(actor: ActorRecord, ctx: ActionContext, text: string): Promise<string[]> {
  if (ctx.settings.emotions.length === 0) return [];
  const answer = await generate(actor, ctx, emotionPrompt(text, ctx.settings.emotions), 'emotions');
  return cleanEmotions(answer, ctx.settings.emotions);
}

function rememberSeen(actor: ActorRecord, posts: readonly PostRef[]): void {
  const seen = actor.state.recentlySeen;
  for (const post of posts) {
    if (!seen.includes(post.id)) seen.push(post.id);
  }
  if (seen.length > RECENTLY_SEEN_LIMIT) {
    seen.splice(0, seen.length - RECENTLY_SEEN_LIMIT);
  }
}

/** Prefer posts the actor has not seen yet. */
function pickPost(actor: ActorRecord, posts: readonly PostRef[], rng: Rng): PostRef | undefined {
  const others = posts.filter((p) => p.authorId !== actor.id);
  const fresh = others.filter((p) => !actor.state.recentlySeen.includes(p.id));
  return pick(rng, fresh.length > 0 ? fresh : others);
}

function updateOpinions(actor: ActorRecord, ctx: ActionContext, posts: readonly PostRef[]): void {
  if (ctx.opinions) adoptOpinions(actor, posts, ctx.opinions);
}

/** Topics the user engaged with lately, falling back to the profile's interests. */
async function currentInterests(actor: ActorRecord, ctx: ActionContext): Promise<readonly string[]> {
  const recent = await ctx.service.recentInterests(
    actor.id,
    { slot: ctx.slot.slot, count: RECENT_INTERESTS, window: ctx.settings.attentionWindow },
    ctx.signal
  );
  return recent.length > 0 ? recent : actor.profile.interests;
}

/**
 * Publish an article from the page's feed. Pages without fresh articles
 * publish nothing.
 */
async function publishNews(actor: ActorRecord, ctx: ActionContext, feedUrl: string, purpose: 'post' | 'share'): Promise<ActionOutcome> {
  const articles = await ctx.news.articles(feedUrl, ctx.slot.day, ctx.signal);
  const article = pick(ctx.rng, articles);
  if (!article) return { detail: 'no news available' };

  const text = await generateContent(actor, ctx, newsPrompt(article), purpose);
  const id = await ctx.service.publishArticle(
    {
      actorId: actor.id,
      text,
      hashtags: extractComponents(text, 'hashtags'),
      mentions: extractComponents(text, 'mentions'),
      emotions: await annotateEmotions(actor, ctx, text),
      slot: ctx.slot.slot,
      title: article.title,
      summary: article.summary,
      link: article.link,
      publisher: actor.name,
      feedUrl,
      topics: actor.profile.topic ? [actor.profile.topic] : [],
    },
    ctx.signal
  );
  actor.state.postsPublished++;
  return { detail: id };
}

async function readThread(ctx: ActionContext, postId: PostId): Promise<PostRef[]> {
  const thread = await ctx.service.getThread(postId, ctx.signal);
  return thread.slice(-ctx.settings.maxThreadLength);
}

// =============================================================================
// HEAVY ACTIONS
// =============================================================================

const post: Behavior = async (actor, ctx) => {
  if (actor.kind === 'page' && actor.profile.feedUrl) {
    return publishNews(actor, ctx, actor.profile.feedUrl, 'post');
  }
  const topic = actor.kind === 'page'
    ? actor.profile.topic ?? 'current events'
    : pick(ctx.rng, await currentInterests(actor, ctx)) ?? 'your day';
  const text = await generateContent(actor, ctx, postPrompt(topic), 'post');
  const emotions = await annotateEmotions(actor, ctx, text);

  const id = await ctx.service.createPost(
    {
      actorId: actor.id,
      text,
      hashtags: extractComponents(text, 'hashtags'),
      mentions: extractComponents(text, 'mentions'),
      emotions,
      slot: ctx.slot.slot,
    },
    ctx.signal
  );
  actor.state.postsPublished++;
  return { detail: id };
};

const comment: Behavior = async (actor, ctx) => {
  const feed = await ctx.recommender.readFeed(actor, { signal: ctx.signal });
  const target = pickPost(actor, feed, ctx.rng);
  if (!target) return { detail: 'empty feed' };

  const thread = await readThread(ctx, target.id);
  const text = await generateContent(actor, ctx, commentPrompt(thread.length > 0 ? thread : [target]), 'comment');
  const emotions = await annotateEmotions(actor, ctx, text);

  const id = await ctx.service.comment(
    {
      actorId: actor.id,
      postId: target.id,
      text,
      hashtags: extractComponents(text, 'hashtags'),
      mentions: extractComponents(text, 'mentions'),
      emotions,
      slot: ctx.slot.slot,
    },
    ctx.signal
  );
  rememberSeen(actor, [target]);
  updateOpinions(actor, ctx, [target]);
  return { detail: id };
};

const reply: Behavior = async (actor, ctx) => {
  const mention = actor.state.pendingMentions[0];
  if (mention === undefined) return { detail: 'no pending mentions' };

  const thread = await readThread(ctx, mention);
  const text = await generateContent(actor, ctx, replyPrompt(thread), 'reply');
  const id = await ctx.service.comment(
    {
      actorId: actor.id,
      postId: mention,
      text,
      hashtags: extractComponents(text, 'hashtags'),
      mentions: extractComponents(text, 'mentions'),
      emotions: await annotateEmotions(actor, ctx, text),
      slot: ctx.slot.slot,
    },
    ctx.signal
  );
  actor.state.pendingMentions = actor.state.pendingMentions.filter((m) => m !== mention);
  return { detail: id };
};

const share: Behavior = async (actor, ctx) => {
  if (actor.kind === 'page' && actor.profile.feedUrl) {
    return publishNews(actor, ctx, actor.profile.feedUrl, 'share');
  }
  const feed = await ctx.recommender.readFeed(actor, { articles: true, signal: ctx.signal });
  const articles = feed.filter((p) => p.isArticle);
  const target = pickPost(actor, articles.length > 0 ? articles : feed, ctx.rng);
  if (!target) return { detail: 'nothing to share' };

  const text = await generateContent(actor, ctx, sharePrompt(target), 'share');
  const id = await ctx.service.share(
    { actorId: actor.id, postId: target.id, text, slot: ctx.slot.slot },
    ctx.signal
  );
  rememberSeen(actor, [target]);
  return { detail: id };
};

const react: Behavior = async (actor, ctx) => {
  const feed = await ctx.recommender.readFeed(actor, { signal: ctx.signal });
  const target = pickPost(actor, feed, ctx.rng);
  if (!target) return { detail: 'empty feed' };

  const answer = await generate(actor, ctx, reactPrompt(target), 'react');
  const choice = firstKeyword(answer, ['DISLIKE', 'LIKE', 'NONE'] as const);
  rememberSeen(actor, [target]);
  if (choice === 'LIKE' || choice === 'DISLIKE') {
    const reaction = choice === 'LIKE' ? 'like' : 'dislike';
    await ctx.service.react(actor.id, target.id, reaction, ctx.slot.slot, ctx.signal);
    return { detail: `${reaction} ${target.id}` };
  }
  return { detail: `no reaction to ${target.id}` };
};

const VOTES: Record<'LEFT' | 'RIGHT' | 'NONE', Vote> = { LEFT: 'left', RIGHT: 'right', NONE: 'none' };

const cast: Behavior = async (actor, ctx) => {
  const feed = await ctx.recommender.readFeed(actor, { signal: ctx.signal });
  const target = pickPost(actor, feed, ctx.rng);
  if (!target) return { detail: 'empty feed' };

  const answer = await generate(actor, ctx, castPrompt(target), 'cast');
  const choice = firstKeyword(answer, ['LEFT', 'RIGHT', 'NONE'] as const);
  if (choice === undefined) {
    throw new LanguageBackendError(`Unrecognised vote from ${actor.profile.model}: ${answer.slice(0, 80)}`);
  }
  await ctx.service.castPreference(actor.id, target.id, VOTES[choice], ctx.slot.slot, ctx.signal);
  actor.state.lastCastDay = ctx.slot.day;
  return { detail: `${VOTES[choice]} on ${target.id}` };
};

// =============================================================================
// LIGHT ACTIONS
// =============================================================================

const read: Behavior = async (actor, ctx) => {
  const feed = await ctx.recommender.readFeed(actor, { signal: ctx.signal });
  const mentions = await ctx.recommender.readMentions(actor, ctx.signal);

  rememberSeen(actor, feed);
  updateOpinions(actor, ctx, feed);
  for (const m of mentions) {
    if (m.authorId !== actor.id && !actor.state.pendingMentions.includes(m.id)) {
      actor.state.pendingMentions.push(m.id);
    }
  }

  const topics = [...new Set(feed.flatMap((p) => p.topics ?? []))];
  if (topics.length > 0) {
    await ctx.service.updateInterests(actor.id, topics, ctx.slot.slot, ctx.signal);
  }
  return { detail: `${feed.length} posts, ${mentions.length} mentions` };
};

const search: Behavior = async (actor, ctx) => {
  const results = await ctx.recommender.search(actor, ctx.signal);
  rememberSeen(actor, results);
  return { detail: `${results.length} results` };
};

const follow: Behavior = async (actor, ctx) => {
  const candidates = (await ctx.recommender.followSuggestions(actor, ctx.signal)).filter(
    (c) => !ctx.graph.has(actor.id, c.actorId)
  );
  if (candidates.length === 0) return { detail: 'no suggestions' };

  const chosen =
    weightedChoice(ctx.rng, candidates.map((c) => [c.actorId, c.score] as const)) ??
    pick(ctx.rng, candidates)?.actorId;
  if (chosen === undefined) return { detail: 'no suggestions' };

  await ctx.service.follow(actor.id, chosen, ctx.slot.slot, ctx.signal);
  ctx.graph.add(actor.id, chosen);
  return { detail: chosen };
};

// =============================================================================
// DISPATCH TABLE
// =============================================================================

export const BEHAVIORS: Record<ActionKind, Behavior> = {
  post,
  comment,
  reply,
  share,
  react,
  cast,
  read,
  search,
  follow,
};

export function performAction(kind: ActionKind, actor: ActorRecord, ctx: ActionContext): Promise<ActionOutcome> {
  return BEHAVIORS[kind](actor, ctx);
}
