/**
 * Prompt builders for actor behaviours.
 */

import type { ActorRecord, PostRef } from '../types.js';
import type { Article } from '../news/feeds.js';
import type { OpinionDynamics } from '../config/schema.js';
import { describeOpinions } from '../simulation/opinions.js';

function describePersonality(actor: ActorRecord): string {
  const p = actor.profile.personality;
  if (!p) return '';
  return `Your personality: ${p.openness}, ${p.conscientiousness}, ${p.extraversion}, ${p.agreeableness}, ${p.neuroticism}.`;
}

/**
 * System prompt that puts the model in the actor's shoes. With opinion
 * groups, a user's current opinions are described too.
 */
export function roleplayPrompt(actor: ActorRecord, opinionGroups?: OpinionDynamics['groups']): string {
  const p = actor.profile;
  if (actor.kind === 'page') {
    return [
      `You are ${actor.name}, a news page on a social network publishing about ${p.topic ?? 'current events'}.`,
      `Write in ${p.language ?? 'English'}. Be factual and concise.`,
    ].join('\n');
  }

  const lines = [
    `You are ${actor.name}, a user of a social network.`,
    p.age !== undefined ? `You are ${p.age} years old${p.gender ? ` (${p.gender})` : ''}.` : '',
    p.education ? `Education: ${p.education}.` : '',
    p.leaning ? `Political leaning: ${p.leaning}.` : '',
    p.interests.length > 0 ? `You are interested in ${p.interests.join(', ')}.` : '',
    describePersonality(actor),
    opinionGroups ? describeOpinions(actor.state.opinions, opinionGroups) : '',
    p.toxicity && p.toxicity !== 'no' ? `Your toxicity level is ${p.toxicity}.` : '',
    `Write in ${p.language ?? 'English'}. Keep it short, like a real social media user.`,
  ];
  return lines.filter((l) => l.length > 0).join('\n');
}

function formatThread(thread: readonly PostRef[]): string {
  return thread.map((post, i) => `${i + 1}. [${post.authorId}] ${post.text}`).join('\n');
}

export function postPrompt(topic: string): string {
  return `Write a social media post about ${topic}. You may use hashtags. Reply with the post text only.`;
}

export function newsPrompt(article: Article): string {
  const lines = [`Share this news article with your followers:`, `Title: ${article.title}`];
  if (article.summary) lines.push(`Summary: ${article.summary}`);
  lines.push('', `Write a short post presenting it. You may use hashtags. Reply with the post text only.`);
  return lines.join('\n');
}

export function commentPrompt(thread: readonly PostRef[]): string {
  return [
    `Here is a conversation thread:`,
    formatThread(thread),
    ``,
    `Write a comment continuing the conversation. Reply with the comment text only.`,
  ].join('\n');
}

export function replyPrompt(thread: readonly PostRef[]): string {
  return [
    `You were mentioned in this thread:`,
    formatThread(thread),
    ``,
    `Reply to the last message addressed to you. Reply with the text only.`,
  ].join('\n');
}

export function sharePrompt(post: PostRef): string {
  return [
    `You are sharing this article with your followers:`,
    post.text,
    ``,
    `Write a one or two sentence commentary to go with it. Reply with the text only.`,
  ].join('\n');
}

export function reactPrompt(post: PostRef): string {
  return [
    `You read this post:`,
    post.text,
    ``,
    `Do you react to it? Answer with exactly one word: LIKE, DISLIKE or NONE.`,
  ].join('\n');
}

export function castPrompt(post: PostRef): string {
  return [
    `You read this post about the election:`,
    post.text,
    ``,
    `Which side would you vote for after reading it? Answer with exactly one word: LEFT, RIGHT or NONE.`,
  ].join('\n');
}

export function emotionPrompt(text: string, emotions: readonly string[]): string {
  return [
    `Which of these emotions does the following text express: ${emotions.join(', ')}?`,
    `Text: ${text}`,
    `Answer with a comma-separated list of emotions from the list, or NONE.`,
  ].join('\n');
}
