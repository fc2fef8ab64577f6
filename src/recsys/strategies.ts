/**
 * Recommender strategy names understood by the content service.
 */

export const CONTENT_STRATEGIES = [
  'default',
  'reverse_chrono',
  'reverse_chrono_popularity',
  'reverse_chrono_followers',
  'reverse_chrono_followers_popularity',
  'reverse_chrono_comments',
  'common_interests',
  'common_user_interests',
  'similar_users_react',
  'similar_users_posts',
] as const;

export type ContentStrategy = (typeof CONTENT_STRATEGIES)[number];

export const FOLLOW_STRATEGIES = [
  'random',
  'common_neighbors',
  'jaccard',
  'adamic_adar',
  'preferential_attachment',
] as const;

export type FollowStrategy = (typeof FOLLOW_STRATEGIES)[number];

// CLI-friendly aliases (class-style names) → canonical strategy names
const CONTENT_ALIASES: Record<string, ContentStrategy> = {
  contentrecsys: 'default',
  reversechrono: 'reverse_chrono',
  reversechronopopularity: 'reverse_chrono_popularity',
  reversechronofollowers: 'reverse_chrono_followers',
  reversechronofollowerspopularity: 'reverse_chrono_followers_popularity',
  reversechronocomments: 'reverse_chrono_comments',
  commoninterests: 'common_interests',
  commonuserinterests: 'common_user_interests',
  similarusersreactions: 'similar_users_react',
  similarusersposts: 'similar_users_posts',
};

const FOLLOW_ALIASES: Record<string, FollowStrategy> = {
  followrecsys: 'random',
  commonneighbors: 'common_neighbors',
  adamicadar: 'adamic_adar',
  preferentialattachment: 'preferential_attachment',
};

function normalize(name: string): string {
  return name.trim().toLowerCase().replace(/[-\s]/g, '_');
}

export function parseContentStrategy(name: string): ContentStrategy | undefined {
  const key = normalize(name);
  const direct = CONTENT_STRATEGIES.find((s) => s === key);
  return direct ?? CONTENT_ALIASES[key.replace(/_/g, '')];
}

export function parseFollowStrategy(name: string): FollowStrategy | undefined {
  const key = normalize(name);
  const direct = FOLLOW_STRATEGIES.find((s) => s === key);
  return direct ?? FOLLOW_ALIASES[key.replace(/_/g, '')];
}
