/**
 * Directed follow graph: an edge a → b means a follows b.
 */

import type { ActorId } from '../types.js';

export interface FollowEdge {
  follower: ActorId;
  followee: ActorId;
}

export class FollowGraph {
  private readonly out = new Map<ActorId, Set<ActorId>>();
  private readonly in = new Map<ActorId, Set<ActorId>>();
  private edgeCount = 0;

  constructor(edges: Iterable<FollowEdge> = []) {
    for (const e of edges) this.add(e.follower, e.followee);
  }

  /** Returns false when the edge already existed. Self-follows are rejected. */
  add(follower: ActorId, followee: ActorId): boolean {
    if (follower === followee) return false;
    const followees = this.out.get(follower) ?? new Set<ActorId>();
    if (followees.has(followee)) return false;

    followees.add(followee);
    this.out.set(follower, followees);
    const followers = this.in.get(followee) ?? new Set<ActorId>();
    followers.add(follower);
    this.in.set(followee, followers);
    this.edgeCount++;
    return true;
  }

  remove(follower: ActorId, followee: ActorId): boolean {
    const followees = this.out.get(follower);
    if (!followees?.delete(followee)) return false;
    this.in.get(followee)?.delete(follower);
    this.edgeCount--;
    return true;
  }

  has(follower: ActorId, followee: ActorId): boolean {
    return this.out.get(follower)?.has(followee) ?? false;
  }

  followeesOf(actor: ActorId): ActorId[] {
    return [...(this.out.get(actor) ?? [])];
  }

  followersOf(actor: ActorId): ActorId[] {
    return [...(this.in.get(actor) ?? [])];
  }

  /** Drop every edge touching `actor`; returns how many were removed. */
  removeActor(actor: ActorId): number {
    let removed = 0;
    for (const followee of this.followeesOf(actor)) {
      if (this.remove(actor, followee)) removed++;
    }
    for (const follower of this.followersOf(actor)) {
      if (this.remove(follower, actor)) removed++;
    }
    this.out.delete(actor);
    this.in.delete(actor);
    return removed;
  }

  get size(): number {
    return this.edgeCount;
  }

  *edges(): IterableIterator<FollowEdge> {
    for (const [follower, followees] of this.out) {
      for (const followee of followees) yield { follower, followee };
    }
  }
}
