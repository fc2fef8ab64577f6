/**
 * Population Snapshot Tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  loadPopulationSnapshot,
  parsePopulationSnapshot,
  savePopulationSnapshot,
  toSnapshot,
} from '../../src/storage/snapshot.js';
import { createActorId } from '../../src/types.js';
import { makeActor } from '../helpers/fakes.js';

const a = makeActor('a');
const b = makeActor('b', { lifecycle: 'churned', churnedDay: 1, maxDailyActions: 3 });

function document(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    version: 1,
    seed: 9,
    issuedIds: 2,
    nextSlot: 48,
    actors: [a, b],
    edges: [{ follower: 'a', followee: 'b' }],
    ...overrides,
  };
}

describe('population snapshots', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('parses a valid document', () => {
    const snapshot = parsePopulationSnapshot(document());

    expect(snapshot.seed).toBe(9);
    expect(snapshot.issuedIds).toBe(2);
    expect(snapshot.nextSlot).toBe(48);
    expect(snapshot.actors).toEqual([a, b]);
    expect(snapshot.edges).toEqual([{ follower: 'a', followee: 'b' }]);
  });

  it('starts the clock at slot 0 for a document without one', () => {
    const { nextSlot: _omitted, ...legacy } = document();
    expect(parsePopulationSnapshot(legacy).nextSlot).toBe(0);
  });

  it('rejects duplicate actor ids', () => {
    expect(() => parsePopulationSnapshot(document({ actors: [a, a] }))).toThrow(
      'Population snapshot contains duplicate actor ids'
    );
  });

  it('rejects an id counter below the actor count', () => {
    expect(() => parsePopulationSnapshot(document({ issuedIds: 1 }))).toThrow(
      'Population snapshot issuedIds (1) is below its actor count'
    );
  });

  it('drops edges that name unknown actors', () => {
    const snapshot = parsePopulationSnapshot(
      document({
        edges: [
          { follower: 'a', followee: 'b' },
          { follower: 'a', followee: 'ghost' },
        ],
      })
    );
    expect(snapshot.edges).toEqual([{ follower: 'a', followee: 'b' }]);
  });

  it('rejects an unknown version', () => {
    expect(() => parsePopulationSnapshot(document({ version: 2 }))).toThrow();
  });

  it('writes and reads back a snapshot file', () => {
    dir = mkdtempSync(join(tmpdir(), 'feedsim-snapshot-'));
    const path = join(dir, 'population.json');
    const snapshot = toSnapshot(5, [a, b], [{ follower: createActorId('b'), followee: createActorId('a') }], 4, 24);

    savePopulationSnapshot(path, snapshot);

    expect(loadPopulationSnapshot(path)).toEqual(snapshot);
  });
});
