/**
 * @file in-memory-registry.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { InMemorySessionRegistry } from '../../../src/infrastructure/persistence/in-memory-registry.js';
import { createTestSession } from '../../helpers/fixtures.js';

describe('InMemorySessionRegistry', () => {
  let registry: InMemorySessionRegistry;

  beforeEach(() => {
    registry = new InMemorySessionRegistry();
  });

  it('should add and count sessions', () => {
    const { session: a } = createTestSession({ id: 'a', registry });
    const { session: b } = createTestSession({ id: 'b', registry });

    registry.add(a);
    registry.add(b);

    expect(registry.count()).toBe(2);
    expect(registry.has(a)).toBe(true);
    expect(registry.has(b)).toBe(true);
  });

  it('should ignore adding the same session twice', () => {
    const { session } = createTestSession({ registry });

    registry.add(session);
    registry.add(session);

    expect(registry.count()).toBe(1);
  });

  it('should report whether remove found the session', () => {
    const { session } = createTestSession({ registry });
    registry.add(session);

    expect(registry.remove(session)).toBe(true);
    expect(registry.remove(session)).toBe(false);
    expect(registry.count()).toBe(0);
  });

  it('should not remove a different session that shares the ID', () => {
    const { session: original } = createTestSession({ id: 'same', registry });
    const { session: impostor } = createTestSession({ id: 'same', registry });
    registry.add(original);

    expect(registry.has(impostor)).toBe(false);
    expect(registry.remove(impostor)).toBe(false);
    expect(registry.has(original)).toBe(true);
  });

  it('should iterate in registration order', () => {
    for (const id of ['c', 'a', 'b']) {
      registry.add(createTestSession({ id, registry }).session);
    }

    const visited: string[] = [];
    registry.forEach((session) => visited.push(session.id.value));

    expect(visited).toEqual(['c', 'a', 'b']);
  });

  it('should visit every member present at call time even if members are removed meanwhile', () => {
    const sessions = ['a', 'b', 'c'].map((id) => createTestSession({ id, registry }).session);
    sessions.forEach((session) => registry.add(session));

    const visited: string[] = [];
    registry.forEach((session) => {
      visited.push(session.id.value);
      sessions.forEach((s) => registry.remove(s));
    });

    expect(visited).toEqual(['a', 'b', 'c']);
    expect(registry.count()).toBe(0);
  });

  it('should not visit sessions added during iteration', () => {
    const { session: first } = createTestSession({ id: 'first', registry });
    const { session: late } = createTestSession({ id: 'late', registry });
    registry.add(first);

    const visited: string[] = [];
    registry.forEach((session) => {
      visited.push(session.id.value);
      registry.add(late);
    });

    expect(visited).toEqual(['first']);
    expect(registry.count()).toBe(2);
  });

  it('should return a snapshot from getAll', () => {
    const { session } = createTestSession({ registry });
    registry.add(session);

    const snapshot = registry.getAll();
    registry.remove(session);

    expect(snapshot).toHaveLength(1);
    expect(registry.getAll()).toHaveLength(0);
  });
});
