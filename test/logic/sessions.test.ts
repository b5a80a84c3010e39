import { describe, expect, it } from 'vitest';
import { SessionStore } from '../../src/logic/sessions.js';

function store(ttlMs = 1000) {
  let t = 0;
  let n = 0;
  const sessions = new SessionStore(ttlMs, () => t, () => `s${++n}`);
  return { sessions, at: (ms: number) => { t = ms; } };
}

describe('SessionStore', () => {
  it('creates Idle sessions with fresh ids', () => {
    const { sessions } = store();
    const a = sessions.create('citizens');
    const b = sessions.create('parks');

    expect([a.id, b.id]).toEqual(['s1', 's2']);
    expect(a.state).toBe('Idle');
    expect(b.stakeholder).toBe('parks');
    expect(sessions.get('s2')).toBe(b);
    expect(sessions.get('nope')).toBeUndefined();
  });

  it('drops sessions idle past the TTL', () => {
    const { sessions, at } = store(1000);
    sessions.create('citizens');
    at(1500);
    expect(sessions.get('s1')).toBeUndefined();
    expect(sessions.size).toBe(0);
  });

  it('keeps sessions that were used recently', () => {
    const { sessions, at } = store(1000);
    sessions.create('citizens');
    at(800);
    expect(sessions.get('s1')).toBeDefined();
    at(1500);
    expect(sessions.get('s1')).toBeDefined();
  });

  it('never evicts a session waiting on a reply', () => {
    const { sessions, at } = store(1000);
    const s = sessions.create('citizens');
    s.state = 'AwaitingReply';
    at(5000);
    expect(sessions.get('s1')).toBe(s);
  });
});
