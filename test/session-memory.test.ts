import { describe, it, expect } from 'vitest';
import { CacheSessionStore, InMemorySessionStore, SessionMemory } from '../src/core/session-memory';
import { ValidationError } from '../src/types/api';

const questions = (turns: Array<{ question: string }>) => turns.map(turn => turn.question);

function memory(historyWindow = 6, maxStoredTurns = 50) {
  return new SessionMemory(new InMemorySessionStore(), { historyWindow, maxStoredTurns });
}

describe('SessionMemory', () => {
  it('starts sessions empty on first use', async () => {
    expect(await memory().history('new-session')).toEqual([]);
  });

  it('returns the most recent turns within the window, oldest first', async () => {
    const sessions = memory(4);
    for (let i = 0; i < 5; i++) {
      await sessions.append('s1', `q${i}`, `a${i}`);
    }

    const history = await sessions.history('s1');

    expect(questions(history)).toEqual(['q3', 'q4']);
    expect(history[1]).toMatchObject({ question: 'q4', answer: 'a4' });
  });

  it('rounds an odd message window down to whole turns', async () => {
    const sessions = memory(5);
    for (let i = 0; i < 4; i++) {
      await sessions.append('s1', `q${i}`, `a${i}`);
    }

    expect(sessions.historyTurns).toBe(2);
    expect(questions(await sessions.history('s1'))).toEqual(['q2', 'q3']);
  });

  it('returns no history for a zero window', async () => {
    const sessions = memory(0);
    await sessions.append('s1', 'q', 'a');

    expect(await sessions.history('s1')).toEqual([]);
  });

  it('keeps sessions independent', async () => {
    const sessions = memory();
    await sessions.append('s1', 'first question', 'first answer');
    await sessions.append('s2', 'other question', 'other answer');

    expect(questions(await sessions.history('s1'))).toEqual(['first question']);
    expect(questions(await sessions.history('s2'))).toEqual(['other question']);
  });

  it('drops turns beyond the stored limit', async () => {
    const sessions = memory(20, 3);
    for (let i = 0; i < 5; i++) {
      await sessions.append('s1', `q${i}`, `a${i}`);
    }

    expect(questions(await sessions.history('s1'))).toEqual(['q2', 'q3', 'q4']);
  });

  it('clears one session without touching others', async () => {
    const sessions = memory();
    await sessions.append('s1', 'q', 'a');
    await sessions.append('s2', 'q', 'a');

    await sessions.clear('s1');
    await sessions.clear('never-used');

    expect(await sessions.history('s1')).toEqual([]);
    expect(await sessions.history('s2')).toHaveLength(1);
  });

  it('keeps every concurrent append to one session, in call order', async () => {
    const sessions = memory(20);

    await Promise.all(Array.from({ length: 10 }, (_, i) => sessions.append('busy', `q${i}`, `a${i}`)));

    expect(questions(await sessions.history('busy'))).toEqual(Array.from({ length: 10 }, (_, i) => `q${i}`));
  });

  it('stores a normalized document scope', async () => {
    const sessions = memory();

    await sessions.setScope('s1', [' a.pdf ', 'b.txt', 'a.pdf', '']);
    expect(await sessions.getScope('s1')).toEqual(['a.pdf', 'b.txt']);

    await sessions.setScope('s1', []);
    expect(await sessions.getScope('s1')).toBeUndefined();
  });

  it('keeps the scope when turns are appended', async () => {
    const sessions = memory();
    await sessions.setScope('s1', ['a.pdf']);
    await sessions.append('s1', 'q', 'a');

    expect(await sessions.getScope('s1')).toEqual(['a.pdf']);
  });

  it('rejects invalid options', () => {
    expect(() => memory(-1)).toThrow(ValidationError);
    expect(() => memory(6, 0)).toThrow(ValidationError);
  });
});

describe('CacheSessionStore', () => {
  it('backs session memory with expiring entries', async () => {
    const store = new CacheSessionStore(60);
    const sessions = new SessionMemory(store, { historyWindow: 6, maxStoredTurns: 50 });

    try {
      await sessions.append('s1', 'q', 'a');
      expect(questions(await sessions.history('s1'))).toEqual(['q']);

      await sessions.clear('s1');
      expect(await store.get('s1')).toBeUndefined();
      expect(await store.delete('s1')).toBe(false);
    } finally {
      sessions.close();
    }
  });
});
