import { describe, expect, it } from 'vitest';
import { ChatHistory, type Exchange } from '../src/core/history.ts';

function exchange(n: number): Exchange {
  return { question: `q${n}`, answer: `a${n}`, askedAt: '2026-01-01T00:00:00.000Z' };
}

describe('ChatHistory', () => {
  it('keeps exchanges in submission order', () => {
    const history = new ChatHistory();
    history.append(exchange(1));
    history.append(exchange(2));
    history.append(exchange(3));

    expect(history.size).toBe(3);
    expect(history.snapshot().map((e) => e.question)).toEqual(['q1', 'q2', 'q3']);
  });

  it('returns a frozen snapshot that later appends do not change', () => {
    const history = new ChatHistory();
    history.append(exchange(1));

    const snapshot = history.snapshot();
    history.append(exchange(2));

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(snapshot).toHaveLength(1);
    expect(Object.isFrozen(snapshot[0])).toBe(true);
  });

  it('clears idempotently', () => {
    const history = new ChatHistory();
    history.append(exchange(1));

    history.clear();
    expect(history.snapshot()).toEqual([]);
    history.clear();
    expect(history.snapshot()).toEqual([]);
    expect(history.size).toBe(0);
  });

  it('evicts the oldest exchanges beyond its capacity', () => {
    const history = new ChatHistory(2);
    history.append(exchange(1));
    history.append(exchange(2));
    history.append(exchange(3));

    expect(history.snapshot().map((e) => e.question)).toEqual(['q2', 'q3']);
  });

  it('keeps everything with a capacity of zero', () => {
    const history = new ChatHistory(0);
    for (let i = 1; i <= 100; i++) history.append(exchange(i));
    expect(history.size).toBe(100);
  });

  it('rejects a negative or fractional capacity', () => {
    expect(() => new ChatHistory(-1)).toThrow(RangeError);
    expect(() => new ChatHistory(1.5)).toThrow(RangeError);
  });
});
