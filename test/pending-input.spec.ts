import { describe, expect, it } from 'vitest';
import { PendingInputStore } from '../apps/bot/src/telegram/pending-input.store';

describe('pending input store', () => {
  it('returns an open session once', () => {
    const store = new PendingInputStore(60_000);
    store.open(1, 'operator', 10, 1_000);

    expect(store.consume(1, 2_000)).toEqual({
      status: 'ready',
      session: { target: 'operator', chatId: 10, expiresAt: 61_000 },
    });
    expect(store.consume(1, 2_000)).toEqual({ status: 'none' });
  });

  it('reports and clears expired sessions', () => {
    const store = new PendingInputStore(60_000);
    store.open(1, 'channel', 10, 0);

    expect(store.consume(1, 60_001)).toEqual({ status: 'expired' });
    expect(store.has(1)).toBe(false);
  });

  it('keeps sessions apart per operator', () => {
    const store = new PendingInputStore(60_000);
    store.open(1, 'channel', 10, 0);

    expect(store.consume(2, 0)).toEqual({ status: 'none' });
    expect(store.has(1)).toBe(true);
  });
});
