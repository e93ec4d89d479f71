import { describe, it, expect } from 'vitest';
import { InMemoryLedger } from './ledger';

describe('InMemoryLedger', () => {
  it('starts unknown requesters at zero', async () => {
    await expect(new InMemoryLedger().getBalance('nobody')).resolves.toBe(0);
  });

  it('credits and debits, returning the new balance', async () => {
    const ledger = new InMemoryLedger({ alice: 50 });

    await expect(ledger.debit('alice', 48, 'book.md')).resolves.toBe(2);
    await expect(ledger.credit('alice', 10, 'top-up')).resolves.toBe(12);
    await expect(ledger.getBalance('alice')).resolves.toBe(12);
  });

  it('records an append-only history per requester', async () => {
    const ledger = new InMemoryLedger();
    await ledger.credit('alice', 5, 'gift');
    await ledger.credit('bob', 7, 'gift');
    await ledger.debit('alice', 3, 'job');

    expect(ledger.transactions('alice').map(({ type, amount, memo }) => ({ type, amount, memo }))).toEqual([
      { type: 'credit', amount: 5, memo: 'gift' },
      { type: 'debit', amount: 3, memo: 'job' },
    ]);
    expect(ledger.transactions()).toHaveLength(3);
  });

  it('rejects non-positive or fractional amounts', async () => {
    const ledger = new InMemoryLedger();

    await expect(ledger.credit('alice', 0, 'x')).rejects.toThrow(RangeError);
    await expect(ledger.debit('alice', 1.5, 'x')).rejects.toThrow(RangeError);
    expect(ledger.transactions()).toEqual([]);
  });
});
