import { logger } from '@booktrans/core';

export type TransactionType = 'credit' | 'debit';

export interface Transaction {
    requesterId: string;
    type: TransactionType;
    amount: number;
    memo: string;
    createdAt: number;
}

/**
 * Balance storage. A debit is only issued after the orchestrator has checked
 * the balance under the requester's lock, so implementations need not guard
 * against overdraft races.
 */
export interface AccountLedger {
    getBalance(requesterId: string): Promise<number>;
    debit(requesterId: string, amount: number, memo: string): Promise<number>;
    credit(requesterId: string, amount: number, memo: string): Promise<number>;
}

function assertAmount(amount: number): void {
    if (!Number.isInteger(amount) || amount <= 0) {
        throw new RangeError(`amount must be a positive integer, got ${amount}`);
    }
}

export class InMemoryLedger implements AccountLedger {
    private readonly balances = new Map<string, number>();
    private readonly history: Transaction[] = [];

    constructor(initial: Record<string, number> = {}) {
        for (const [requesterId, balance] of Object.entries(initial)) {
            this.balances.set(requesterId, balance);
        }
    }

    async getBalance(requesterId: string): Promise<number> {
        return this.balances.get(requesterId) ?? 0;
    }

    async debit(requesterId: string, amount: number, memo: string): Promise<number> {
        return this.apply(requesterId, 'debit', amount, memo);
    }

    async credit(requesterId: string, amount: number, memo: string): Promise<number> {
        return this.apply(requesterId, 'credit', amount, memo);
    }

    transactions(requesterId?: string): Transaction[] {
        return this.history.filter((tx) => requesterId === undefined || tx.requesterId === requesterId);
    }

    private apply(requesterId: string, type: TransactionType, amount: number, memo: string): number {
        assertAmount(amount);
        const before = this.balances.get(requesterId) ?? 0;
        const after = type === 'credit' ? before + amount : before - amount;
        this.balances.set(requesterId, after);
        this.history.push({ requesterId, type, amount, memo, createdAt: Date.now() });
        logger.info(`Ledger ${type} ${amount} for ${requesterId} (${memo}): ${before} -> ${after}`);
        return after;
    }
}
