import { RATE_PER_50_PAGES } from './config';

const PAGES_PER_RATE_UNIT = 50;

/**
 * Cost in balance units: `rate` units per 50 pages, rounded up, never below 1.
 * Integer arithmetic keeps 120 pages at rate 20 at exactly 48.
 */
export function calcCost(pages: number, rate: number = RATE_PER_50_PAGES): number {
    if (!Number.isFinite(pages) || pages < 0) {
        throw new RangeError(`pages must be a non-negative number, got ${pages}`);
    }
    return Math.max(1, Math.ceil((Math.ceil(pages) * rate) / PAGES_PER_RATE_UNIT));
}

/** How many pages a balance pays for at the given rate. */
export function pagesAffordable(balance: number, rate: number = RATE_PER_50_PAGES): number {
    if (balance <= 0 || rate <= 0) return 0;
    return Math.floor((balance * PAGES_PER_RATE_UNIT) / rate);
}
