import { describe, it, expect, vi } from 'vitest';
import { StaticQuoteProvider } from '../quotes/StaticQuoteProvider';
import { RetryingQuoteProvider } from '../quotes/RetryingQuoteProvider';
import type { QuoteProvider } from '../quotes/QuoteProvider';
import type { ActualPart } from '../../types/parts';

vi.mock('../../utils/logger', () => ({
    Logger: {
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        debug: vi.fn(),
    },
}));

const yageo: ActualPart = {
    manufacturerName: 'Yageo',
    manufacturerPartName: 'RC0603FR-0710KL',
    id: JSON.stringify(['Yageo', 'RC0603FR-0710KL']),
    quotes: [],
};

describe('StaticQuoteProvider', () => {
    const provider = new StaticQuoteProvider([
        {
            manufacturerName: 'Yageo',
            manufacturerPartName: 'RC0603FR-0710KL',
            vendorName: 'Vendor B',
            vendorPartName: 'B-311-10K',
            availableQuantity: 20000,
            priceBreaks: [{ minQuantity: 1000, unitPrice: 0.004 }, { minQuantity: 5, unitPrice: 0.06 }],
        },
    ], () => 1234);

    it('returns sheet rows stamped with the fetch time', async () => {
        const [quote] = await provider.fetch(yageo);

        expect(quote.vendorName).toBe('Vendor B');
        expect(quote.fetchedAt).toBe(1234);
        expect(quote.actualPart).toEqual({ manufacturerName: 'Yageo', manufacturerPartName: 'RC0603FR-0710KL' });
        expect(quote.priceBreaks.map((priceBreak) => priceBreak.minQuantity)).toEqual([5, 1000]);
    });

    it('returns nothing for a part missing from the sheet', async () => {
        await expect(provider.fetch({ ...yageo, id: JSON.stringify(['Yageo', 'OTHER']), manufacturerPartName: 'OTHER' }))
            .resolves.toEqual([]);
    });
});

describe('RetryingQuoteProvider', () => {
    it('retries a transient failure of the wrapped provider', async () => {
        const inner: QuoteProvider = {
            name: 'flaky',
            fetch: vi.fn()
                .mockRejectedValueOnce(Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' }))
                .mockResolvedValue([]),
        };
        const provider = new RetryingQuoteProvider(inner, { baseDelayMs: 1, maxDelayMs: 1 });

        await expect(provider.fetch(yageo)).resolves.toEqual([]);
        expect(inner.fetch).toHaveBeenCalledTimes(2);
        expect(provider.name).toBe('flaky+retry');
    });

    it('gives up on a permanent failure', async () => {
        const inner: QuoteProvider = {
            name: 'broken',
            fetch: vi.fn().mockRejectedValue(new Error('unknown part')),
        };
        const provider = new RetryingQuoteProvider(inner, { baseDelayMs: 1 });

        await expect(provider.fetch(yageo)).rejects.toThrow('unknown part');
        expect(inner.fetch).toHaveBeenCalledTimes(1);
    });
});
