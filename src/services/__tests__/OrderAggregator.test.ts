import { describe, it, expect, vi, beforeEach } from 'vitest';
import path from 'path';
import { PartCatalog } from '../PartCatalog';
import { OrderAggregator } from '../OrderAggregator';
import { CatalogLoader } from '../CatalogLoader';
import { createOrderContext, type OrderContext } from '../OrderContext';
import { StaticQuoteProvider } from '../quotes/StaticQuoteProvider';
import { Logger } from '../../utils/logger';
import { parsePriceBreaks } from '../../utils/partNames';
import type { OrderConfig } from '../../utils/env';
import type { QuoteProvider } from '../quotes/QuoteProvider';
import type { ActualPart, VendorQuote } from '../../types/parts';

vi.mock('../../utils/logger', () => ({
    Logger: {
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        debug: vi.fn(),
    },
}));

const config: OrderConfig = {
    quoteCachePath: 'unused.json',
    quoteCacheTtlSeconds: 172800,
    shippingThreshold: 15,
    vendorMinimums: {},
    vendorPriorities: {},
    autoPriorityStart: 10,
    exchangeRates: { USD: 1, EUR: 1.1, GBP: 1.25 },
};

const vishay = { manufacturerName: 'Vishay Dale', manufacturerPartName: 'CRCW060310K0FKEA' };
const yageo = { manufacturerName: 'Yageo', manufacturerPartName: 'RC0603FR-0710KL' };

function quoteFor(part: ActualPart, vendorName: string, breaks: string): VendorQuote {
    return {
        actualPart: { manufacturerName: part.manufacturerName, manufacturerPartName: part.manufacturerPartName },
        vendorName,
        vendorPartName: `${vendorName}-${part.manufacturerPartName}`,
        availableQuantity: 5000,
        priceBreaks: parsePriceBreaks(breaks),
        fetchedAt: 1000,
    };
}

describe('OrderAggregator', () => {
    let catalog: PartCatalog;
    let context: OrderContext;

    beforeEach(() => {
        vi.clearAllMocks();
        catalog = new PartCatalog();
        catalog.registerChoicePart({ name: '10K;1608', footprint: 'R_0603', actualParts: [vishay] });
        context = createOrderContext(config, { catalog });
    });

    function provider(fetch: QuoteProvider['fetch']) {
        return { name: 'fake', fetch: vi.fn(fetch) };
    }

    it('merges a part used on several boards into one line', async () => {
        const quotes = provider(async (part) => [quoteFor(part, 'Vendor A', '1/0.10 10/0.05 100/0.02')]);
        const aggregator = new OrderAggregator(context, quotes);
        aggregator.addBoard({
            name: 'main',
            count: 10,
            parts: [
                { reference: 'R2', schematicPartName: '10K;1608' },
                { reference: 'R1', schematicPartName: '10K;1608' },
            ],
        });
        aggregator.addBoard({ name: 'aux', count: 5, parts: [{ reference: 'R7', schematicPartName: '10K;1608' }] });

        const result = await aggregator.process();

        expect(result.lines).toHaveLength(1);
        expect(result.lines[0].requiredQuantity).toBe(25);
        expect(result.lines[0].references.map((ref) => `${ref.boardName}:${ref.reference}`))
            .toEqual(['aux:R7', 'main:R1', 'main:R2']);
        expect(quotes.fetch).toHaveBeenCalledTimes(1);

        const [selection] = result.selections;
        if (selection.kind !== 'selected') throw new Error('expected a selection');
        expect(selection.orderQuantity).toBe(25);
        expect(result.totalCost).toBeCloseTo(1.25, 10);
        expect(result.vendorNames).toEqual(['Vendor A']);
        expect(result.missingPartsCount).toBe(0);
    });

    it('counts unknown schematic parts and carries on', async () => {
        const aggregator = new OrderAggregator(context, provider(async (part) => [quoteFor(part, 'Vendor A', '1/0.10')]));
        aggregator.addBoard({
            name: 'main',
            count: 1,
            parts: [
                { reference: 'R1', schematicPartName: '10K;1608' },
                { reference: 'U1', schematicPartName: 'NOPE;QFP32' },
            ],
        });

        const result = await aggregator.process();

        expect(result.errorCount).toBe(1);
        expect(result.lines).toHaveLength(1);
        expect(Logger.error).toHaveBeenCalledWith(
            "[OrderAggregator] Schematic part 'NOPE;QFP32' is not in the catalog",
            expect.objectContaining({ code: 'UNRESOLVED_SCHEMATIC_PART' })
        );
    });

    it('uses cached quotes without calling the provider', async () => {
        const quotes = provider(async () => []);
        const actualPart = { ...vishay, id: 'cached', quotes: [] };
        context.quoteCache.put(vishay, [quoteFor(actualPart, 'Vendor C', '1/0.01')]);
        const aggregator = new OrderAggregator(context, quotes);
        aggregator.addBoard({ name: 'main', count: 2, parts: [{ reference: 'R1', schematicPartName: '10K;1608' }] });

        const result = await aggregator.process();

        expect(quotes.fetch).not.toHaveBeenCalled();
        expect(result.vendorNames).toEqual(['Vendor C']);
    });

    it('treats a failed lookup as no quotes and does not cache it', async () => {
        const quotes = provider(async () => {
            throw new Error('quote service unavailable');
        });
        const aggregator = new OrderAggregator(context, quotes);
        aggregator.addBoard({ name: 'main', count: 1, parts: [{ reference: 'R1', schematicPartName: '10K;1608' }] });

        const result = await aggregator.process();

        expect(result.quoteFailureCount).toBe(1);
        expect(result.missingPartsCount).toBe(1);
        expect(result.selections[0].kind).toBe('unfulfillable');
        expect(context.quoteCache.has(vishay)).toBe(false);
    });

    it('honours explicit vendor exclusions', async () => {
        catalog.registerChoicePart({ name: '10K;2012', footprint: 'R_0805', actualParts: [yageo] });
        const quotes = provider(async (part) => [
            quoteFor(part, 'Vendor A', '1/0.10'),
            quoteFor(part, 'Vendor B', '1/0.20'),
        ]);
        const aggregator = new OrderAggregator(context, quotes);
        aggregator.addBoard({
            name: 'main',
            count: 1,
            parts: [
                { reference: 'R1', schematicPartName: '10K;1608' },
                { reference: 'R2', schematicPartName: '10K;2012' },
            ],
        });
        aggregator.excludeVendor('Vendor A');

        const result = await aggregator.process();

        expect(result.vendorNames).toEqual(['Vendor B']);
        expect(result.excludedVendorNames).toEqual(['Vendor A']);
        expect(result.vendorReductions[0]).toEqual({ vendorName: 'Vendor A', reason: 'explicit' });
    });

    it('rejects a negative board count', () => {
        const aggregator = new OrderAggregator(context, provider(async () => []));
        expect(() => aggregator.addBoard({ name: 'main', count: -1, parts: [] })).toThrow("Board 'main' has invalid count -1");
    });

    it('runs the sample order end to end', async () => {
        const fixtures = path.resolve(__dirname, '../../../fixtures');
        const sampleCatalog = new PartCatalog();
        await CatalogLoader.loadCatalogFile(sampleCatalog, path.join(fixtures, 'catalog.json'), config.exchangeRates);
        const order = await CatalogLoader.loadOrderFile(path.join(fixtures, 'order.json'));
        const rows = await CatalogLoader.loadQuoteSheetFile(path.join(fixtures, 'quotes.json'), config.exchangeRates);

        const aggregator = new OrderAggregator(
            createOrderContext(config, { catalog: sampleCatalog }),
            new StaticQuoteProvider(rows, () => 2000)
        );
        order.boards.forEach((board) => aggregator.addBoard(board));

        const result = await aggregator.process();

        expect(result.lines.map((line) => [line.choicePart.name, line.requiredQuantity])).toEqual([
            ['100nF;1608', 20],
            ['10K;1608', 45],
            ['M1x40;M1x40', 2],
        ]);
        expect(result.missingPartsCount).toBe(0);
        expect(result.errorCount).toBe(0);
        expect(result.excludedVendorNames).toEqual(['Vendor B']);
        expect(result.vendorNames).toEqual(['Parts Bin', 'Vendor A']);
        expect(result.totalCost).toBeCloseTo(4.24, 10);
    });
});
