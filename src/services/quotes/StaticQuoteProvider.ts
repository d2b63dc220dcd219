import { Logger } from '../../utils/logger';
import { actualPartId } from '../../utils/partNames';
import type { QuoteProvider } from './QuoteProvider';
import type { ActualPart, ActualPartKey, PriceBreak, VendorQuote } from '../../types/parts';

export interface QuoteSheetRow extends ActualPartKey {
    vendorName: string;
    vendorPartName: string;
    availableQuantity: number;
    priceBreaks: PriceBreak[];
}

/**
 * Serves quotes from a fixed quote sheet, stamped with the fetch time.
 * Parts missing from the sheet get no quotes.
 */
export class StaticQuoteProvider implements QuoteProvider {
    readonly name = 'quote-sheet';
    private readonly rows = new Map<string, QuoteSheetRow[]>();

    constructor(
        rows: QuoteSheetRow[],
        private readonly now: () => number = () => Math.floor(Date.now() / 1000)
    ) {
        for (const row of rows) {
            const id = actualPartId(row);
            const existing = this.rows.get(id) ?? [];
            existing.push(row);
            this.rows.set(id, existing);
        }
    }

    async fetch(actualPart: ActualPart): Promise<VendorQuote[]> {
        const rows = this.rows.get(actualPart.id) ?? [];
        if (rows.length === 0) {
            Logger.debug('[StaticQuoteProvider] No quotes on sheet', { id: actualPart.id });
        }

        const fetchedAt = this.now();
        return rows.map((row) => ({
            actualPart: { manufacturerName: actualPart.manufacturerName, manufacturerPartName: actualPart.manufacturerPartName },
            vendorName: row.vendorName,
            vendorPartName: row.vendorPartName,
            availableQuantity: row.availableQuantity,
            priceBreaks: [...row.priceBreaks].sort((a, b) => a.minQuantity - b.minQuantity),
            fetchedAt,
        }));
    }
}
