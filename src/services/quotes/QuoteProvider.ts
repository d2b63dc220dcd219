import type { ActualPart, VendorQuote } from '../../types/parts';

/**
 * Source of current vendor quotes for a manufacturer part (distributor API,
 * aggregator page, quote sheet...). Must be safe to call again for the same
 * part; the order run itself calls it at most once per part.
 */
export interface QuoteProvider {
    readonly name: string;
    fetch(actualPart: ActualPart): Promise<VendorQuote[]>;
}
