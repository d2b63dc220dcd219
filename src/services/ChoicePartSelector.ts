import type { PartCatalog } from './PartCatalog';
import type { ChoicePart, Selection } from '../types/parts';

/** Sort key of a candidate; trailing indices only make ties deterministic */
type CandidateKey = [cost: number, orderQuantity: number, actualPartIndex: number, quoteIndex: number, priceBreakIndex: number];

function compareKeys(a: CandidateKey, b: CandidateKey): number {
    for (let i = 0; i < a.length; i++) {
        if (a[i] !== b[i]) return a[i] - b[i];
    }
    return 0;
}

/**
 * Picks the cheapest (actual part, vendor quote, price break) for a choice part.
 *
 * Every price break is a candidate: ordering up to a larger break's minimum
 * can be cheaper than buying exactly what is needed. A candidate is eligible
 * when its vendor is not excluded and the vendor has the stock for the order
 * quantity.
 */
export class ChoicePartSelector {
    constructor(private readonly catalog: PartCatalog) { }

    select(choicePart: ChoicePart, requiredQuantity: number, excludedVendorNames: ReadonlySet<string>): Selection {
        const actualParts = this.catalog.actualPartsOf(choicePart);

        let best: CandidateKey | null = null;
        for (let actualPartIndex = 0; actualPartIndex < actualParts.length; actualPartIndex++) {
            const quotes = actualParts[actualPartIndex].quotes;
            for (let quoteIndex = 0; quoteIndex < quotes.length; quoteIndex++) {
                const quote = quotes[quoteIndex];
                if (excludedVendorNames.has(quote.vendorName)) continue;

                for (let priceBreakIndex = 0; priceBreakIndex < quote.priceBreaks.length; priceBreakIndex++) {
                    const priceBreak = quote.priceBreaks[priceBreakIndex];
                    const orderQuantity = Math.max(requiredQuantity, priceBreak.minQuantity);
                    if (quote.availableQuantity < orderQuantity) continue;

                    const candidate: CandidateKey = [
                        orderQuantity * priceBreak.unitPrice,
                        orderQuantity,
                        actualPartIndex,
                        quoteIndex,
                        priceBreakIndex,
                    ];
                    if (best === null || compareKeys(candidate, best) < 0) {
                        best = candidate;
                    }
                }
            }
        }

        if (best === null) {
            return { kind: 'unfulfillable', choicePartName: choicePart.name, requiredQuantity };
        }

        const [totalCost, orderQuantity, actualPartIndex, quoteIndex, priceBreakIndex] = best;
        const actualPart = actualParts[actualPartIndex];
        return {
            kind: 'selected',
            choicePartName: choicePart.name,
            requiredQuantity,
            actualPart,
            vendorQuote: actualPart.quotes[quoteIndex],
            priceBreakIndex,
            orderQuantity,
            totalCost,
        };
    }
}
