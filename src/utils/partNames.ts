import type { ActualPartKey, PriceBreak } from '../types/parts';
import { InvalidSchematicPartNameError } from './errors';

export interface ParsedPartName {
    baseName: string;
    shortFootprint: string;
    comment?: string;
}

/**
 * Split "10K;1608:5%" into base name, short footprint and optional comment.
 * @throws InvalidSchematicPartNameError unless there is exactly one ';'
 */
export function parseSchematicPartName(name: string): ParsedPartName {
    const pieces = name.split(';');
    if (pieces.length !== 2 || pieces[0] === '' || pieces[1] === '') {
        throw new InvalidSchematicPartNameError(name);
    }

    const [baseName, rest] = pieces;
    const colon = rest.indexOf(':');
    if (colon < 0) {
        return { baseName, shortFootprint: rest };
    }
    return {
        baseName,
        shortFootprint: rest.slice(0, colon),
        comment: rest.slice(colon + 1),
    };
}

/** Map key for an actual part; unambiguous whatever characters the names hold. */
export function actualPartId(key: ActualPartKey): string {
    return JSON.stringify([key.manufacturerName, key.manufacturerPartName]);
}

export function vendorQuoteId(quote: { vendorName: string; vendorPartName: string }): string {
    return JSON.stringify([quote.vendorName, quote.vendorPartName]);
}

// "SW123" -> ["SW", 123]; references without digits sort after numbered ones
function referenceKey(reference: string): [string, number] {
    const letters = reference.replace(/[^A-Za-z]/g, '').toUpperCase();
    const digits = reference.replace(/[^0-9]/g, '');
    return [letters, digits === '' ? Number.MAX_SAFE_INTEGER : Number(digits)];
}

/** Letters alphabetically, then number numerically: R2 < R10 < SW1. */
export function compareReferences(a: string, b: string): number {
    const [aLetters, aNumber] = referenceKey(a);
    const [bLetters, bNumber] = referenceKey(b);
    if (aLetters !== bLetters) return aLetters < bLetters ? -1 : 1;
    if (aNumber !== bNumber) return aNumber - bNumber;
    return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Parse price-break text "1/0.10 10/0.05 100/0.031" (quantity/price pairs).
 * Breaks come back sorted by quantity.
 */
export function parsePriceBreaks(text: string): PriceBreak[] {
    const breaks = text.trim().split(/\s+/).filter(Boolean).map((pair) => {
        const pieces = pair.split('/');
        if (pieces.length !== 2) {
            throw new Error(`Price break '${pair}' is not of the form quantity/price`);
        }
        const minQuantity = Number(pieces[0]);
        const unitPrice = Number(pieces[1]);
        if (!Number.isInteger(minQuantity) || minQuantity < 1) {
            throw new Error(`Quantity '${pieces[0]}' is not a positive integer`);
        }
        if (!Number.isFinite(unitPrice) || unitPrice < 0) {
            throw new Error(`Price '${pieces[1]}' is not a valid price`);
        }
        return { minQuantity, unitPrice };
    });
    if (breaks.length === 0) {
        throw new Error('Price break text is empty');
    }
    return breaks.sort((a, b) => a.minQuantity - b.minQuantity);
}

export function formatPriceBreaks(breaks: PriceBreak[]): string {
    return breaks.map((priceBreak) => `${priceBreak.minQuantity}/$${priceBreak.unitPrice.toFixed(3)}`).join(' ');
}
