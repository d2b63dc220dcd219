import type { PriceBreak } from '../types/parts';

/**
 * Convert price breaks to USD with a fixed rate snapshot
 * (rates are USD per unit of the source currency).
 */
export function toUsd(priceBreaks: PriceBreak[], currency: string, rates: Readonly<Record<string, number>>): PriceBreak[] {
    const code = currency.toUpperCase();
    const rate = code === 'USD' ? 1 : rates[code];
    if (rate === undefined) {
        throw new Error(`No exchange rate for currency '${currency}'`);
    }
    return priceBreaks.map((priceBreak) => ({
        minQuantity: priceBreak.minQuantity,
        unitPrice: priceBreak.unitPrice * rate,
    }));
}
