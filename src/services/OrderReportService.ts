import { formatPriceBreaks } from '../utils/partNames';
import type { OrderResult } from './OrderAggregator';
import type { BoardReference, PriceBreak } from '../types/parts';

export type BomSortKey = 'price' | 'vendor' | 'name';

export interface BomRow {
    choicePartName: string;
    description: string;
    fulfilled: boolean;
    requiredQuantity: number;
    orderQuantity: number;
    /** Empty when unfulfilled */
    vendorName: string;
    vendorPartName: string;
    manufacturerName: string;
    manufacturerPartName: string;
    totalCost: number;
    /** Selected break with its neighbours, e.g. "1/$0.100 10/$0.050 100/$0.031" */
    priceBreaks: string;
    references: string;
}

export interface VendorTotal {
    vendorName: string;
    lineCount: number;
    subtotal: number;
}

export interface OrderSummary {
    vendorNames: string[];
    vendorTotals: VendorTotal[];
    totalCost: number;
    missingPartsCount: number;
    errorCount: number;
}

type SortField = string | number;

function compareFields(a: SortField[], b: SortField[]): number {
    for (let i = 0; i < a.length; i++) {
        const left = a[i];
        const right = b[i];
        if (typeof left === 'number' && typeof right === 'number') {
            if (left !== right) return left - right;
        } else if (String(left) !== String(right)) {
            return String(left) < String(right) ? -1 : 1;
        }
    }
    return 0;
}

const SORT_FIELDS: Record<BomSortKey, (row: BomRow) => SortField[]> = {
    price: (row) => [row.totalCost, row.vendorName, row.choicePartName],
    vendor: (row) => [row.vendorName, row.totalCost, row.choicePartName],
    name: (row) => [row.choicePartName, row.vendorName, row.totalCost],
};

/**
 * Shapes an order result for report writers (BOM listings, vendor carts).
 * Formatting to files is up to the caller.
 */
export class OrderReportService {
    /** "[main: R1 R2][aux: R7]" */
    static referencesText(references: BoardReference[]): string {
        let text = '';
        let previousBoard: string | null = null;
        for (const { boardName, reference } of references) {
            if (boardName !== previousBoard) {
                if (previousBoard !== null) text += ']';
                text += `[${boardName}:`;
                previousBoard = boardName;
            }
            text += ` ${reference}`;
        }
        return previousBoard === null ? '' : `${text}]`;
    }

    /** The selected break plus one on each side. */
    static priceBreakWindow(priceBreaks: PriceBreak[], selectedIndex: number): string {
        const start = Math.max(selectedIndex - 1, 0);
        const end = Math.min(selectedIndex + 2, priceBreaks.length);
        return formatPriceBreaks(priceBreaks.slice(start, end));
    }

    static bomRows(result: OrderResult, sortBy: BomSortKey = 'name'): BomRow[] {
        const rows = result.lines.map((line, index): BomRow => {
            const selection = result.selections[index];
            const base = {
                choicePartName: line.choicePart.name,
                description: line.choicePart.description,
                requiredQuantity: line.requiredQuantity,
                references: OrderReportService.referencesText(line.references),
            };
            if (selection.kind === 'unfulfillable') {
                return {
                    ...base,
                    fulfilled: false,
                    orderQuantity: 0,
                    vendorName: '',
                    vendorPartName: '',
                    manufacturerName: '',
                    manufacturerPartName: '',
                    totalCost: 0,
                    priceBreaks: '',
                };
            }
            return {
                ...base,
                fulfilled: true,
                orderQuantity: selection.orderQuantity,
                vendorName: selection.vendorQuote.vendorName,
                vendorPartName: selection.vendorQuote.vendorPartName,
                manufacturerName: selection.actualPart.manufacturerName,
                manufacturerPartName: selection.actualPart.manufacturerPartName,
                totalCost: selection.totalCost,
                priceBreaks: OrderReportService.priceBreakWindow(selection.vendorQuote.priceBreaks, selection.priceBreakIndex),
            };
        });

        const fields = SORT_FIELDS[sortBy];
        return rows.sort((a, b) => compareFields(fields(a), fields(b)));
    }

    static summarize(result: OrderResult): OrderSummary {
        const totals = new Map<string, VendorTotal>();
        for (const selection of result.selections) {
            if (selection.kind !== 'selected') continue;
            const vendorName = selection.vendorQuote.vendorName;
            const total = totals.get(vendorName) ?? { vendorName, lineCount: 0, subtotal: 0 };
            total.lineCount++;
            total.subtotal += selection.totalCost;
            totals.set(vendorName, total);
        }

        return {
            vendorNames: result.vendorNames,
            vendorTotals: [...totals.values()].sort((a, b) => (a.vendorName < b.vendorName ? -1 : 1)),
            totalCost: result.totalCost,
            missingPartsCount: result.missingPartsCount,
            errorCount: result.errorCount,
        };
    }
}
