/**
 * Vendor Set Optimizer
 *
 * Shrinks the set of vendors an order is split across. Two passes:
 *   1. drop vendors whose share of the order is below their minimum order
 *   2. greedily drop the vendor whose removal costs least, while that extra
 *      cost stays under the assumed per-vendor shipping cost
 *
 * The second pass never drops a vendor if doing so would leave a part
 * without a source that had one when the pass started.
 */

import { Logger } from '../utils/logger';
import type { ChoicePartSelector } from './ChoicePartSelector';
import type { PartCatalog } from './PartCatalog';
import type { VendorPriorityTable } from './VendorPriorityTable';
import type { OrderLine } from '../types/parts';

export type VendorExclusionReason = 'explicit' | 'allow-list' | 'minimum-order' | 'no-savings' | 'shipping';

export interface VendorReductionMessage {
    vendorName: string;
    reason: VendorExclusionReason;
    /** minimum-order: what the order would have spent with the vendor */
    orderTotal?: number;
    minimum?: number;
    /** shipping: how much more the order costs without the vendor */
    savings?: number;
}

export interface OrderCost {
    missingParts: number;
    totalCost: number;
}

/** Outcome of excluding one more vendor; sorts most attractive exclusion first */
export interface VendorQuad extends OrderCost {
    vendorPriority: number;
    vendorName: string;
}

export interface VendorSetOptimizerOptions {
    shippingThreshold: number;
    vendorMinimums: Readonly<Record<string, number>>;
    /** Never excluded by the shipping pass */
    neverExcludeVendor?: string;
}

export interface OptimizeOptions {
    excludedVendorNames?: Iterable<string>;
    /** When given, only these vendors are used and the shipping pass is skipped */
    vendorAllowList?: Iterable<string>;
}

export interface VendorReduction {
    excludedVendorNames: Set<string>;
    messages: VendorReductionMessage[];
}

export function compareQuads(a: VendorQuad, b: VendorQuad): number {
    if (a.missingParts !== b.missingParts) return a.missingParts - b.missingParts;
    if (a.totalCost !== b.totalCost) return a.totalCost - b.totalCost;
    if (a.vendorPriority !== b.vendorPriority) return a.vendorPriority - b.vendorPriority;
    return a.vendorName < b.vendorName ? -1 : a.vendorName > b.vendorName ? 1 : 0;
}

function withVendor(excluded: ReadonlySet<string>, vendorName: string): Set<string> {
    const trial = new Set(excluded);
    trial.add(vendorName);
    return trial;
}

export class VendorSetOptimizer {
    constructor(
        private readonly catalog: PartCatalog,
        private readonly selector: ChoicePartSelector,
        private readonly priorities: VendorPriorityTable,
        private readonly options: VendorSetOptimizerOptions
    ) { }

    optimize(lines: OrderLine[], options: OptimizeOptions = {}): VendorReduction {
        const excluded = new Set(options.excludedVendorNames ?? []);
        const messages: VendorReductionMessage[] = [];

        if (options.vendorAllowList) {
            const allowed = new Set(options.vendorAllowList);
            for (const vendorName of this.vendorNamesInUse(lines, excluded)) {
                if (!allowed.has(vendorName)) {
                    this.exclude(excluded, messages, { vendorName, reason: 'allow-list' });
                }
            }
        }

        this.excludeVendorsWithHighMinimums(lines, excluded, messages);
        if (!options.vendorAllowList) {
            this.excludeVendorsToReduceShipping(lines, excluded, messages);
        }

        return { excludedVendorNames: excluded, messages };
    }

    /** Missing parts and total cost of the cheapest selection for every line. */
    evaluate(lines: OrderLine[], excluded: ReadonlySet<string>): OrderCost {
        let missingParts = 0;
        let totalCost = 0;
        for (const line of lines) {
            const selection = this.selector.select(line.choicePart, line.requiredQuantity, excluded);
            if (selection.kind === 'selected') {
                totalCost += selection.totalCost;
            } else {
                missingParts++;
            }
        }
        return { missingParts, totalCost };
    }

    /** Every non-excluded vendor quoting any part of any line, sorted by name. */
    vendorNamesInUse(lines: OrderLine[], excluded: ReadonlySet<string>): string[] {
        const names = new Set<string>();
        for (const line of lines) {
            for (const actualPart of this.catalog.actualPartsOf(line.choicePart)) {
                for (const quote of actualPart.quotes) {
                    if (!excluded.has(quote.vendorName)) names.add(quote.vendorName);
                }
            }
        }
        return [...names].sort();
    }

    quad(lines: OrderLine[], excluded: ReadonlySet<string>, vendorName: string): VendorQuad {
        const cost = this.evaluate(lines, withVendor(excluded, vendorName));
        return { ...cost, vendorPriority: this.priorities.priorityOf(vendorName), vendorName };
    }

    excludeVendorsWithHighMinimums(lines: OrderLine[], excluded: Set<string>, messages: VendorReductionMessage[]): void {
        for (const [vendorName, minimum] of Object.entries(this.options.vendorMinimums)) {
            if (excluded.has(vendorName)) continue;

            let orderTotal = 0;
            for (const line of lines) {
                const selection = this.selector.select(line.choicePart, line.requiredQuantity, excluded);
                if (selection.kind === 'selected' && selection.vendorQuote.vendorName === vendorName) {
                    orderTotal += selection.totalCost;
                }
            }

            if (orderTotal < minimum) {
                this.exclude(excluded, messages, { vendorName, reason: 'minimum-order', orderTotal, minimum });
            }
        }
    }

    excludeVendorsToReduceShipping(lines: OrderLine[], excluded: Set<string>, messages: VendorReductionMessage[]): void {
        const { shippingThreshold, neverExcludeVendor } = this.options;
        const startingMissing = this.evaluate(lines, excluded).missingParts;
        const keepsParts = (quad: VendorQuad) => quad.missingParts <= startingMissing;

        for (;;) {
            const baseline = this.evaluate(lines, excluded);
            if (baseline.missingParts > startingMissing) break;

            // Always keep at least one vendor
            const vendorNames = this.vendorNamesInUse(lines, excluded);
            if (vendorNames.length <= 1) break;

            // The protected vendor is never a candidate, but still counts as a vendor in use
            const quads = vendorNames
                .filter((vendorName) => vendorName !== neverExcludeVendor)
                .map((vendorName) => this.quad(lines, excluded, vendorName))
                .sort(compareQuads);
            let remaining = vendorNames.length;

            // Vendors whose removal changes nothing go first, one re-check each,
            // since two such vendors may be the only sources of the same part
            let dropped = 0;
            while (remaining >= 2 && quads.length > 0 && quads[0].totalCost === baseline.totalCost && keepsParts(quads[0])) {
                const recheck = this.evaluate(lines, withVendor(excluded, quads[0].vendorName));
                if (recheck.totalCost !== baseline.totalCost || recheck.missingParts > startingMissing) break;

                this.exclude(excluded, messages, { vendorName: quads[0].vendorName, reason: 'no-savings', savings: 0 });
                quads.shift();
                remaining--;
                dropped++;
            }
            if (dropped > 0) continue;
            if (quads.length === 0) break;

            const lowest = quads[0];
            const savings = lowest.totalCost - baseline.totalCost;
            if (savings < shippingThreshold && remaining >= 2 && keepsParts(lowest)) {
                this.exclude(excluded, messages, { vendorName: lowest.vendorName, reason: 'shipping', savings });
                continue;
            }
            break;
        }
    }

    private exclude(excluded: Set<string>, messages: VendorReductionMessage[], message: VendorReductionMessage): void {
        excluded.add(message.vendorName);
        messages.push(message);
        Logger.info(`[VendorSetOptimizer] Excluding '${message.vendorName}'`, { ...message });
    }
}
