/**
 * Order Aggregator
 *
 * Runs one order end to end:
 *   boards -> board parts -> choice parts (deduplicated across boards)
 *   -> quotes (cache first) -> vendor set reduction -> final selections
 *
 * An unknown schematic part or a failed quote lookup is logged and counted;
 * the run still covers every other part. Only broken catalog data (such as
 * mismatched fractional denominators) aborts it.
 */

import { Logger } from '../utils/logger';
import { QuoteProviderError, UnresolvedSchematicPartError } from '../utils/errors';
import { compareReferences } from '../utils/partNames';
import { ChoicePartSelector } from './ChoicePartSelector';
import { PartResolver } from './PartResolver';
import { VendorSetOptimizer, type VendorReductionMessage } from './VendorSetOptimizer';
import type { OrderContext } from './OrderContext';
import type { QuoteProvider } from './quotes/QuoteProvider';
import type {
    Board,
    BoardHandle,
    BoardReference,
    ChoicePart,
    OrderLine,
    Selection,
} from '../types/parts';

export interface BoardPartInput {
    reference: string;
    schematicPartName: string;
    comment?: string;
}

export interface BoardInput {
    name: string;
    revision?: string;
    count: number;
    parts: BoardPartInput[];
}

export interface OrderResult {
    lines: OrderLine[];
    /** One per line, same order */
    selections: Selection[];
    missingPartsCount: number;
    /** Board parts skipped because their schematic part is unknown */
    errorCount: number;
    quoteFailureCount: number;
    excludedVendorNames: string[];
    vendorReductions: VendorReductionMessage[];
    totalCost: number;
    /** Vendors the final selections buy from */
    vendorNames: string[];
}

export class OrderAggregator {
    private readonly boards: Board[] = [];
    private readonly excludedVendorNames = new Set<string>();
    private vendorAllowList?: Set<string>;

    constructor(
        private readonly context: OrderContext,
        private readonly quoteProvider: QuoteProvider
    ) { }

    addBoard(input: BoardInput): BoardHandle {
        if (!Number.isInteger(input.count) || input.count < 0) {
            throw new Error(`Board '${input.name}' has invalid count ${input.count}`);
        }

        const handle = this.boards.length;
        this.boards.push({
            name: input.name,
            revision: input.revision ?? '',
            count: input.count,
            parts: input.parts.map((part) => {
                const comment = part.comment ?? '';
                return {
                    board: handle,
                    reference: part.reference,
                    schematicPartName: part.schematicPartName,
                    comment,
                    install: comment !== 'DNI',
                };
            }),
        });
        return handle;
    }

    /** Never buy from this vendor in this order. */
    excludeVendor(vendorName: string): void {
        this.excludedVendorNames.add(vendorName);
    }

    /** Buy only from these vendors; turns off shipping-cost reduction. */
    restrictVendors(vendorNames: Iterable<string>): void {
        this.vendorAllowList = new Set(vendorNames);
    }

    async process(): Promise<OrderResult> {
        const { catalog, config } = this.context;
        catalog.indexActualParts();

        const resolver = new PartResolver(catalog);
        const { choiceParts, errorCount } = this.collectChoiceParts(resolver);
        const quoteFailureCount = await this.loadQuotes(choiceParts);

        const lines: OrderLine[] = choiceParts.map((choicePart) => ({
            choicePart,
            requiredQuantity: resolver.requiredQuantity(choicePart),
            references: this.referencesOf(resolver, choicePart),
        }));

        const selector = new ChoicePartSelector(catalog);
        const optimizer = new VendorSetOptimizer(catalog, selector, this.context.priorities, {
            shippingThreshold: config.shippingThreshold,
            vendorMinimums: config.vendorMinimums,
            neverExcludeVendor: config.neverExcludeVendor,
        });

        const explicitMessages = [...this.excludedVendorNames]
            .map((vendorName): VendorReductionMessage => ({ vendorName, reason: 'explicit' }));
        const reduction = optimizer.optimize(lines, {
            excludedVendorNames: this.excludedVendorNames,
            vendorAllowList: this.vendorAllowList,
        });

        const selections = lines.map((line) =>
            selector.select(line.choicePart, line.requiredQuantity, reduction.excludedVendorNames)
        );

        let missingPartsCount = 0;
        let totalCost = 0;
        const vendorNames = new Set<string>();
        for (const selection of selections) {
            if (selection.kind === 'selected') {
                totalCost += selection.totalCost;
                vendorNames.add(selection.vendorQuote.vendorName);
            } else {
                missingPartsCount++;
                Logger.warn(`[OrderAggregator] No vendor parts found for part '${selection.choicePartName}'`, {
                    requiredQuantity: selection.requiredQuantity,
                });
            }
        }

        Logger.info('[OrderAggregator] Order processed', {
            boards: this.boards.length,
            choiceParts: lines.length,
            missingPartsCount,
            errorCount,
            quoteFailureCount,
            vendors: vendorNames.size,
            totalCost: Number(totalCost.toFixed(2)),
        });

        return {
            lines,
            selections,
            missingPartsCount,
            errorCount,
            quoteFailureCount,
            excludedVendorNames: [...reduction.excludedVendorNames].sort(),
            vendorReductions: [...explicitMessages, ...reduction.messages],
            totalCost,
            vendorNames: [...vendorNames].sort(),
        };
    }

    private boardOrder(): Board[] {
        return [...this.boards].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    }

    private collectChoiceParts(resolver: PartResolver): { choiceParts: ChoicePart[]; errorCount: number } {
        const { catalog } = this.context;
        const choiceTable = new Map<string, ChoicePart>();
        let errorCount = 0;

        for (const board of this.boardOrder()) {
            const boardParts = [...board.parts].sort((a, b) => compareReferences(a.reference, b.reference));
            for (const boardPart of boardParts) {
                const schematicPart = catalog.lookup(boardPart.schematicPartName);
                if (!schematicPart) {
                    const error = new UnresolvedSchematicPartError(boardPart.schematicPartName, {
                        boardName: board.name,
                        reference: boardPart.reference,
                    });
                    Logger.error(`[OrderAggregator] ${error.message}`, error.toJSON());
                    errorCount++;
                    continue;
                }

                for (const resolved of resolver.resolveWithOrigin(schematicPart)) {
                    if (!choiceTable.has(resolved.choicePart.name)) {
                        choiceTable.set(resolved.choicePart.name, resolved.choicePart);
                    }
                    resolver.attach(resolved, boardPart, board.count);
                }
            }
        }

        const choiceParts = [...choiceTable.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
        return { choiceParts, errorCount };
    }

    /**
     * Make sure every actual part has its quotes: cache first, provider
     * otherwise, writing each fetch through to the cache. Each part is
     * fetched at most once. Returns the number of failed fetches.
     */
    private async loadQuotes(choiceParts: ChoicePart[]): Promise<number> {
        const { catalog, quoteCache } = this.context;
        const visited = new Set<string>();
        let failures = 0;

        for (const choicePart of choiceParts) {
            for (const actualPart of catalog.actualPartsOf(choicePart)) {
                if (visited.has(actualPart.id)) continue;
                visited.add(actualPart.id);

                const cached = quoteCache.get(actualPart);
                if (cached) {
                    catalog.attachQuotes(actualPart, cached);
                    continue;
                }

                try {
                    const quotes = await this.quoteProvider.fetch(actualPart);
                    quoteCache.put(actualPart, quotes);
                    catalog.attachQuotes(actualPart, quotes);
                    if (quotes.length === 0) {
                        Logger.warn(`[OrderAggregator] No quotes for '${actualPart.manufacturerName} ${actualPart.manufacturerPartName}'`, {
                            provider: this.quoteProvider.name,
                        });
                    }
                } catch (cause) {
                    failures++;
                    const error = new QuoteProviderError(actualPart.id, cause);
                    Logger.warn(`[OrderAggregator] ${error.message}; treating as no quotes`, {
                        ...error.toJSON(),
                        cause: cause instanceof Error ? cause.message : String(cause),
                    });
                }
            }
        }

        await quoteCache.save();
        return failures;
    }

    private referencesOf(resolver: PartResolver, choicePart: ChoicePart): BoardReference[] {
        return resolver.usesOf(choicePart)
            .map((use) => ({
                boardName: this.boards[use.boardPart.board].name,
                reference: use.boardPart.reference,
                install: use.boardPart.install,
            }))
            .sort((a, b) =>
                a.boardName < b.boardName ? -1 : a.boardName > b.boardName ? 1 : compareReferences(a.reference, b.reference)
            );
    }
}
