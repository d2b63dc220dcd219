/**
 * Part Catalog
 *
 * Name-keyed store of every schematic part plus the deduplicated set of
 * manufacturer parts they reference. Populated once per run through the
 * register* calls; only quote lists change afterwards.
 */

import { Logger } from '../utils/logger';
import { CatalogDefinitionError } from '../utils/errors';
import { actualPartId, parseSchematicPartName, vendorQuoteId } from '../utils/partNames';
import { ORDER_LIMITS } from '../config/limits';
import type {
    ActualPart,
    AliasPart,
    AliasTarget,
    ChoicePart,
    FractionalPart,
    Placement,
    PriceBreak,
    SchematicPart,
    VendorQuote,
} from '../types/parts';

/** A quote written into the catalog by hand rather than fetched */
export interface DeclaredQuote {
    vendorName: string;
    vendorPartName: string;
    priceBreaks: PriceBreak[];
    availableQuantity?: number;
}

export interface ActualPartDefinition {
    manufacturerName: string;
    manufacturerPartName: string;
    quotes?: DeclaredQuote[];
}

export interface ChoicePartDefinition {
    name: string;
    footprint: string;
    location?: string;
    description?: string;
    placement?: Partial<Placement>;
    actualParts: ActualPartDefinition[];
}

export interface FractionalPartDefinition {
    name: string;
    footprint: string;
    wholePartName: string;
    numerator: number;
    denominator: number;
    description?: string;
}

/** "A;Z" means one of A;Z, [2, "B;W"] means two */
export type AliasTargetSpec = string | [number, string];

const DEFAULT_PLACEMENT: Placement = { rotation: 0, pickDx: 0, pickDy: 0, height: 0 };

export class PartCatalog {
    private readonly schematicParts = new Map<string, SchematicPart>();
    private readonly actualParts = new Map<string, ActualPart>();
    /** Actual parts created by registration, waiting for indexActualParts() */
    private pending: Array<{ choicePartName: string; actualPart: ActualPart }> = [];

    get size(): number {
        return this.schematicParts.size;
    }

    registerChoicePart(definition: ChoicePartDefinition): ChoicePart {
        const parsed = parseSchematicPartName(definition.name);
        const existing = this.schematicParts.get(definition.name);
        if (existing) {
            this.warnDuplicate(definition.name);
            if (existing.kind === 'choice') return existing;
        }

        const actualParts = definition.actualParts.map((actual) => this.buildActualPart(actual));
        const choicePart: ChoicePart = {
            kind: 'choice',
            name: definition.name,
            ...parsed,
            footprint: definition.footprint,
            location: definition.location ?? '',
            description: definition.description ?? '',
            placement: { ...DEFAULT_PLACEMENT, ...definition.placement },
            actualPartIds: [...new Set(actualParts.map((actual) => actual.id))],
        };

        if (existing) return choicePart;

        this.schematicParts.set(choicePart.name, choicePart);
        for (const actualPart of actualParts) {
            this.pending.push({ choicePartName: choicePart.name, actualPart });
        }
        return choicePart;
    }

    registerAliasPart(name: string, targets: AliasTargetSpec[], footprint = ''): AliasPart {
        const parsed = parseSchematicPartName(name);

        const resolvedTargets: AliasTarget[] = [];
        for (const target of targets) {
            const [count, partName] = typeof target === 'string' ? [1, target] : target;
            if (!Number.isInteger(count) || count < 1) {
                throw new CatalogDefinitionError(name, [`alias target '${partName}' has count ${count}`]);
            }
            if (!this.schematicParts.has(partName)) {
                Logger.warn(`[PartCatalog] Part '${partName}' not found for alias '${name}'`);
                continue;
            }
            resolvedTargets.push({ count, partName });
        }

        const aliasPart: AliasPart = { kind: 'alias', name, ...parsed, footprint, targets: resolvedTargets };
        return this.insert(aliasPart);
    }

    /**
     * Register a slice of a whole part (e.g. 6 pins of a 40 pin break-away header).
     * Returns undefined when the whole part is unknown.
     */
    registerFractionalPart(definition: FractionalPartDefinition): FractionalPart | undefined {
        const parsed = parseSchematicPartName(definition.name);
        const { numerator, denominator } = definition;
        if (!Number.isInteger(numerator) || !Number.isInteger(denominator) || numerator < 1 || numerator > denominator) {
            throw new CatalogDefinitionError(definition.name, [
                `fraction ${numerator}/${denominator} must satisfy 1 <= numerator <= denominator`,
            ]);
        }

        const whole = this.schematicParts.get(definition.wholePartName);
        if (!whole || whole.kind !== 'choice') {
            Logger.warn(`[PartCatalog] Whole part '${definition.wholePartName}' not found for fractional part '${definition.name}'`, {
                foundKind: whole?.kind,
            });
            return undefined;
        }

        return this.insert({
            kind: 'fractional',
            name: definition.name,
            ...parsed,
            footprint: definition.footprint,
            choicePartName: whole.name,
            numerator,
            denominator,
            description: definition.description ?? '',
        });
    }

    lookup(name: string): SchematicPart | undefined {
        return this.schematicParts.get(name);
    }

    lookupChoicePart(name: string): ChoicePart | undefined {
        const part = this.schematicParts.get(name);
        return part?.kind === 'choice' ? part : undefined;
    }

    /**
     * Deduplication pass: collect every distinct actual part referenced by a
     * choice part. A repeated (manufacturer, part number) keeps the first
     * instance. Safe to call again after more registrations.
     */
    indexActualParts(): number {
        let duplicates = 0;
        for (const { choicePartName, actualPart } of this.pending) {
            if (this.actualParts.has(actualPart.id)) {
                duplicates++;
                Logger.warn(`[PartCatalog] Actual part '${actualPart.manufacturerName} ${actualPart.manufacturerPartName}' is duplicated`, {
                    choicePartName,
                });
                continue;
            }
            this.actualParts.set(actualPart.id, actualPart);
        }
        this.pending = [];
        return duplicates;
    }

    getActualPart(id: string): ActualPart | undefined {
        return this.actualParts.get(id);
    }

    actualPartsOf(choicePart: ChoicePart): ActualPart[] {
        const parts: ActualPart[] = [];
        for (const id of choicePart.actualPartIds) {
            const actualPart = this.actualParts.get(id);
            if (actualPart) parts.push(actualPart);
        }
        return parts;
    }

    /**
     * Append quotes to an actual part, skipping vendor parts it already has.
     * Returns how many were added.
     */
    attachQuotes(actualPart: ActualPart, quotes: VendorQuote[]): number {
        const known = new Set(actualPart.quotes.map(vendorQuoteId));
        let added = 0;
        for (const quote of quotes) {
            const id = vendorQuoteId(quote);
            if (known.has(id)) {
                Logger.debug('[PartCatalog] Skipping repeated vendor part', {
                    vendorName: quote.vendorName,
                    vendorPartName: quote.vendorPartName,
                });
                continue;
            }
            known.add(id);
            actualPart.quotes.push(quote);
            added++;
        }
        return added;
    }

    private buildActualPart(definition: ActualPartDefinition): ActualPart {
        const key = {
            manufacturerName: definition.manufacturerName,
            manufacturerPartName: definition.manufacturerPartName,
        };
        const actualPart: ActualPart = { ...key, id: actualPartId(key), quotes: [] };
        const declared: VendorQuote[] = (definition.quotes ?? []).map((quote) => ({
            actualPart: key,
            vendorName: quote.vendorName,
            vendorPartName: quote.vendorPartName,
            availableQuantity: quote.availableQuantity ?? ORDER_LIMITS.DECLARED_QUOTE_STOCK,
            priceBreaks: [...quote.priceBreaks].sort((a, b) => a.minQuantity - b.minQuantity),
            fetchedAt: 0,
        }));
        this.attachQuotes(actualPart, declared);
        return actualPart;
    }

    private insert<T extends SchematicPart>(part: T): T {
        if (this.schematicParts.has(part.name)) {
            this.warnDuplicate(part.name);
            return part;
        }
        this.schematicParts.set(part.name, part);
        return part;
    }

    private warnDuplicate(name: string): void {
        Logger.warn(`[PartCatalog] '${name}' is registered more than once; keeping the first`);
    }
}
