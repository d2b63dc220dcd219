/**
 * Catalog Loader
 *
 * Reads JSON definitions (catalog, order, quote sheet), validates them and
 * feeds the catalog registration API. Declared prices are converted to USD
 * with the configured rate snapshot.
 */

import fs from 'fs/promises';
import { z } from 'zod';
import { Logger } from '../utils/logger';
import { CatalogDefinitionError } from '../utils/errors';
import { toUsd } from '../utils/currency';
import { parsePriceBreaks } from '../utils/partNames';
import type { PartCatalog } from './PartCatalog';
import type { BoardInput } from './OrderAggregator';
import type { QuoteSheetRow } from './quotes/StaticQuoteProvider';

const priceBreakText = z.string().transform((text, ctx) => {
    try {
        return parsePriceBreaks(text);
    } catch (error) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: error instanceof Error ? error.message : String(error) });
        return z.NEVER;
    }
});

const declaredQuoteSchema = z.object({
    vendorName: z.string().min(1),
    vendorPartName: z.string().min(1),
    priceBreaks: priceBreakText,
    currency: z.string().default('USD'),
    availableQuantity: z.number().int().nonnegative().optional(),
});

const actualPartSchema = z.object({
    manufacturerName: z.string().min(1),
    manufacturerPartName: z.string().min(1),
    quotes: z.array(declaredQuoteSchema).default([]),
});

const choicePartSchema = z.object({
    name: z.string(),
    footprint: z.string().min(1),
    location: z.string().optional(),
    description: z.string().optional(),
    placement: z.object({
        rotation: z.number(),
        pickDx: z.number(),
        pickDy: z.number(),
        height: z.number(),
    }).partial().optional(),
    actualParts: z.array(actualPartSchema).min(1),
});

const aliasPartSchema = z.object({
    name: z.string(),
    footprint: z.string().default(''),
    targets: z.array(z.union([z.string(), z.tuple([z.number().int().positive(), z.string()])])).min(1),
});

const fractionalPartSchema = z.object({
    name: z.string(),
    footprint: z.string().min(1),
    wholePartName: z.string(),
    numerator: z.number().int().positive(),
    denominator: z.number().int().positive(),
    description: z.string().optional(),
});

export const catalogDefinitionSchema = z.object({
    choiceParts: z.array(choicePartSchema).default([]),
    fractionalParts: z.array(fractionalPartSchema).default([]),
    aliasParts: z.array(aliasPartSchema).default([]),
});

export const orderDefinitionSchema = z.object({
    boards: z.array(z.object({
        name: z.string().min(1),
        revision: z.string().optional(),
        count: z.number().int().nonnegative(),
        parts: z.array(z.object({
            reference: z.string().min(1),
            schematicPartName: z.string(),
            comment: z.string().optional(),
        })),
    })).min(1),
    excludeVendors: z.array(z.string()).default([]),
    vendorAllowList: z.array(z.string()).optional(),
});

export const quoteSheetSchema = z.object({
    quotes: z.array(z.object({
        manufacturerName: z.string().min(1),
        manufacturerPartName: z.string().min(1),
        vendorName: z.string().min(1),
        vendorPartName: z.string().min(1),
        availableQuantity: z.number().int().nonnegative(),
        priceBreaks: priceBreakText,
        currency: z.string().default('USD'),
    })),
});

export type CatalogDefinition = z.infer<typeof catalogDefinitionSchema>;
export type OrderDefinition = z.infer<typeof orderDefinitionSchema>;

export interface ParsedOrder {
    boards: BoardInput[];
    excludeVendors: string[];
    vendorAllowList?: string[];
}

function parseWith<T extends z.ZodTypeAny>(schema: T, data: unknown, source: string): z.output<T> {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
        throw new CatalogDefinitionError(
            source,
            parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        );
    }
    return parsed.data;
}

function convert(source: string, what: string, run: () => QuoteSheetRow['priceBreaks']) {
    try {
        return run();
    } catch (error) {
        throw new CatalogDefinitionError(source, [`${what}: ${error instanceof Error ? error.message : String(error)}`]);
    }
}

async function readJson(filePath: string): Promise<unknown> {
    const text = await fs.readFile(filePath, 'utf8');
    try {
        return JSON.parse(text);
    } catch (error) {
        throw new CatalogDefinitionError(filePath, [error instanceof Error ? error.message : String(error)]);
    }
}

export class CatalogLoader {
    /**
     * Register every part of a catalog definition. Choice parts go first,
     * then fractional parts, then aliases in file order (an alias may only
     * point at parts registered before it). Returns how many parts were
     * registered.
     */
    static register(
        catalog: PartCatalog,
        data: unknown,
        exchangeRates: Readonly<Record<string, number>>,
        source = '<catalog>'
    ): number {
        const definition = parseWith(catalogDefinitionSchema, data, source);
        const before = catalog.size;

        for (const choice of definition.choiceParts) {
            catalog.registerChoicePart({
                ...choice,
                actualParts: choice.actualParts.map((actual) => ({
                    manufacturerName: actual.manufacturerName,
                    manufacturerPartName: actual.manufacturerPartName,
                    quotes: actual.quotes.map((quote) => ({
                        vendorName: quote.vendorName,
                        vendorPartName: quote.vendorPartName,
                        availableQuantity: quote.availableQuantity,
                        priceBreaks: convert(source, `${choice.name} ${quote.vendorPartName}`,
                            () => toUsd(quote.priceBreaks, quote.currency, exchangeRates)),
                    })),
                })),
            });
        }
        for (const fractional of definition.fractionalParts) {
            catalog.registerFractionalPart(fractional);
        }
        for (const alias of definition.aliasParts) {
            catalog.registerAliasPart(alias.name, alias.targets, alias.footprint);
        }

        const duplicates = catalog.indexActualParts();
        const registered = catalog.size - before;
        Logger.info('[CatalogLoader] Catalog registered', { source, registered, duplicateActualParts: duplicates });
        return registered;
    }

    static parseOrder(data: unknown, source = '<order>'): ParsedOrder {
        const definition = parseWith(orderDefinitionSchema, data, source);
        return {
            boards: definition.boards,
            excludeVendors: definition.excludeVendors,
            vendorAllowList: definition.vendorAllowList,
        };
    }

    static parseQuoteSheet(
        data: unknown,
        exchangeRates: Readonly<Record<string, number>>,
        source = '<quote sheet>'
    ): QuoteSheetRow[] {
        const sheet = parseWith(quoteSheetSchema, data, source);
        return sheet.quotes.map((row) => ({
            manufacturerName: row.manufacturerName,
            manufacturerPartName: row.manufacturerPartName,
            vendorName: row.vendorName,
            vendorPartName: row.vendorPartName,
            availableQuantity: row.availableQuantity,
            priceBreaks: convert(source, `${row.vendorName} ${row.vendorPartName}`,
                () => toUsd(row.priceBreaks, row.currency, exchangeRates)),
        }));
    }

    static async loadCatalogFile(catalog: PartCatalog, filePath: string, exchangeRates: Readonly<Record<string, number>>): Promise<number> {
        return CatalogLoader.register(catalog, await readJson(filePath), exchangeRates, filePath);
    }

    static async loadOrderFile(filePath: string): Promise<ParsedOrder> {
        return CatalogLoader.parseOrder(await readJson(filePath), filePath);
    }

    static async loadQuoteSheetFile(filePath: string, exchangeRates: Readonly<Record<string, number>>): Promise<QuoteSheetRow[]> {
        return CatalogLoader.parseQuoteSheet(await readJson(filePath), exchangeRates, filePath);
    }
}
