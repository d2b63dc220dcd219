import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PartCatalog } from '../PartCatalog';
import { PartResolver } from '../PartResolver';
import { InconsistentFractionalDenominatorError } from '../../utils/errors';
import type { BoardPart, ChoicePart, SchematicPart } from '../../types/parts';

vi.mock('../../utils/logger', () => ({
    Logger: {
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        debug: vi.fn(),
    },
}));

function boardPart(reference: string, schematicPartName: string): BoardPart {
    return { board: 0, reference, schematicPartName, comment: '', install: true };
}

function choice(catalog: PartCatalog, name: string): ChoicePart {
    return catalog.registerChoicePart({
        name,
        footprint: 'FP',
        actualParts: [{ manufacturerName: 'Acme', manufacturerPartName: name }],
    });
}

function lookup(catalog: PartCatalog, name: string): SchematicPart {
    const part = catalog.lookup(name);
    if (!part) throw new Error(`missing ${name}`);
    return part;
}

describe('PartResolver', () => {
    let catalog: PartCatalog;
    let resolver: PartResolver;
    let header: ChoicePart;

    beforeEach(() => {
        catalog = new PartCatalog();
        header = choice(catalog, 'M1x40;M1x40');
        catalog.registerFractionalPart({
            name: 'M1x6;M1x6', footprint: 'FP6', wholePartName: 'M1x40;M1x40', numerator: 6, denominator: 40,
        });
        catalog.registerFractionalPart({
            name: 'M1x10;M1x10', footprint: 'FP10', wholePartName: 'M1x40;M1x40', numerator: 10, denominator: 40,
        });
        resolver = new PartResolver(catalog);
    });

    /** Resolve a schematic part and attach it to one board part on `count` boards. */
    function use(name: string, count: number, reference = 'J1'): void {
        for (const resolved of resolver.resolveWithOrigin(lookup(catalog, name))) {
            resolver.attach(resolved, boardPart(reference, name), count);
        }
    }

    describe('resolve', () => {
        it('returns a choice part as itself', () => {
            expect(resolver.resolve(header)).toEqual([header]);
        });

        it('expands alias targets with repetition, recursively', () => {
            const a = choice(catalog, 'A;Z');
            const b = choice(catalog, 'B;W');
            catalog.registerAliasPart('AL;X', ['A;Z', [2, 'B;W']]);
            catalog.registerAliasPart('OUTER;X', ['AL;X', 'M1x6;M1x6']);

            expect(resolver.resolve(lookup(catalog, 'AL;X'))).toEqual([a, b, b]);
            expect(resolver.resolve(lookup(catalog, 'OUTER;X')).map((part) => part.name))
                .toEqual(['A;Z', 'B;W', 'B;W', 'M1x40;M1x40']);
        });

        it('registers a fractional part on its whole part once', () => {
            const slice = lookup(catalog, 'M1x6;M1x6');
            resolver.resolve(slice);
            resolver.resolve(slice);

            expect(resolver.fractionalPartsOf(header).map((part) => part.name)).toEqual(['M1x6;M1x6']);
        });
    });

    describe('requiredQuantity', () => {
        it('sums board counts for plain uses', () => {
            const resistor = choice(catalog, '10K;1608');
            use('10K;1608', 10, 'R1');
            use('10K;1608', 10, 'R2');
            use('10K;1608', 5, 'R7');

            expect(resolver.requiredQuantity(resistor)).toBe(25);
        });

        it('counts each alias repetition as its own use', () => {
            const b = choice(catalog, 'B;W');
            catalog.registerAliasPart('AL;X', [[2, 'B;W']]);
            use('AL;X', 3);

            expect(resolver.usesOf(b)).toHaveLength(2);
            expect(resolver.requiredQuantity(b)).toBe(6);
        });

        it('packs 6/40 slices on 10 boards into 2 headers', () => {
            use('M1x6;M1x6', 10);
            expect(resolver.requiredQuantity(header)).toBe(2);
        });

        it('packs 10/40 slices on 9 boards into 3 headers', () => {
            use('M1x10;M1x10', 9);
            expect(resolver.requiredQuantity(header)).toBe(3);
        });

        it('gives a direct use a whole unit alongside slices', () => {
            use('M1x40;M1x40', 1, 'J1');
            use('M1x6;M1x6', 1, 'J2');

            expect(resolver.requiredQuantity(header)).toBe(2);
        });

        it('rejects slices with different denominators', () => {
            catalog.registerFractionalPart({
                name: 'M1x8;M1x8', footprint: 'FP8', wholePartName: 'M1x40;M1x40', numerator: 8, denominator: 20,
            });
            use('M1x6;M1x6', 1, 'J1');
            use('M1x8;M1x8', 1, 'J2');

            expect(() => resolver.requiredQuantity(header)).toThrow(InconsistentFractionalDenominatorError);
        });

        it('is zero for a part nothing uses', () => {
            expect(resolver.requiredQuantity(header)).toBe(0);
        });
    });
});
