import { Logger } from '../utils/logger';
import { BomError, InconsistentFractionalDenominatorError } from '../utils/errors';
import type { PartCatalog } from './PartCatalog';
import type { BoardPart, ChoicePart, FractionalPart, SchematicPart } from '../types/parts';

/** A choice part reached from a schematic part, and the fractional part on the way (if any) */
export interface ResolvedChoice {
    choicePart: ChoicePart;
    via?: FractionalPart;
}

/** One placement of a choice part on a board design */
export interface ChoicePartUse {
    boardPart: BoardPart;
    /** Copied from the board; quantity math needs nothing else from it */
    boardCount: number;
    via?: FractionalPart;
}

/**
 * Flattens alias and fractional parts into choice parts and keeps the
 * per-run back-references (board uses, fractional slices) that quantity
 * accounting needs. One resolver per order run.
 */
export class PartResolver {
    private readonly fractionalParts = new Map<string, FractionalPart[]>();
    private readonly uses = new Map<string, ChoicePartUse[]>();

    constructor(private readonly catalog: PartCatalog) { }

    resolve(part: SchematicPart): ChoicePart[] {
        return this.resolveWithOrigin(part).map((resolved) => resolved.choicePart);
    }

    resolveWithOrigin(part: SchematicPart): ResolvedChoice[] {
        switch (part.kind) {
            case 'choice':
                return [{ choicePart: part }];

            case 'alias': {
                const resolved: ResolvedChoice[] = [];
                for (const target of part.targets) {
                    const targetPart = this.catalog.lookup(target.partName);
                    if (!targetPart) {
                        Logger.warn(`[PartResolver] Alias '${part.name}' points at unknown part '${target.partName}'`);
                        continue;
                    }
                    for (let i = 0; i < target.count; i++) {
                        resolved.push(...this.resolveWithOrigin(targetPart));
                    }
                }
                return resolved;
            }

            case 'fractional': {
                const choicePart = this.catalog.lookupChoicePart(part.choicePartName);
                if (!choicePart) {
                    throw new BomError(`Fractional part '${part.name}' is cut from unknown part '${part.choicePartName}'`, {
                        code: 'UNKNOWN_WHOLE_PART',
                        context: { fractionalPartName: part.name, choicePartName: part.choicePartName },
                    });
                }
                const registered = this.fractionalParts.get(choicePart.name) ?? [];
                if (!registered.includes(part)) {
                    registered.push(part);
                    this.fractionalParts.set(choicePart.name, registered);
                }
                return [{ choicePart, via: part }];
            }

            default: {
                const unreachable: never = part;
                throw new Error(`Unknown schematic part ${JSON.stringify(unreachable)}`);
            }
        }
    }

    /** Record that a board part consumes one instance of a resolved choice part. */
    attach(resolved: ResolvedChoice, boardPart: BoardPart, boardCount: number): void {
        const name = resolved.choicePart.name;
        const uses = this.uses.get(name) ?? [];
        uses.push({ boardPart, boardCount, via: resolved.via });
        this.uses.set(name, uses);
    }

    usesOf(choicePart: ChoicePart): readonly ChoicePartUse[] {
        return this.uses.get(choicePart.name) ?? [];
    }

    fractionalPartsOf(choicePart: ChoicePart): readonly FractionalPart[] {
        return this.fractionalParts.get(choicePart.name) ?? [];
    }

    /**
     * Units of a choice part to buy for every attached use.
     *
     * Fractional slices are packed greedily: a slice that no longer fits in
     * the current whole part starts a new one, since a cut piece cannot span
     * two parts. A use that reaches the part directly takes a whole unit.
     *
     * @throws InconsistentFractionalDenominatorError when slices disagree on the denominator
     */
    requiredQuantity(choicePart: ChoicePart): number {
        const uses = this.usesOf(choicePart);
        const fractionalParts = this.fractionalPartsOf(choicePart);

        if (fractionalParts.length === 0) {
            return uses.reduce((sum, use) => sum + use.boardCount, 0);
        }

        const [first, ...others] = fractionalParts;
        for (const other of others) {
            if (other.denominator !== first.denominator) {
                throw new InconsistentFractionalDenominatorError(
                    choicePart.name,
                    { name: first.name, denominator: first.denominator },
                    { name: other.name, denominator: other.denominator }
                );
            }
        }

        const denominator = first.denominator;
        let units = 0;
        let remainder = 0;
        for (const use of uses) {
            const numerator = use.via?.numerator ?? denominator;
            for (let i = 0; i < use.boardCount; i++) {
                if (remainder + numerator > denominator) {
                    units++;
                    remainder = 0;
                }
                remainder += numerator;
            }
        }
        if (remainder > 0) {
            units++;
        }
        return units;
    }
}
