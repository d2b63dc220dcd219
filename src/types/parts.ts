/**
 * Part graph and quote types.
 *
 * Schematic parts are named "<base_name>;<short_footprint>[:comment]".
 * The short footprint only has to disambiguate the footprints used with
 * one base name (1608, QFP100, SOIC20...).
 */

export interface PriceBreak {
    /** Smallest order quantity that gets this price */
    minQuantity: number;
    unitPrice: number;
}

export interface ActualPartKey {
    manufacturerName: string;
    manufacturerPartName: string;
}

export interface VendorQuote {
    actualPart: ActualPartKey;
    vendorName: string;
    vendorPartName: string;
    availableQuantity: number;
    /** Ascending by minQuantity */
    priceBreaks: PriceBreak[];
    /** Epoch seconds */
    fetchedAt: number;
}

export interface ActualPart extends Readonly<ActualPartKey> {
    readonly id: string;
    /** Grows as quotes arrive; unique by (vendorName, vendorPartName) */
    readonly quotes: VendorQuote[];
}

export interface Placement {
    /** Degrees */
    rotation: number;
    pickDx: number;
    pickDy: number;
    /** Millimeters */
    height: number;
}

interface SchematicPartBase {
    name: string;
    baseName: string;
    shortFootprint: string;
    comment?: string;
    /** Full footprint identifier handed to PCB layout */
    footprint: string;
}

export interface ChoicePart extends SchematicPartBase {
    kind: 'choice';
    location: string;
    description: string;
    /** Ids of acceptable manufacturer parts, in preference order */
    actualPartIds: string[];
    placement: Placement;
}

export interface AliasTarget {
    count: number;
    partName: string;
}

export interface AliasPart extends SchematicPartBase {
    kind: 'alias';
    targets: AliasTarget[];
}

export interface FractionalPart extends SchematicPartBase {
    kind: 'fractional';
    choicePartName: string;
    numerator: number;
    denominator: number;
    description: string;
}

export type SchematicPart = ChoicePart | AliasPart | FractionalPart;

export type SchematicPartKind = SchematicPart['kind'];

/** Index into the order's board list */
export type BoardHandle = number;

export interface BoardPart {
    board: BoardHandle;
    /** Schematic reference such as "R123" */
    reference: string;
    schematicPartName: string;
    comment: string;
    install: boolean;
}

export interface Board {
    name: string;
    revision: string;
    /** Number of boards to build */
    count: number;
    parts: BoardPart[];
}

export interface SelectionResult {
    kind: 'selected';
    choicePartName: string;
    requiredQuantity: number;
    actualPart: ActualPart;
    vendorQuote: VendorQuote;
    priceBreakIndex: number;
    orderQuantity: number;
    totalCost: number;
}

export interface Unfulfillable {
    kind: 'unfulfillable';
    choicePartName: string;
    requiredQuantity: number;
}

export type Selection = SelectionResult | Unfulfillable;

export interface BoardReference {
    boardName: string;
    reference: string;
    install: boolean;
}

/** A deduplicated choice part with everything the selector needs */
export interface OrderLine {
    choicePart: ChoicePart;
    requiredQuantity: number;
    references: BoardReference[];
}
