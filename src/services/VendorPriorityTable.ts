/**
 * Tie-break order for vendor exclusion: lower priorities are considered
 * first. Vendors without a configured priority get the next free number
 * the first time they are seen, so the order is stable within a run.
 */
export class VendorPriorityTable {
    private readonly priorities: Map<string, number>;
    private nextPriority: number;

    constructor(seed: Readonly<Record<string, number>>, autoStart: number) {
        this.priorities = new Map(Object.entries(seed));
        this.nextPriority = autoStart;
    }

    priorityOf(vendorName: string): number {
        const known = this.priorities.get(vendorName);
        if (known !== undefined) return known;

        const assigned = this.nextPriority++;
        this.priorities.set(vendorName, assigned);
        return assigned;
    }
}
