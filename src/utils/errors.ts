export class BomError extends Error {
    readonly code: string;
    readonly context?: Record<string, unknown>;
    readonly isRecoverable: boolean;

    constructor(
        message: string,
        options: {
            code?: string;
            context?: Record<string, unknown>;
            isRecoverable?: boolean;
            cause?: unknown;
        } = {}
    ) {
        super(message, { cause: options.cause });
        this.name = 'BomError';
        this.code = options.code ?? 'INTERNAL_ERROR';
        this.context = options.context;
        this.isRecoverable = options.isRecoverable ?? false;
    }


    toJSON() {
        return {
            error: this.message,
            code: this.code,
            ...(this.context ? { context: this.context } : {}),
        };
    }
}

/** Thrown at registration: the name has no single `;` between base name and footprint. */
export class InvalidSchematicPartNameError extends BomError {
    constructor(schematicPartName: string) {
        super(`Schematic part name '${schematicPartName}' must contain exactly one ';' separator`, {
            code: 'INVALID_SCHEMATIC_PART_NAME',
            context: { schematicPartName },
        });
        this.name = 'InvalidSchematicPartNameError';
    }
}

/**
 * Fractional parts cut from one choice part disagree on how many pieces
 * the whole part holds. This is a catalog modeling mistake and is never recovered.
 */
export class InconsistentFractionalDenominatorError extends BomError {
    constructor(choicePartName: string, first: { name: string; denominator: number }, other: { name: string; denominator: number }) {
        super(
            `'${first.name}' has a denominator of ${first.denominator} and '${other.name}' has one of ${other.denominator} (both cut from '${choicePartName}')`,
            {
                code: 'INCONSISTENT_FRACTIONAL_DENOMINATOR',
                context: { choicePartName, first, other },
            }
        );
        this.name = 'InconsistentFractionalDenominatorError';
    }
}

export class UnresolvedSchematicPartError extends BomError {
    constructor(schematicPartName: string, context: { boardName: string; reference: string }) {
        super(`Schematic part '${schematicPartName}' is not in the catalog`, {
            code: 'UNRESOLVED_SCHEMATIC_PART',
            context: { schematicPartName, ...context },
            isRecoverable: true,
        });
        this.name = 'UnresolvedSchematicPartError';
    }
}

export class QuoteProviderError extends BomError {
    constructor(actualPartId: string, cause: unknown) {
        super(`Quote lookup failed for ${actualPartId}`, {
            code: 'QUOTE_PROVIDER_FAILURE',
            context: { actualPartId },
            isRecoverable: true,
            cause,
        });
        this.name = 'QuoteProviderError';
    }
}

export class QuoteCacheFormatError extends BomError {
    constructor(filePath: string, reason: string) {
        super(`Quote cache '${filePath}' is unreadable: ${reason}`, {
            code: 'QUOTE_CACHE_FORMAT',
            context: { filePath },
            isRecoverable: true,
        });
        this.name = 'QuoteCacheFormatError';
    }
}

export class CatalogDefinitionError extends BomError {
    constructor(source: string, issues: string[]) {
        super(`Invalid definition in '${source}': ${issues.join('; ')}`, {
            code: 'CATALOG_DEFINITION',
            context: { source, issues },
        });
        this.name = 'CatalogDefinitionError';
    }
}
