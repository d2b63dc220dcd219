import { retryWithBackoff, type RetryOptions } from '../../utils/retryWithBackoff';
import type { QuoteProvider } from './QuoteProvider';
import type { ActualPart, VendorQuote } from '../../types/parts';

/**
 * Decorates a provider with exponential-backoff retries on transient
 * failures (429, 5xx, network resets). The order run treats a final
 * failure as no quotes.
 */
export class RetryingQuoteProvider implements QuoteProvider {
    readonly name: string;

    constructor(
        private readonly inner: QuoteProvider,
        private readonly retryOptions: Omit<RetryOptions, 'context'> = {}
    ) {
        this.name = `${inner.name}+retry`;
    }

    fetch(actualPart: ActualPart): Promise<VendorQuote[]> {
        return retryWithBackoff(() => this.inner.fetch(actualPart), {
            ...this.retryOptions,
            context: `${this.inner.name}:${actualPart.manufacturerName} ${actualPart.manufacturerPartName}`,
        });
    }
}
