import { PartCatalog } from './PartCatalog';
import { QuoteCache } from './QuoteCache';
import { VendorPriorityTable } from './VendorPriorityTable';
import type { OrderConfig } from '../utils/env';

/**
 * Everything one order run shares: configuration, the part catalog, the
 * quote cache and the vendor priority table. Built once per run and passed
 * down explicitly.
 */
export interface OrderContext {
    config: OrderConfig;
    catalog: PartCatalog;
    quoteCache: QuoteCache;
    priorities: VendorPriorityTable;
}

export function createOrderContext(
    config: OrderConfig,
    deps: { catalog?: PartCatalog; quoteCache?: QuoteCache } = {}
): OrderContext {
    return {
        config,
        catalog: deps.catalog ?? new PartCatalog(),
        quoteCache: deps.quoteCache ?? QuoteCache.inMemory({ ttlSeconds: config.quoteCacheTtlSeconds }),
        priorities: new VendorPriorityTable(config.vendorPriorities, config.autoPriorityStart),
    };
}

/** Load the quote cache named in the config and build the context around it. */
export async function loadOrderContext(config: OrderConfig, catalog = new PartCatalog()): Promise<OrderContext> {
    const quoteCache = await QuoteCache.load(config.quoteCachePath, { ttlSeconds: config.quoteCacheTtlSeconds });
    return createOrderContext(config, { catalog, quoteCache });
}
