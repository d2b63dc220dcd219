/**
 * Run one order from JSON definitions and log the cheapest vendor split.
 *
 * Usage: npm run order -- <catalog.json> <order.json> <quotes.json>
 */

import dotenv from 'dotenv';
dotenv.config({ quiet: true });

import { Logger } from '../utils/logger';
import { loadOrderConfig } from '../utils/env';
import { CatalogLoader } from '../services/CatalogLoader';
import { loadOrderContext } from '../services/OrderContext';
import { OrderAggregator } from '../services/OrderAggregator';
import { OrderReportService } from '../services/OrderReportService';
import { RetryingQuoteProvider } from '../services/quotes/RetryingQuoteProvider';
import { StaticQuoteProvider } from '../services/quotes/StaticQuoteProvider';

async function main() {
    const [catalogPath, orderPath, quotesPath] = process.argv.slice(2);
    if (!catalogPath || !orderPath || !quotesPath) {
        throw new Error('Usage: runOrder <catalog.json> <order.json> <quotes.json>');
    }

    const config = loadOrderConfig();

    const context = await loadOrderContext(config);
    await CatalogLoader.loadCatalogFile(context.catalog, catalogPath, config.exchangeRates);
    const order = await CatalogLoader.loadOrderFile(orderPath);
    const rows = await CatalogLoader.loadQuoteSheetFile(quotesPath, config.exchangeRates);

    const aggregator = new OrderAggregator(context, new RetryingQuoteProvider(new StaticQuoteProvider(rows)));
    for (const board of order.boards) {
        aggregator.addBoard(board);
    }
    for (const vendorName of order.excludeVendors) {
        aggregator.excludeVendor(vendorName);
    }
    if (order.vendorAllowList) {
        aggregator.restrictVendors(order.vendorAllowList);
    }

    const result = await aggregator.process();

    for (const row of OrderReportService.bomRows(result, 'vendor')) {
        Logger.info(`[runOrder] ${row.choicePartName}`, {
            vendor: row.vendorName || null,
            vendorPart: row.vendorPartName || null,
            orderQuantity: row.orderQuantity,
            cost: Number(row.totalCost.toFixed(2)),
            priceBreaks: row.priceBreaks,
            references: row.references,
        });
    }
    Logger.info('[runOrder] Summary', { ...OrderReportService.summarize(result) });

    if (result.missingPartsCount > 0 || result.errorCount > 0) {
        process.exitCode = 1;
    }
}

main().catch((error) => {
    Logger.error('[runOrder] Order run failed', {
        error: error instanceof Error ? error.message : String(error),
    });
    process.exitCode = 1;
});
