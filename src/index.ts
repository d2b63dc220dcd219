export * from './types/parts';
export * from './utils/errors';
export { Logger } from './utils/logger';
export { loadOrderConfig, type OrderConfig } from './utils/env';
export { parseSchematicPartName, parsePriceBreaks, formatPriceBreaks, compareReferences } from './utils/partNames';
export { toUsd } from './utils/currency';
export { retryWithBackoff, isRetryableError, type RetryOptions } from './utils/retryWithBackoff';
export * from './config/limits';

export * from './services/PartCatalog';
export * from './services/PartResolver';
export * from './services/QuoteCache';
export * from './services/ChoicePartSelector';
export * from './services/VendorPriorityTable';
export * from './services/VendorSetOptimizer';
export * from './services/OrderContext';
export * from './services/OrderAggregator';
export * from './services/OrderReportService';
export * from './services/CatalogLoader';
export type { QuoteProvider } from './services/quotes/QuoteProvider';
export { StaticQuoteProvider, type QuoteSheetRow } from './services/quotes/StaticQuoteProvider';
export { RetryingQuoteProvider } from './services/quotes/RetryingQuoteProvider';
