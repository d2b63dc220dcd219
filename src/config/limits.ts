/**
 * Centralized Configuration: Limits & Thresholds
 *
 * Ordering constants live here so the optimizer and cache read named values
 * instead of literals. Runtime overrides come from the environment (see utils/env).
 */


export const ORDER_LIMITS = {
    /** Assumed per-vendor shipping cost in USD; smaller savings do not justify another vendor */
    SHIPPING_THRESHOLD: 15,
    /** First priority handed to a vendor that has no configured priority */
    AUTO_PRIORITY_START: 10,
    /** Stock assumed for quotes declared directly in the catalog */
    DECLARED_QUOTE_STOCK: 1_000_000,
} as const;


export const QUOTE_CACHE_LIMITS = {
    /** Quotes older than this are dropped on load (2 days) */
    TTL_SECONDS: 2 * 24 * 60 * 60,
    /** Persisted schema version */
    FORMAT_VERSION: 1,
    /** Default cache file, relative to the working directory */
    DEFAULT_PATH: 'bom_quotes.json',
} as const;


/**
 * Minimum order totals (USD) for vendors with serious minimums.
 * A vendor whose selected lines total less than this is excluded.
 */
export const DEFAULT_VENDOR_MINIMUMS: Readonly<Record<string, number>> = {
    'Verical': 100.0,
    'Chip1Stop': 100.0,
};


/**
 * Vendor priorities. Lower is considered for exclusion first.
 *
 * 0-9     vendors with significant minimums or trans-oceanic shipping
 * 10-999  auto-assigned in the order vendors are first seen
 * 1000+   explicitly preferred vendors
 */
export const DEFAULT_VENDOR_PRIORITIES: Readonly<Record<string, number>> = {
    'Verical': 0,
    'Chip1Stop': 1,
    'Farnell element14': 2,
    'element14 Asia-Pacific': 2,
    'Arrow': 1000,
    'Avnet Express': 1001,
    'Newark': 1002,
    'Mouser': 1003,
    'Digi-Key': 1004,
};


export const RETRY_DEFAULTS = {
    MAX_RETRIES: 3,
    BASE_DELAY_MS: 1_000,
    MAX_DELAY_MS: 30_000,
} as const;
