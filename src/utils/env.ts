/**
 * Environment Validation
 *
 * Parses the ordering configuration into a typed object, with defaults
 * for unset variables. Fails fast on malformed values.
 */

import { z } from 'zod';
import { Logger } from './logger';
import {
    DEFAULT_VENDOR_MINIMUMS,
    DEFAULT_VENDOR_PRIORITIES,
    ORDER_LIMITS,
    QUOTE_CACHE_LIMITS,
} from '../config/limits';

const positiveNumber = z.coerce.number().finite().positive();

const envSchema = z.object({
    QUOTE_CACHE_PATH: z.string().min(1).default(QUOTE_CACHE_LIMITS.DEFAULT_PATH),
    QUOTE_CACHE_TTL_HOURS: positiveNumber.default(QUOTE_CACHE_LIMITS.TTL_SECONDS / 3600),
    SHIPPING_THRESHOLD: z.coerce.number().finite().nonnegative().default(ORDER_LIMITS.SHIPPING_THRESHOLD),
    EUR_TO_USD: positiveNumber.default(1),
    GBP_TO_USD: positiveNumber.default(1),
    NEVER_EXCLUDE_VENDOR: z.string().optional().transform((value) => value?.trim() || undefined),
});

export interface OrderConfig {
    quoteCachePath: string;
    quoteCacheTtlSeconds: number;
    shippingThreshold: number;
    /** Vendor the shipping pass never excludes automatically; none by default */
    neverExcludeVendor?: string;
    vendorMinimums: Readonly<Record<string, number>>;
    vendorPriorities: Readonly<Record<string, number>>;
    autoPriorityStart: number;
    /** USD per unit of each supported currency */
    exchangeRates: Readonly<Record<string, number>>;
}

/**
 * Build the ordering configuration from the environment.
 * Empty strings count as unset.
 */
export function loadOrderConfig(env: NodeJS.ProcessEnv = process.env): OrderConfig {
    const raw = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
    );
    const parsed = envSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        Logger.error('[ENV] Invalid order configuration', { issues });
        throw new Error(`Invalid order configuration: ${issues.join(', ')}`);
    }

    const values = parsed.data;
    return {
        quoteCachePath: values.QUOTE_CACHE_PATH,
        quoteCacheTtlSeconds: Math.round(values.QUOTE_CACHE_TTL_HOURS * 3600),
        shippingThreshold: values.SHIPPING_THRESHOLD,
        neverExcludeVendor: values.NEVER_EXCLUDE_VENDOR,
        vendorMinimums: DEFAULT_VENDOR_MINIMUMS,
        vendorPriorities: DEFAULT_VENDOR_PRIORITIES,
        autoPriorityStart: ORDER_LIMITS.AUTO_PRIORITY_START,
        exchangeRates: {
            USD: 1,
            EUR: values.EUR_TO_USD,
            GBP: values.GBP_TO_USD,
        },
    };
}
