/**
 * Catalog Data and Result Shapes
 *
 * Loads the seed catalog from JSON and defines the shapes every store
 * operation returns. The result schemas double as parsers for proposers,
 * which only ever see payloads as `unknown` inside the step history.
 *
 * DATA FILES (loaded by this module):
 *   ../data/catalog.json - 8 products, two of them GPUs
 *     - gpu-h100: 3 available, gpu-a100: 4 available
 *     - the rest pad the catalog so it takes three pages to list
 */

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { formatIssues } from '../../patterns/06-tool-validation.js';

// =============================================================================
// SEED
// =============================================================================

export const productSchema = z.object({
  sku: z.string().trim().min(1),
  name: z.string().min(1),
  price: z.number().nonnegative(),
  category: z.string().min(1),
});

export type Product = Readonly<z.infer<typeof productSchema>>;

export const catalogSeedSchema = z.object({
  products: z.array(
    productSchema.extend({
      available: z.number().int().nonnegative(),
    })
  ),
});

export type CatalogSeed = z.infer<typeof catalogSeedSchema>;

export class InvalidCatalogError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid catalog seed: ${issues.join('; ')}`);
    this.name = 'InvalidCatalogError';
  }
}

/**
 * Validate a seed: shape, non-negative inventory and unique SKUs.
 */
export function parseCatalogSeed(input: unknown): CatalogSeed {
  const parsed = catalogSeedSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidCatalogError(formatIssues(parsed.error));
  }

  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const product of parsed.data.products) {
    if (seen.has(product.sku)) duplicates.push(`duplicate sku "${product.sku}"`);
    seen.add(product.sku);
  }
  if (duplicates.length > 0) {
    throw new InvalidCatalogError(duplicates);
  }

  return parsed.data;
}

function getDataPath(filename: string): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  return join(__dirname, '..', 'data', filename);
}

/**
 * Load the default seed. Read fresh on every call: a session gets its own
 * snapshot and never shares inventory with another by accident.
 */
export function loadCatalogSeed(filename = 'catalog.json'): CatalogSeed {
  const data = readFileSync(getDataPath(filename), 'utf-8');
  return parseCatalogSeed(JSON.parse(data));
}

// =============================================================================
// RESULT SHAPES
// =============================================================================

export const listingEntrySchema = productSchema.extend({
  available: z.number().int().nonnegative(),
});

export type ListingEntry = z.infer<typeof listingEntrySchema>;

export const productPageSchema = z.object({
  products: z.array(listingEntrySchema),
  /** `null` means there are no more pages. */
  nextOffset: z.number().int().nonnegative().nullable(),
});

export type ProductPage = z.infer<typeof productPageSchema>;

export const basketLineSchema = z.object({
  sku: z.string(),
  name: z.string(),
  quantity: z.number().int().positive(),
  unitPrice: z.number().nonnegative(),
});

export type BasketLine = z.infer<typeof basketLineSchema>;

export const basketViewSchema = z.object({
  items: z.array(basketLineSchema),
  total: z.number().nonnegative(),
});

export type BasketView = z.infer<typeof basketViewSchema>;

export const checkoutReceiptSchema = z.object({
  message: z.literal('ok'),
  purchased: z.array(basketLineSchema),
  total: z.number().nonnegative(),
});

export type CheckoutReceipt = z.infer<typeof checkoutReceiptSchema>;

export interface Acknowledgement {
  message: 'ok';
}
