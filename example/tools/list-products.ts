/**
 * List Products Tool
 *
 * Pages through the catalog. Pages are capped at MAX_PAGE_SIZE entries;
 * asking for more is rejected, and the rejection tells the caller the cap.
 * A limit of 0 is valid and returns an empty page.
 */

import { z } from 'zod';
import { nonNegativeInteger } from '../../patterns/06-tool-validation.js';
import type { ProductPage } from './data.js';
import { MAX_PAGE_SIZE } from './resource-store.js';
import type { StoreTool } from './store-tool.js';

const listProductsInput = z.object({
  offset: nonNegativeInteger.default(0),
  limit: nonNegativeInteger.default(MAX_PAGE_SIZE),
});

export type ListProductsArgs = z.output<typeof listProductsInput>;

export const listProductsTool: StoreTool<'list_products', typeof listProductsInput, ProductPage> = {
  name: 'list_products',
  description:
    'List products in catalog order with pagination. Returns sku, name, price, category and ' +
    'available units for each product, plus nextOffset (null when there are no more pages).',
  parameters: {
    type: 'object',
    properties: {
      offset: {
        type: 'integer',
        description: 'Index of the first product to return (default: 0)',
        minimum: 0,
      },
      limit: {
        type: 'integer',
        description: 'Maximum number of products to return',
        minimum: 0,
      },
    },
    required: [],
  },
  input: listProductsInput,
  run: (store, { offset, limit }) => store.listProducts(offset, limit),
};
