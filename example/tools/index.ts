/**
 * Tools Index - GPU Race
 *
 * FILE LOCATIONS:
 * ───────────────────────────────────────────────────────────────────────────
 *   ./resource-store.ts      - Catalog, inventory and basket
 *   ./dispatcher.ts          - Action name → store operation, result envelopes
 *   ./list-products.ts       - Paginated catalog listing (max 3 per page)
 *   ./add-to-basket.ts       - Add units of a product
 *   ./remove-from-basket.ts  - Remove units of a product
 *   ./view-basket.ts         - Show basket lines and total
 *   ./checkout-basket.ts     - All-or-nothing purchase
 *   ./errors.ts              - Domain and contract errors
 *   ./data.ts                - Seed loading and result shapes
 *
 * Data files:
 *   ../data/catalog.json     - Default seed (8 products, 2 GPUs)
 * ───────────────────────────────────────────────────────────────────────────
 */

export { ResourceStore, MAX_PAGE_SIZE } from './resource-store.js';
export type { ResourceStoreOptions } from './resource-store.js';
export {
  ToolDispatcher,
  coerceAction,
  describeStoreTools,
  isActionName,
  storeTools,
  ACTION_NAMES,
} from './dispatcher.js';
export type { ActionCall, ActionName } from './dispatcher.js';
export { listProductsTool } from './list-products.js';
export type { ListProductsArgs } from './list-products.js';
export { addToBasketTool } from './add-to-basket.js';
export type { BasketChangeArgs } from './add-to-basket.js';
export { removeFromBasketTool } from './remove-from-basket.js';
export { viewBasketTool } from './view-basket.js';
export { checkoutBasketTool } from './checkout-basket.js';
export {
  DomainError,
  ContractError,
  PageLimitExceededError,
  UnknownProductError,
  NotInBasketError,
  InsufficientInventoryError,
  EmptyBasketError,
  UnknownActionError,
  ParameterCoercionError,
} from './errors.js';
export {
  loadCatalogSeed,
  parseCatalogSeed,
  InvalidCatalogError,
  productPageSchema,
  basketViewSchema,
  checkoutReceiptSchema,
} from './data.js';
export type {
  Product,
  CatalogSeed,
  ListingEntry,
  ProductPage,
  BasketLine,
  BasketView,
  CheckoutReceipt,
  Acknowledgement,
} from './data.js';
