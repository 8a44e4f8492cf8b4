/**
 * Resource Store
 *
 * The stateful world the agent acts on: a read-only catalog, a mutable
 * inventory count per SKU, and one basket. Every operation either applies
 * completely or throws a DomainError having changed nothing.
 *
 * All operations are synchronous. Each read-validate-mutate sequence
 * therefore runs to completion before any other caller (another session
 * sharing this store included) gets the event loop.
 */

import {
  EmptyBasketError,
  InsufficientInventoryError,
  NotInBasketError,
  PageLimitExceededError,
  UnknownProductError,
} from './errors.js';
import {
  parseCatalogSeed,
  type Acknowledgement,
  type BasketLine,
  type BasketView,
  type CatalogSeed,
  type CheckoutReceipt,
  type Product,
  type ProductPage,
} from './data.js';

export const MAX_PAGE_SIZE = 3;

export interface ResourceStoreOptions {
  /**
   * Units a rival shopper buys out from under us, per SKU, the first time a
   * non-empty basket is checked out. Simulates the race where inventory
   * shrinks between listing and checkout.
   */
  rivalPurchase?: Readonly<Record<string, number>>;
}

const OK: Acknowledgement = { message: 'ok' };

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

function assertNonNegativeInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
  }
}

export class ResourceStore {
  private readonly catalog: readonly Product[];
  private readonly bySku: ReadonlyMap<string, Product>;
  private readonly stock = new Map<string, number>();
  private readonly basket = new Map<string, number>();
  private pendingRivalPurchase?: Readonly<Record<string, number>>;

  constructor(seed: CatalogSeed, options: ResourceStoreOptions = {}) {
    const { products } = parseCatalogSeed(seed);

    this.catalog = Object.freeze(
      products.map(({ sku, name, price, category }) => Object.freeze({ sku, name, price, category }))
    );
    this.bySku = new Map(this.catalog.map((p) => [p.sku, p]));
    for (const { sku, available } of products) {
      this.stock.set(sku, available);
    }
    this.pendingRivalPurchase = options.rivalPurchase;
  }

  /**
   * One page of the catalog, in catalog order.
   *
   * @throws PageLimitExceededError when `limit` exceeds MAX_PAGE_SIZE
   */
  listProducts(offset: number, limit: number): ProductPage {
    assertNonNegativeInteger('offset', offset);
    assertNonNegativeInteger('limit', limit);
    if (limit > MAX_PAGE_SIZE) {
      throw new PageLimitExceededError(limit, MAX_PAGE_SIZE);
    }

    const page = this.catalog.slice(offset, offset + limit);
    const end = offset + page.length;

    return {
      products: page.map((product) => ({ ...product, available: this.available(product.sku) })),
      nextOffset: end < this.catalog.length ? end : null,
    };
  }

  /**
   * Add units to the basket. Inventory is not checked here; over-committing
   * is allowed and caught at checkout.
   */
  addToBasket(sku: string, amount: number): Acknowledgement {
    assertPositiveInteger('amount', amount);
    if (!this.bySku.has(sku)) {
      throw new UnknownProductError(sku);
    }

    this.basket.set(sku, (this.basket.get(sku) ?? 0) + amount);
    return OK;
  }

  /**
   * Remove up to `amount` units. Removing more than is held drops the line.
   */
  removeFromBasket(sku: string, amount: number): Acknowledgement {
    assertPositiveInteger('amount', amount);
    const quantity = this.basket.get(sku);
    if (quantity === undefined) {
      throw new NotInBasketError(sku);
    }

    const remaining = quantity - amount;
    if (remaining <= 0) {
      this.basket.delete(sku);
    } else {
      this.basket.set(sku, remaining);
    }
    return OK;
  }

  viewBasket(): BasketView {
    const items = this.basketLines();
    return { items, total: totalOf(items) };
  }

  /**
   * Commit the basket against inventory, all or nothing.
   *
   * @throws EmptyBasketError when there is nothing to buy
   * @throws InsufficientInventoryError for the first SKU (catalog order)
   *   whose basket quantity exceeds what is available
   */
  checkout(): CheckoutReceipt {
    if (this.basket.size === 0) {
      throw new EmptyBasketError();
    }

    this.applyRivalPurchase();

    const lines = this.basketLines();
    for (const line of lines) {
      const available = this.available(line.sku);
      if (line.quantity > available) {
        throw new InsufficientInventoryError(line.sku, available, line.quantity);
      }
    }

    for (const line of lines) {
      this.stock.set(line.sku, this.available(line.sku) - line.quantity);
    }
    this.basket.clear();

    return { message: 'ok', purchased: lines, total: totalOf(lines) };
  }

  // ===========================================================================
  // Snapshots
  // ===========================================================================

  products(): readonly Product[] {
    return this.catalog;
  }

  available(sku: string): number {
    return this.stock.get(sku) ?? 0;
  }

  /** SKU → units available, in catalog order. */
  inventory(): Record<string, number> {
    return Object.fromEntries(this.catalog.map((p) => [p.sku, this.available(p.sku)]));
  }

  /** SKU → quantity, in catalog order. */
  basketContents(): Record<string, number> {
    return Object.fromEntries(this.basketLines().map((line) => [line.sku, line.quantity]));
  }

  private basketLines(): BasketLine[] {
    const lines: BasketLine[] = [];
    for (const product of this.catalog) {
      const quantity = this.basket.get(product.sku);
      if (quantity !== undefined) {
        lines.push({ sku: product.sku, name: product.name, quantity, unitPrice: product.price });
      }
    }
    return lines;
  }

  private applyRivalPurchase(): void {
    const purchase = this.pendingRivalPurchase;
    if (!purchase) return;
    this.pendingRivalPurchase = undefined;

    for (const [sku, units] of Object.entries(purchase)) {
      if (!this.stock.has(sku)) continue;
      this.stock.set(sku, Math.max(0, this.available(sku) - units));
    }
  }
}

function totalOf(lines: readonly BasketLine[]): number {
  return lines.reduce((sum, line) => sum + line.quantity * line.unitPrice, 0);
}
