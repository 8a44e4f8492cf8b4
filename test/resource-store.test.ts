import { describe, expect, it } from 'vitest';
import { loadCatalogSeed, InvalidCatalogError } from '../example/tools/data.js';
import {
  EmptyBasketError,
  InsufficientInventoryError,
  NotInBasketError,
  PageLimitExceededError,
  UnknownProductError,
} from '../example/tools/errors.js';
import { MAX_PAGE_SIZE, ResourceStore } from '../example/tools/resource-store.js';
import { gpuSeed } from './fixtures.js';

const CATALOG_ORDER = [
  'rc-1200',
  'gpu-h100',
  'gpu-a100',
  'mb-450',
  'cpu-001',
  'ram-ddr5',
  'ssd-2tb',
  'psu-1200w',
];

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected the call to throw');
}

describe('ResourceStore', () => {
  describe('listProducts', () => {
    it('returns the first page with the offset of the next one', () => {
      const store = new ResourceStore(loadCatalogSeed());
      const page = store.listProducts(0, 3);

      expect(page.products.map((p) => p.sku)).toEqual(['rc-1200', 'gpu-h100', 'gpu-a100']);
      expect(page.nextOffset).toBe(3);
    });

    it('includes available units in each entry', () => {
      const store = new ResourceStore(loadCatalogSeed());
      const [, h100] = store.listProducts(0, 3).products;

      expect(h100).toEqual({
        sku: 'gpu-h100',
        name: 'Nvidia H100',
        price: 20000,
        category: 'gpu',
        available: 3,
      });
    });

    it('uses null as the no-more-pages sentinel', () => {
      const store = new ResourceStore(loadCatalogSeed());

      expect(store.listProducts(6, 3)).toMatchObject({ nextOffset: null });
      expect(store.listProducts(6, 3).products.map((p) => p.sku)).toEqual(['ssd-2tb', 'psu-1200w']);
      expect(store.listProducts(8, 3)).toEqual({ products: [], nextOffset: null });
      expect(store.listProducts(3, 3).nextOffset).toBe(6);
    });

    it('returns [offset, offset+limit) of catalog order for every offset and limit', () => {
      const store = new ResourceStore(loadCatalogSeed());

      for (let offset = 0; offset <= 9; offset++) {
        for (let limit = 1; limit <= MAX_PAGE_SIZE; limit++) {
          const page = store.listProducts(offset, limit);
          const expected = CATALOG_ORDER.slice(offset, offset + limit);
          const end = offset + expected.length;

          expect(page.products.map((p) => p.sku)).toEqual(expected);
          expect(page.nextOffset).toBe(end < CATALOG_ORDER.length ? end : null);
        }
      }
    });

    it('rejects a limit above the maximum without touching state', () => {
      const store = new ResourceStore(gpuSeed());
      store.addToBasket('gpu-h100', 1);

      const error = catchError(() => store.listProducts(0, 5));

      expect(error).toBeInstanceOf(PageLimitExceededError);
      expect(error).toMatchObject({ limit: 5, maxLimit: 3, code: 'PAGE_LIMIT_EXCEEDED' });
      expect(store.inventory()).toEqual({ 'gpu-h100': 3, 'gpu-a100': 4 });
      expect(store.basketContents()).toEqual({ 'gpu-h100': 1 });
    });

    it('returns identical results when nothing changed in between', () => {
      const store = new ResourceStore(loadCatalogSeed());
      expect(store.listProducts(2, 3)).toEqual(store.listProducts(2, 3));
    });
  });

  describe('addToBasket', () => {
    it('creates and then increments a basket line', () => {
      const store = new ResourceStore(gpuSeed());

      expect(store.addToBasket('gpu-h100', 2)).toEqual({ message: 'ok' });
      store.addToBasket('gpu-h100', 3);

      expect(store.basketContents()).toEqual({ 'gpu-h100': 5 });
    });

    it('allows more than is in stock', () => {
      const store = new ResourceStore(gpuSeed());
      store.addToBasket('gpu-a100', 40);
      expect(store.basketContents()).toEqual({ 'gpu-a100': 40 });
    });

    it('rejects an unknown SKU', () => {
      const store = new ResourceStore(gpuSeed());

      expect(() => store.addToBasket('gpu-b200', 1)).toThrow(UnknownProductError);
      expect(store.basketContents()).toEqual({});
    });

    it('rejects a non-positive amount as a programming error', () => {
      const store = new ResourceStore(gpuSeed());
      expect(() => store.addToBasket('gpu-h100', 0)).toThrow(RangeError);
    });
  });

  describe('removeFromBasket', () => {
    it('decrements a line', () => {
      const store = new ResourceStore(gpuSeed());
      store.addToBasket('gpu-a100', 4);
      store.removeFromBasket('gpu-a100', 1);

      expect(store.basketContents()).toEqual({ 'gpu-a100': 3 });
    });

    it('deletes the line when removing exactly what is held', () => {
      const store = new ResourceStore(gpuSeed());
      store.addToBasket('gpu-a100', 4);
      store.removeFromBasket('gpu-a100', 4);

      expect(store.basketContents()).toEqual({});
    });

    it('deletes the line when removing more than is held', () => {
      const store = new ResourceStore(gpuSeed());
      store.addToBasket('gpu-h100', 2);

      expect(store.removeFromBasket('gpu-h100', 10)).toEqual({ message: 'ok' });
      expect(store.basketContents()).toEqual({});
    });

    it('rejects a SKU that is not in the basket', () => {
      const store = new ResourceStore(gpuSeed());
      expect(() => store.removeFromBasket('gpu-h100', 1)).toThrow(NotInBasketError);
    });

    it('keeps every line positive and in the catalog after mixed changes', () => {
      const store = new ResourceStore(gpuSeed());
      const changes: Array<['add' | 'remove', string, number]> = [
        ['add', 'gpu-h100', 2],
        ['add', 'gpu-a100', 1],
        ['remove', 'gpu-h100', 1],
        ['add', 'gpu-h100', 4],
        ['remove', 'gpu-a100', 3],
        ['remove', 'gpu-h100', 2],
      ];

      for (const [kind, sku, amount] of changes) {
        if (kind === 'add') store.addToBasket(sku, amount);
        else store.removeFromBasket(sku, amount);

        for (const [basketSku, quantity] of Object.entries(store.basketContents())) {
          expect(['gpu-h100', 'gpu-a100']).toContain(basketSku);
          expect(Number.isInteger(quantity) && quantity > 0).toBe(true);
        }
      }

      expect(store.basketContents()).toEqual({ 'gpu-h100': 3 });
    });
  });

  describe('viewBasket', () => {
    it('joins against the catalog in catalog order', () => {
      const store = new ResourceStore(gpuSeed());
      store.addToBasket('gpu-a100', 2);
      store.addToBasket('gpu-h100', 1);

      expect(store.viewBasket()).toEqual({
        items: [
          { sku: 'gpu-h100', name: 'Nvidia H100', quantity: 1, unitPrice: 20000 },
          { sku: 'gpu-a100', name: 'Nvidia A100', quantity: 2, unitPrice: 11950 },
        ],
        total: 43900,
      });
    });

    it('is idempotent', () => {
      const store = new ResourceStore(gpuSeed());
      store.addToBasket('gpu-a100', 2);
      expect(store.viewBasket()).toEqual(store.viewBasket());
    });
  });

  describe('checkout', () => {
    it('buys everything when inventory suffices', () => {
      const store = new ResourceStore(gpuSeed());
      store.addToBasket('gpu-h100', 3);
      store.addToBasket('gpu-a100', 4);

      const receipt = store.checkout();

      expect(receipt).toEqual({
        message: 'ok',
        purchased: [
          { sku: 'gpu-h100', name: 'Nvidia H100', quantity: 3, unitPrice: 20000 },
          { sku: 'gpu-a100', name: 'Nvidia A100', quantity: 4, unitPrice: 11950 },
        ],
        total: 107800,
      });
      expect(store.inventory()).toEqual({ 'gpu-h100': 0, 'gpu-a100': 0 });
      expect(store.basketContents()).toEqual({});
    });

    it('changes nothing when one line exceeds inventory', () => {
      const store = new ResourceStore(gpuSeed());
      store.addToBasket('gpu-h100', 5);

      const error = catchError(() => store.checkout());

      expect(error).toBeInstanceOf(InsufficientInventoryError);
      expect(error).toMatchObject({ sku: 'gpu-h100', available: 3, requested: 5 });
      expect(store.inventory()).toEqual({ 'gpu-h100': 3, 'gpu-a100': 4 });
      expect(store.basketContents()).toEqual({ 'gpu-h100': 5 });
    });

    it('reports the first offending SKU in catalog order', () => {
      const store = new ResourceStore(gpuSeed());
      store.addToBasket('gpu-a100', 9);
      store.addToBasket('gpu-h100', 9);

      expect(catchError(() => store.checkout())).toMatchObject({
        sku: 'gpu-h100',
        available: 3,
        requested: 9,
      });
    });

    it('decrements only the purchased SKUs', () => {
      const store = new ResourceStore(gpuSeed());
      store.addToBasket('gpu-a100', 1);
      store.checkout();

      expect(store.inventory()).toEqual({ 'gpu-h100': 3, 'gpu-a100': 3 });
    });

    it('rejects an empty basket', () => {
      const store = new ResourceStore(gpuSeed());
      expect(() => store.checkout()).toThrow(EmptyBasketError);
    });
  });

  describe('rival purchase', () => {
    it('shrinks inventory once, on the first non-empty checkout', () => {
      const store = new ResourceStore(gpuSeed(), {
        rivalPurchase: { 'gpu-h100': 2, 'gpu-a100': 1 },
      });
      store.addToBasket('gpu-h100', 3);
      store.addToBasket('gpu-a100', 4);

      expect(catchError(() => store.checkout())).toMatchObject({
        sku: 'gpu-h100',
        available: 1,
        requested: 3,
      });
      expect(store.inventory()).toEqual({ 'gpu-h100': 1, 'gpu-a100': 3 });

      store.removeFromBasket('gpu-h100', 2);
      expect(catchError(() => store.checkout())).toMatchObject({
        sku: 'gpu-a100',
        available: 3,
        requested: 4,
      });

      store.removeFromBasket('gpu-a100', 1);
      expect(store.checkout().total).toBe(20000 + 3 * 11950);
      expect(store.inventory()).toEqual({ 'gpu-h100': 0, 'gpu-a100': 0 });
    });

    it('is not triggered by an empty-basket checkout', () => {
      const store = new ResourceStore(gpuSeed(), { rivalPurchase: { 'gpu-h100': 3 } });

      expect(() => store.checkout()).toThrow(EmptyBasketError);
      expect(store.inventory()).toEqual({ 'gpu-h100': 3, 'gpu-a100': 4 });
    });

    it('never takes inventory below zero', () => {
      const store = new ResourceStore(gpuSeed(), { rivalPurchase: { 'gpu-a100': 10 } });
      store.addToBasket('gpu-h100', 1);
      store.checkout();

      expect(store.inventory()).toEqual({ 'gpu-h100': 2, 'gpu-a100': 0 });
    });
  });

  describe('seed', () => {
    it('rejects duplicate SKUs', () => {
      const seed = gpuSeed();
      seed.products.push({ ...seed.products[0], name: 'Copy' });

      expect(() => new ResourceStore(seed)).toThrow(InvalidCatalogError);
    });

    it('rejects negative inventory', () => {
      const seed = gpuSeed();
      seed.products[1].available = -1;

      expect(() => new ResourceStore(seed)).toThrow(InvalidCatalogError);
    });

    it('freezes catalog entries', () => {
      const store = new ResourceStore(gpuSeed());
      expect(Object.isFrozen(store.products()[0])).toBe(true);
    });

    it('takes its own snapshot of the seed', () => {
      const seed = gpuSeed();
      const store = new ResourceStore(seed);
      seed.products[0].available = 99;

      expect(store.available('gpu-h100')).toBe(3);
    });
  });
});
