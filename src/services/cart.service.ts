import { CartLine, CartSnapshot, CatalogItem, CatalogKind, ItemOfKind } from '../models/types.js';
import { isKind } from '../models/catalog.js';
import { logger } from '../lib/logger.js';

/**
 * Session cart: one line per catalog item id, in insertion order
 */
export class CartService {
  private readonly cartLines = new Map<number, CartLine>();

  /**
   * Add one unit of an item
   */
  addItem(item: CatalogItem): void {
    const existing = this.cartLines.get(item.id);
    const line: CartLine = existing
      ? { ...existing, quantity: existing.quantity + 1 }
      : { item, quantity: 1 };
    this.cartLines.set(item.id, line);
    logger.debug('Added to cart', { itemId: item.id, quantity: line.quantity });
  }

  /**
   * Remove a line regardless of its quantity
   */
  removeItem(id: number): void {
    if (this.cartLines.delete(id)) {
      logger.debug('Removed from cart', { itemId: id });
    }
  }

  /**
   * Take one unit off a line, dropping the line at zero
   */
  decreaseQuantity(id: number): void {
    const line = this.cartLines.get(id);
    if (!line) {
      return;
    }

    if (line.quantity > 1) {
      this.cartLines.set(id, { ...line, quantity: line.quantity - 1 });
    } else {
      this.removeItem(id);
    }
  }

  clear(): void {
    this.cartLines.clear();
    logger.debug('Cart cleared');
  }

  total(): number {
    let sum = 0;
    for (const { item, quantity } of this.cartLines.values()) {
      sum += item.unitPrice * quantity;
    }
    return sum;
  }

  lines(): CartLine[] {
    return [...this.cartLines.values()];
  }

  /**
   * Items expanded to one entry per unit
   */
  units(): CatalogItem[] {
    return this.lines().flatMap(({ item, quantity }) => Array.from({ length: quantity }, () => item));
  }

  quantityOf(id: number): number {
    return this.cartLines.get(id)?.quantity ?? 0;
  }

  itemsOfKind<K extends CatalogKind>(kind: K): ItemOfKind<K>[] {
    return this.items().filter(isKind(kind));
  }

  search(term: string): CatalogItem[] {
    const needle = term.toLowerCase();
    return this.items().filter((item) => item.name.toLowerCase().includes(needle));
  }

  itemsInPriceRange(min: number, max: number): CatalogItem[] {
    return this.items().filter((item) => item.unitPrice >= min && item.unitPrice <= max);
  }

  totalItemCount(): number {
    let count = 0;
    for (const { quantity } of this.cartLines.values()) {
      count += quantity;
    }
    return count;
  }

  isEmpty(): boolean {
    return this.cartLines.size === 0;
  }

  snapshot(): CartSnapshot {
    return {
      lines: this.lines(),
      total: this.total(),
      itemCount: this.totalItemCount(),
    };
  }

  private items(): CatalogItem[] {
    return this.lines().map((line) => line.item);
  }
}
