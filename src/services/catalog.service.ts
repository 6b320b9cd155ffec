import { CatalogItem, CatalogKind } from '../models/types.js';
import { NotFoundError } from '../lib/errors.js';

export interface CatalogQuery {
  kind?: CatalogKind;
  term?: string;
}

/**
 * Read-only view over the products loaded at startup
 */
export class CatalogService {
  private readonly byId: Map<number, CatalogItem>;

  constructor(items: readonly CatalogItem[]) {
    this.byId = new Map(items.map((item) => [item.id, item]));
  }

  list(query: CatalogQuery = {}): CatalogItem[] {
    const term = query.term?.trim().toLowerCase() ?? '';

    return [...this.byId.values()].filter((item) => {
      if (query.kind && item.kind !== query.kind) {
        return false;
      }
      return term === '' || item.name.toLowerCase().includes(term);
    });
  }

  get(id: number): CatalogItem {
    const item = this.byId.get(id);
    if (!item) {
      throw new NotFoundError(`Product ${id} not found`);
    }
    return item;
  }

  size(): number {
    return this.byId.size;
  }
}
