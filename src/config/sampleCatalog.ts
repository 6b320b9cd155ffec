/**
 * Catalog written to disk on first start when no products file exists
 */

import { createClothing, createElectronics } from '../models/catalog.js';
import { CatalogItem } from '../models/types.js';

export const SAMPLE_CATALOG: readonly CatalogItem[] = [
  createElectronics(1, 'Laptop', 9999.0, 'Dell', 24),
  createElectronics(2, 'Smartphone', 6999.0, 'Samsung', 12),
  createElectronics(3, 'Headphones', 1499.0, 'Sony', 12),
  createElectronics(4, 'Tablet', 4499.0, 'Apple', 12),
  createElectronics(5, 'Smart Watch', 2999.0, 'Xiaomi', 12),
  createClothing(6, 'Djellaba', 450.0, 'L', 'Cotton'),
  createClothing(7, 'Caftan', 1200.0, 'M', 'Silk'),
  createClothing(8, 'Babouche', 180.0, '42', 'Leather'),
  createClothing(9, 'T-Shirt', 149.0, 'M', 'Cotton'),
  createClothing(10, 'Jeans', 350.0, 'L', 'Denim'),
];
