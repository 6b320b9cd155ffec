import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CsvFileStore, splitCsvLine } from '../src/clients/csvFileStore.js';
import { SAMPLE_CATALOG } from '../src/config/sampleCatalog.js';
import { createClothing } from '../src/models/catalog.js';
import { Order, OrderSequence, formatTimestamp } from '../src/models/order.js';

describe('splitCsvLine', () => {
  it('splits plain and quoted fields', () => {
    expect(splitCsvLine('"a,b","c""d",e')).toEqual(['a,b', 'c"d', 'e']);
  });

  it('keeps empty fields', () => {
    expect(splitCsvLine('x,,y,')).toEqual(['x', '', 'y', '']);
  });
});

describe('CsvFileStore', () => {
  let dir: string;
  let store: CsvFileStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'storefront-store-'));
    store = new CsvFileStore(dir);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('catalog', () => {
    it('loads nothing when the file is missing', async () => {
      await expect(store.loadCatalog()).resolves.toEqual([]);
    });

    it('writes one quoted record per item and reads them back', async () => {
      await expect(store.saveCatalog(SAMPLE_CATALOG)).resolves.toBe(true);

      const content = await readFile(store.productsPath, 'utf-8');
      expect(content.split('\n')[1]).toBe('"ELECTRONICS","1","Laptop","9999.00","Dell","24"');
      await expect(store.loadCatalog()).resolves.toEqual(SAMPLE_CATALOG);
    });

    it('skips unknown kinds and malformed records', async () => {
      await writeFile(
        store.productsPath,
        [
          'TYPE,ID,NAME,PRICE,EXTRA1,EXTRA2',
          'ELECTRONICS,1,Laptop,9999.00,Dell,24',
          'FURNITURE,2,Chair,10.00,Oak,Brown',
          'CLOTHING,3,,10.00,M,Cotton',
          'CLOTHING,4,Caftan,abc,M,Silk',
          '',
          'CLOTHING,5,"Caftan, long",1200.00,M,Silk',
        ].join('\n'),
        'utf-8'
      );

      const items = await store.loadCatalog();

      expect(items.map((item) => item.id)).toEqual([1, 5]);
      expect(items[1]).toEqual(createClothing(5, 'Caftan, long', 1200, 'M', 'Silk'));
    });

    it('seeds the sample catalog only when nothing is stored', async () => {
      const seeded = await store.ensureCatalog(SAMPLE_CATALOG);
      expect(seeded).toHaveLength(10);

      const replacement = [createClothing(99, 'Hat', 80, 'S', 'Straw')];
      await expect(store.ensureCatalog(replacement)).resolves.toEqual(SAMPLE_CATALOG);
    });
  });

  describe('orders', () => {
    const lines = [
      { item: createClothing(6, 'Djellaba', 450, 'L', 'Cotton'), quantity: 1 },
      { item: createClothing(8, 'Babouche', 180, '42', 'Leather'), quantity: 2 },
    ];

    it('creates the file with a header, then appends', async () => {
      const sequence = new OrderSequence();
      const first = Order.create(sequence, 'Alice', lines);
      first.processPayment();
      const second = Order.create(sequence, 'Bob', lines.slice(0, 1));

      await expect(store.appendOrder(first)).resolves.toBe(true);
      await expect(store.appendOrder(second)).resolves.toBe(true);

      const content = await readFile(store.ordersPath, 'utf-8');
      const fileLines = content.split('\n');
      expect(fileLines[0]).toBe('"ORDER_ID","CUSTOMER","DATE","TOTAL","PAID"');
      expect(fileLines[1]).toBe(`"1001","Alice","${first.formattedDate}","810.00","true"`);
      expect(fileLines[2]).toBe(`"1002","Bob","${second.formattedDate}","450.00","false"`);
      expect(fileLines).toHaveLength(4);

      const records = await store.loadOrderRecords();
      expect(records.map(({ orderId, customerName, total, paid }) => ({ orderId, customerName, total, paid }))).toEqual([
        { orderId: 1001, customerName: 'Alice', total: 810, paid: true },
        { orderId: 1002, customerName: 'Bob', total: 450, paid: false },
      ]);
      expect(formatTimestamp(records[0].createdAt)).toBe(first.formattedDate);
    });

    it('rebuilds history orders without items', async () => {
      const order = Order.create(new OrderSequence(), 'Alice', lines);
      order.processPayment();
      await store.appendOrder(order);

      const [restored] = await store.loadOrderHistory();

      expect(restored.orderId).toBe(1001);
      expect(restored.isPaid).toBe(true);
      expect(restored.items).toEqual([]);
    });

    it('skips malformed order records', async () => {
      await writeFile(
        store.ordersPath,
        [
          'ORDER_ID,CUSTOMER,DATE,TOTAL,PAID',
          '1001,Alice,2024-01-15 09:05:07,810.00,true',
          '1002,Bob,yesterday,450.00,false',
          '1003,Carol',
        ].join('\n'),
        'utf-8'
      );

      const records = await store.loadOrderRecords();

      expect(records).toEqual([
        { orderId: 1001, customerName: 'Alice', createdAt: new Date(2024, 0, 15, 9, 5, 7), total: 810, paid: true },
      ]);
    });

    it('reports false instead of throwing when the directory cannot be created', async () => {
      const blocker = join(dir, 'not-a-dir');
      await writeFile(blocker, 'x', 'utf-8');
      const broken = new CsvFileStore(blocker);

      await expect(broken.appendOrder(Order.create(new OrderSequence(), 'Alice', lines))).resolves.toBe(false);
      await expect(broken.loadOrderRecords()).resolves.toEqual([]);
    });
  });
});
