import { access, appendFile, mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { parse as toCsv } from 'json2csv';
import { CatalogItem, OrderRecord } from '../models/types.js';
import { createClothing, createElectronics, formatAmount } from '../models/catalog.js';
import { Order, parseTimestamp } from '../models/order.js';
import { describeError, logger } from '../lib/logger.js';
import { recordStoreOperation } from '../telemetry/metrics.js';

export const PRODUCTS_FILE = 'products.csv';
export const ORDERS_FILE = 'orders.csv';

interface CatalogRow {
  type: string;
  id: string;
  name: string;
  price: string;
  extra1: string;
  extra2: string;
}

interface OrderRow {
  orderId: string;
  customer: string;
  date: string;
  total: string;
  paid: string;
}

const CATALOG_FIELDS = [
  { label: 'TYPE', value: 'type' },
  { label: 'ID', value: 'id' },
  { label: 'NAME', value: 'name' },
  { label: 'PRICE', value: 'price' },
  { label: 'EXTRA1', value: 'extra1' },
  { label: 'EXTRA2', value: 'extra2' },
];

const ORDER_FIELDS = [
  { label: 'ORDER_ID', value: 'orderId' },
  { label: 'CUSTOMER', value: 'customer' },
  { label: 'DATE', value: 'date' },
  { label: 'TOTAL', value: 'total' },
  { label: 'PAID', value: 'paid' },
];

const EOL = '\n';

/**
 * Split one CSV record, honouring double-quoted fields and "" escapes
 */
export function splitCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];

    if (quoted) {
      if (ch === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      fields.push(current);
      current = '';
    } else {
      current += ch;
    }
  }

  fields.push(current);
  return fields;
}

/**
 * Data lines of a CSV document, header and blank lines dropped
 */
function dataLines(content: string): string[] {
  return content
    .split(/\r?\n/)
    .slice(1)
    .filter((line) => line.trim().length > 0);
}

function toCatalogRow(item: CatalogItem): CatalogRow {
  const base = { id: String(item.id), name: item.name, price: formatAmount(item.unitPrice) };

  switch (item.kind) {
    case 'ELECTRONICS':
      return { type: item.kind, ...base, extra1: item.brand, extra2: String(item.warrantyMonths) };
    case 'CLOTHING':
      return { type: item.kind, ...base, extra1: item.size, extra2: item.material };
    default: {
      const unreachable: never = item;
      return unreachable;
    }
  }
}

function toOrderRow(order: Order): OrderRow {
  return {
    orderId: String(order.orderId),
    customer: order.customerName,
    date: order.formattedDate,
    total: formatAmount(order.calculateTotal()),
    paid: String(order.isPaid),
  };
}

function parseNumber(raw: string | undefined): number {
  return raw === undefined || raw.trim() === '' ? Number.NaN : Number(raw);
}

/**
 * Parse a catalog record; null for unknown kinds
 * @throws ValidationError when the record is malformed
 */
function parseCatalogLine(line: string): CatalogItem | null {
  const [type, id, name, price, extra1 = '', extra2 = ''] = splitCsvLine(line);

  switch (type) {
    case 'ELECTRONICS':
      return createElectronics(parseNumber(id), name, parseNumber(price), extra1, parseNumber(extra2));
    case 'CLOTHING':
      return createClothing(parseNumber(id), name, parseNumber(price), extra1, extra2);
    default:
      return null;
  }
}

function parseOrderLine(line: string): OrderRecord | null {
  const fields = splitCsvLine(line);
  if (fields.length < 5) {
    return null;
  }

  const [orderId, customerName, date, total, paid] = fields;
  const createdAt = parseTimestamp(date);
  const id = parseNumber(orderId);
  if (!createdAt || !Number.isInteger(id)) {
    return null;
  }

  return {
    orderId: id,
    customerName,
    createdAt,
    total: parseNumber(total),
    paid: paid.trim().toLowerCase() === 'true',
  };
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Flat-file persistence for the catalog and processed orders.
 *
 * Best-effort: I/O failures are logged and counted, loads degrade to an
 * empty list and writes report `false`. Nothing here throws to callers.
 */
export class CsvFileStore {
  readonly productsPath: string;
  readonly ordersPath: string;

  constructor(private readonly dataDir: string) {
    this.productsPath = join(dataDir, PRODUCTS_FILE);
    this.ordersPath = join(dataDir, ORDERS_FILE);
  }

  async loadCatalog(): Promise<CatalogItem[]> {
    const content = await this.read(this.productsPath, 'loadCatalog');
    if (content === null) {
      return [];
    }

    const items: CatalogItem[] = [];
    for (const line of dataLines(content)) {
      try {
        const item = parseCatalogLine(line);
        if (item) {
          items.push(item);
        } else {
          logger.warn('Skipping catalog record of unknown kind', { line });
        }
      } catch (error) {
        logger.warn('Skipping malformed catalog record', { line, error: describeError(error) });
      }
    }

    logger.info('Catalog loaded', { path: this.productsPath, count: items.length });
    return items;
  }

  async saveCatalog(items: readonly CatalogItem[]): Promise<boolean> {
    return this.write('saveCatalog', async () => {
      const content =
        items.length === 0
          ? CATALOG_FIELDS.map((field) => field.label).join(',')
          : toCsv(items.map(toCatalogRow), { fields: CATALOG_FIELDS, eol: EOL });
      await writeFile(this.productsPath, `${content}${EOL}`, 'utf-8');
      logger.info('Catalog saved', { path: this.productsPath, count: items.length });
    });
  }

  /**
   * Load the catalog, writing `sample` first when there is nothing to load
   */
  async ensureCatalog(sample: readonly CatalogItem[]): Promise<CatalogItem[]> {
    const items = await this.loadCatalog();
    if (items.length > 0) {
      return items;
    }

    logger.info('No catalog found, writing sample data', { count: sample.length });
    const saved = await this.saveCatalog(sample);
    return saved ? this.loadCatalog() : [...sample];
  }

  /**
   * Append a summary record, creating the file with a header when absent
   */
  async appendOrder(order: Order): Promise<boolean> {
    return this.write('appendOrder', async () => {
      const row = toOrderRow(order);

      if (await exists(this.ordersPath)) {
        const line = toCsv([row], { fields: ORDER_FIELDS, header: false, eol: EOL });
        await appendFile(this.ordersPath, `${line}${EOL}`, 'utf-8');
      } else {
        const content = toCsv([row], { fields: ORDER_FIELDS, eol: EOL });
        await writeFile(this.ordersPath, `${content}${EOL}`, 'utf-8');
      }

      logger.info('Order saved', { orderId: order.orderId, path: this.ordersPath });
    });
  }

  async loadOrderRecords(): Promise<OrderRecord[]> {
    const content = await this.read(this.ordersPath, 'loadOrders');
    if (content === null) {
      return [];
    }

    const records: OrderRecord[] = [];
    for (const line of dataLines(content)) {
      const record = parseOrderLine(line);
      if (record) {
        records.push(record);
      } else {
        logger.warn('Skipping malformed order record', { line });
      }
    }
    return records;
  }

  /**
   * Persisted orders rebuilt without line items
   */
  async loadOrderHistory(): Promise<Order[]> {
    const records = await this.loadOrderRecords();
    return records.map((record) => Order.restore(record));
  }

  private async read(path: string, operation: string): Promise<string | null> {
    if (!(await exists(path))) {
      logger.debug('File not found', { path });
      return null;
    }

    try {
      const content = await readFile(path, 'utf-8');
      recordStoreOperation(operation, 'success');
      return content;
    } catch (error) {
      recordStoreOperation(operation, 'error');
      logger.error('Failed to read file', { path, error: describeError(error) });
      return null;
    }
  }

  private async write(operation: string, action: () => Promise<void>): Promise<boolean> {
    try {
      await mkdir(this.dataDir, { recursive: true });
      await action();
      recordStoreOperation(operation, 'success');
      return true;
    } catch (error) {
      recordStoreOperation(operation, 'error');
      logger.error('Failed to write file', { operation, dataDir: this.dataDir, error: describeError(error) });
      return false;
    }
  }
}
