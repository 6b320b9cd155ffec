import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Order, OrderSequence, formatTimestamp, parseTimestamp, serializeOrder } from '../src/models/order.js';
import { createClothing, createElectronics } from '../src/models/catalog.js';
import { CartLine } from '../src/models/types.js';

describe('Order', () => {
  const djellaba = createClothing(6, 'Djellaba', 450, 'L', 'Cotton');
  const babouche = createClothing(8, 'Babouche', 180, '42', 'Leather');
  const headphones = createElectronics(3, 'Headphones', 1499, 'Sony', 12);

  const lines: CartLine[] = [
    { item: djellaba, quantity: 1 },
    { item: babouche, quantity: 2 },
  ];

  let sequence: OrderSequence;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(2024, 0, 15, 9, 5, 7));
    sequence = new OrderSequence();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('OrderSequence', () => {
    it('issues ids after the seed', () => {
      expect(sequence.next()).toBe(1001);
      expect(sequence.next()).toBe(1002);
    });

    it('advances past persisted ids only', () => {
      sequence.advancePast(1500);
      sequence.advancePast(1200);

      expect(sequence.next()).toBe(1501);
    });
  });

  describe('create', () => {
    it('expands cart lines to one entry per unit', () => {
      const order = Order.create(sequence, 'Alice', lines);

      expect(order.orderId).toBe(1001);
      expect(order.items).toEqual([djellaba, babouche, babouche]);
      expect(order.itemCount).toBe(3);
      expect(order.isPaid).toBe(false);
    });

    it('falls back to the default customer for a blank name', () => {
      const order = Order.create(sequence, '   ', lines);

      expect(order.customerName).toBe('Customer');
    });

    it('returns a copy of its items', () => {
      const order = Order.create(sequence, 'Alice', lines);
      order.items.push(headphones);

      expect(order.itemCount).toBe(3);
    });
  });

  describe('calculateTotal', () => {
    it('sums unit prices', () => {
      expect(Order.create(sequence, 'Alice', lines).calculateTotal()).toBe(810);
    });

    it('is zero for an empty order', () => {
      expect(Order.create(sequence).calculateTotal()).toBe(0);
    });
  });

  describe('processPayment', () => {
    it('fails on an empty order without throwing', () => {
      const order = Order.create(sequence, 'Alice', []);

      expect(order.processPayment()).toBe(false);
      expect(order.isPaid).toBe(false);
    });

    it('marks a non-empty order as paid', () => {
      const order = Order.create(sequence, 'Alice', lines);

      expect(order.processPayment()).toBe(true);
      expect(order.isPaid).toBe(true);
    });

    it('treats a second payment as a no-op success', () => {
      const order = Order.create(sequence, 'Alice', lines);
      order.processPayment();

      expect(order.processPayment()).toBe(true);
      expect(order.isPaid).toBe(true);
      expect(order.calculateTotal()).toBe(810);
    });
  });

  describe('getPaymentSummary', () => {
    it('renders the receipt block', () => {
      const order = Order.create(sequence, 'Alice', lines);

      expect(order.getPaymentSummary()).toBe(
        [
          '========== ORDER SUMMARY ==========',
          'Order ID: 1001',
          'Customer: Alice',
          'Date: 2024-01-15 09:05',
          '-----------------------------------',
          'Items:',
          '  - [Clothing] Djellaba (Size: L) - 450.00 DH',
          '  - [Clothing] Babouche (Size: 42) - 180.00 DH',
          '  - [Clothing] Babouche (Size: 42) - 180.00 DH',
          '-----------------------------------',
          'Total: 810.00 DH',
          'Status: PENDING',
          '===================================',
          '',
        ].join('\n')
      );
    });

    it('shows PAID once payment went through', () => {
      const order = Order.create(sequence, 'Alice', [{ item: headphones, quantity: 1 }]);
      order.processPayment();

      expect(order.getPaymentSummary()).toContain('\nStatus: PAID\n');
    });
  });

  it('summarises itself in one line', () => {
    expect(Order.create(sequence, 'Alice', lines).toString()).toBe('Order #1001 - Alice - 810.00 DH - PENDING');
  });

  it('restores a persisted record without items', () => {
    const order = Order.restore({
      orderId: 1042,
      customerName: 'Bob',
      createdAt: new Date(2023, 11, 31, 23, 59, 59),
      total: 149,
      paid: true,
    });

    expect(order.items).toEqual([]);
    expect(order.isPaid).toBe(true);
    expect(order.formattedDate).toBe('2023-12-31 23:59:59');
  });

  it('serializes to a JSON view', () => {
    const order = Order.create(sequence, 'Alice', lines);

    expect(serializeOrder(order)).toEqual({
      orderId: 1001,
      customerName: 'Alice',
      createdAt: '2024-01-15 09:05:07',
      items: [djellaba, babouche, babouche],
      itemCount: 3,
      total: 810,
      paid: false,
    });
  });
});

describe('timestamps', () => {
  it('formats local time with and without seconds', () => {
    const date = new Date(2024, 2, 5, 14, 7, 9);

    expect(formatTimestamp(date)).toBe('2024-03-05 14:07:09');
    expect(formatTimestamp(date, false)).toBe('2024-03-05 14:07');
  });

  it('parses what it formats', () => {
    expect(parseTimestamp('2024-03-05 14:07:09')).toEqual(new Date(2024, 2, 5, 14, 7, 9));
  });

  it('returns null for malformed input', () => {
    expect(parseTimestamp('05/03/2024 14:07')).toBeNull();
    expect(parseTimestamp('')).toBeNull();
  });

  it('returns null for a date that does not exist', () => {
    expect(parseTimestamp('2024-02-31 10:00:00')).toBeNull();
    expect(parseTimestamp('2024-01-15 24:00:00')).toBeNull();
  });
});
