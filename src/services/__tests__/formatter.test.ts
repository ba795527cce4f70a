import { describe, it, expect } from 'vitest';
import { Decimal } from 'decimal.js';
import {
  FALLBACK_SUMMARY,
  countNoun,
  format,
  formatCurrency,
  formatFallback,
  formatGrouped,
  humanizeHeader,
  titleCase,
} from '../formatter.js';
import type { CellValue, QueryResult } from '../../types/models.js';

describe('format', () => {
  it('renders monetary results as currency', () => {
    const rows: CellValue[][] = Array.from({ length: 10 }, (_, i) => [
      i + 1,
      new Decimal(i === 0 ? '1234567.5' : `${900 - i}.25`),
    ]);
    const result: QueryResult = { columns: ['O_ORDERKEY', 'TOTAL_PRICE'], rows };

    const table = format(
      result,
      'What are the 10 orders with the highest value?',
      'SELECT o_orderkey, o_totalprice AS total_price FROM orders ORDER BY 2 DESC LIMIT 10'
    );

    expect(table.shape).toBe('currency');
    expect(table.headers).toEqual(['Order ID', 'Total Price']);
    expect(table.rows[0]).toEqual(['1', '$1,234,567.50']);
    expect(table.rows[1]).toEqual(['2', '$899.25']);
    expect(table.alignments).toEqual(['right', 'right']);
    expect(table.summary).toBe('10 records found');
  });

  it('keeps calendar columns out of currency formatting', () => {
    const table = format(
      {
        columns: ['year', 'revenue'],
        rows: [
          [2023, new Decimal('1500.5')],
          [2024, new Decimal('99.1')],
        ],
      },
      'What is the total revenue per year?',
      'SELECT year, SUM(amount) AS revenue FROM sales GROUP BY year'
    );

    expect(table.shape).toBe('currency');
    expect(table.headers).toEqual(['Year', 'Revenue']);
    expect(table.rows).toEqual([
      ['2023', '$1,500.50'],
      ['2024', '$99.10'],
    ]);
    expect(table.alignments).toEqual(['right', 'right']);
  });

  it('leaves quantities unformatted when the question says total', () => {
    const table = format(
      { columns: ['product', 'total_quantity'], rows: [['Chair', 120]] },
      'What is the total quantity sold per product?',
      'SELECT product, SUM(qty) AS total_quantity FROM order_lines GROUP BY product'
    );

    expect(table.shape).toBe('generic');
    expect(table.headers).toEqual(['Product', 'Total Quantity']);
    expect(table.rows).toEqual([['Chair', '120']]);
  });

  it('treats unnamed fractional columns as amounts', () => {
    const table = format(
      { columns: ['c_name', 'sum'], rows: [['Customer#0001', new Decimal('555285.16')]] },
      'Which customers spent the most?',
      'SELECT c_name, SUM(o_totalprice) FROM customers JOIN orders GROUP BY c_name'
    );

    expect(table.shape).toBe('currency');
    expect(table.headers).toEqual(['Name', 'Sum']);
    expect(table.rows).toEqual([['Customer#0001', '$555,285.16']]);
  });

  it('renders the table list with a row index', () => {
    const table = format(
      {
        columns: ['TABLE_NAME', 'TABLE_TYPE'],
        rows: [
          ['customers', 'BASE TABLE'],
          ['orders', 'VIEW'],
        ],
      },
      'show tables',
      'SELECT name AS TABLE_NAME, type AS TABLE_TYPE FROM sqlite_master'
    );

    expect(table.shape).toBe('table-list');
    expect(table.headers).toEqual(['#', 'Table', 'Type']);
    expect(table.rows).toEqual([
      ['1', 'customers', 'BASE TABLE'],
      ['2', 'orders', 'VIEW'],
    ]);
    expect(table.summary).toBe('2 records found');
  });

  it('renders a single count as a one-line summary', () => {
    const table = format(
      { columns: ['COUNT(*)'], rows: [[1500]] },
      'How many orders are there?',
      'SELECT COUNT(*) FROM orders'
    );

    expect(table.shape).toBe('count');
    expect(table.headline).toBe('Total orders: 1,500');
    expect(table.headers).toEqual(['Description', 'Count']);
    expect(table.rows).toEqual([['Total orders', '1,500']]);
    expect(table.summary).toBe('1 records found');
  });

  it('does not treat count columns as money', () => {
    const table = format(
      { columns: ['order_count'], rows: [[42]] },
      'How many orders have a total above 100?',
      'SELECT COUNT(*) AS order_count FROM orders WHERE total > 100'
    );

    expect(table.shape).toBe('count');
    expect(table.headline).toBe('Total orders: 42');
  });

  it('keeps integral counts out of currency in grouped count questions', () => {
    const table = format(
      {
        columns: ['region', 'total_orders'],
        rows: [
          ['EU', 12],
          ['US', 30],
        ],
      },
      'How many orders per region?',
      'SELECT region, COUNT(*) AS total_orders FROM orders GROUP BY region'
    );

    expect(table.shape).toBe('generic');
    expect(table.headers).toEqual(['Region', 'Total Orders']);
    expect(table.rows).toEqual([
      ['EU', '12'],
      ['US', '30'],
    ]);
    expect(table.alignments).toEqual(['left', 'right']);
  });

  it('falls back to the generic shape', () => {
    const table = format(
      {
        columns: ['customer_name', 'city', 'order_count'],
        rows: [
          ['Ann', 'Berlin', 3],
          ['Bo', null, 1],
        ],
      },
      'list customers in Berlin',
      'SELECT customer_name, city, order_count FROM customers'
    );

    expect(table.shape).toBe('generic');
    expect(table.headers).toEqual(['Customer Name', 'City', 'Order Count']);
    expect(table.rows).toEqual([
      ['Ann', 'Berlin', '3'],
      ['Bo', '', '1'],
    ]);
    expect(table.alignments).toEqual(['left', 'left', 'right']);
    expect(table.summary).toBe('2 records found');
  });

  it('summarizes empty results', () => {
    const table = format({ columns: ['name'], rows: [] }, 'list customers', 'SELECT name FROM c');
    expect(table.summary).toBe('0 records found');
    expect(table.rows).toEqual([]);
  });
});

describe('formatFallback', () => {
  it('shows the raw text in one cell', () => {
    expect(formatFallback('[(1, 2), (3,)]')).toEqual({
      shape: 'fallback',
      headers: ['Result'],
      rows: [['[(1, 2), (3,)]']],
      alignments: ['left'],
      summary: FALLBACK_SUMMARY,
    });
  });
});

describe('number formatting', () => {
  it('formats currency with grouping and two decimals', () => {
    expect(formatCurrency(1234.5)).toBe('$1,234.50');
    expect(formatCurrency(-1000)).toBe('-$1,000.00');
    expect(formatCurrency(new Decimal('-0.004'))).toBe('$0.00');
    expect(formatCurrency(new Decimal('544089.09'))).toBe('$544,089.09');
  });

  it('groups plain numbers', () => {
    expect(formatGrouped(1234567)).toBe('1,234,567');
    expect(formatGrouped(new Decimal('-1234.5'))).toBe('-1,234.5');
  });
});

describe('headers', () => {
  it.each([
    ['id', 'ID'],
    ['customer_id', 'Customer ID'],
    ['O_ORDERKEY', 'Order ID'],
    ['cnt', 'Count'],
    ['num_orders', 'Count'],
    ['amount_paid', 'Amount Paid'],
    ['TOTAL_PRICE', 'Total Price'],
  ])('humanizes %s as %s', (column, label) => {
    expect(humanizeHeader(column)).toBe(label);
  });

  it('title-cases snake and camel case', () => {
    expect(titleCase('totalPrice')).toBe('Total Price');
    expect(titleCase('market_segment')).toBe('Market Segment');
  });
});

describe('countNoun', () => {
  it('finds the counted noun', () => {
    expect(countNoun('What is the number of distinct customers?')).toBe('customers');
    expect(countNoun('How many orders are there?')).toBe('orders');
  });

  it('defaults to records', () => {
    expect(countNoun('show everything')).toBe('records');
  });
});
