import { SheetRecord } from '../../common/utils/workbook.util';
import { parseOrderDate, readSalesSheet } from './sales-sheet.util';

const COLUMNS = ['Order Date', 'Product/Barcode', 'Product', 'Parent Brand', 'Brand', 'Quantity', 'Tax Incl.'];

function record(overrides: SheetRecord = {}): SheetRecord {
  return {
    'Order Date': '2024-05-01 10:30:00',
    'Product/Barcode': '8991',
    Product: 'Glow Serum',
    'Parent Brand': 'Glow Group',
    Brand: 'Glow',
    Quantity: 2,
    'Tax Incl.': 150000,
    ...overrides,
  };
}

describe('readSalesSheet', () => {
  it('should name every missing column', () => {
    expect(() => readSalesSheet({ columns: ['Order Date', 'Product'], rows: [] })).toThrow(
      'Missing required columns: Product/Barcode, Parent Brand, Brand, Quantity, Tax Incl.',
    );
  });

  it('should parse the required columns and keep the others', () => {
    const sheet = readSalesSheet({
      columns: [...COLUMNS, 'Order Ref'],
      rows: [record({ 'Product/Barcode': 8991, 'Parent Brand': null, 'Order Ref': 'POS/001' })],
    });

    expect(sheet.columns).toEqual([...COLUMNS, 'Order Ref']);
    expect(sheet.lines).toEqual([
      {
        orderDate: new Date('2024-05-01T10:30:00.000Z'),
        barcode: '8991',
        product: 'Glow Serum',
        parentBrand: null,
        brand: 'Glow',
        quantity: 2,
        taxIncluded: 150000,
        values: {
          'Order Date': new Date('2024-05-01T10:30:00.000Z'),
          'Product/Barcode': '8991',
          Product: 'Glow Serum',
          'Parent Brand': null,
          Brand: 'Glow',
          Quantity: 2,
          'Tax Incl.': 150000,
          'Order Ref': 'POS/001',
        },
      },
    ]);
  });

  it('should count unreadable amounts as zero', () => {
    const [line] = readSalesSheet({ columns: COLUMNS, rows: [record({ Quantity: 'two', 'Tax Incl.': null })] }).lines;

    expect(line.quantity).toBe(0);
    expect(line.taxIncluded).toBe(0);
  });

  it('should drop lines without an order date or barcode', () => {
    const sheet = readSalesSheet({
      columns: COLUMNS,
      rows: [
        record({ 'Order Date': 'yesterday' }),
        record({ 'Product/Barcode': '  ' }),
        record({ 'Product/Barcode': ' 8992 ' }),
      ],
    });

    expect(sheet.lines.map((line) => line.barcode)).toEqual(['8992']);
  });

  it('should refuse a sheet without readable lines', () => {
    expect(() => readSalesSheet({ columns: COLUMNS, rows: [record({ 'Order Date': null })] })).toThrow(
      'No valid data found in the file',
    );
  });
});

describe('parseOrderDate', () => {
  it('should keep workbook dates', () => {
    expect(parseOrderDate(new Date('2024-05-01T10:30:00.000Z'))).toEqual(new Date('2024-05-01T10:30:00.000Z'));
  });

  it('should read serial day numbers', () => {
    expect(parseOrderDate(45413.5)).toEqual(new Date('2024-05-01T12:00:00.000Z'));
  });

  it('should read dates written as text', () => {
    expect(parseOrderDate('2024-05-01')).toEqual(new Date('2024-05-01T00:00:00.000Z'));
    expect(parseOrderDate(' 2024-05-01 10:30 ')).toEqual(new Date('2024-05-01T10:30:00.000Z'));
  });

  it('should reject anything else', () => {
    expect(parseOrderDate('2024-02-30')).toBeNull();
    expect(parseOrderDate('01/05/2024')).toBeNull();
    expect(parseOrderDate(true)).toBeNull();
    expect(parseOrderDate(null)).toBeNull();
  });
});
