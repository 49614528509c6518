import {
  DEFAULT_OPEN_STATUSES,
  getInvoice,
  getInvoiceLines,
  getItemMasterByCodes,
  getOpenInvoiceNumbers,
} from '../../src/supabase/invoices';
import { mockClient, mockQuery, silenceConsole } from '../helpers/supabaseMock';

describe('invoice store', () => {
  beforeEach(() => {
    silenceConsole();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('getInvoice', () => {
    it('returns the invoice header', async () => {
      const invoice = { invoice_no: 'INV-1', customer_name: 'Corner Shop', status: 'picking', total_lines: 2, total_exp_time: null };
      const query = mockQuery({ data: invoice, error: null });
      const { client } = mockClient({ invoices: query });

      await expect(getInvoice(client, 'INV-1')).resolves.toEqual(invoice);
      expect(query.eq).toHaveBeenCalledWith('invoice_no', 'INV-1');
    });

    it('returns null for an unknown invoice', async () => {
      const { client } = mockClient({ invoices: mockQuery({ data: null, error: null }) });
      await expect(getInvoice(client, 'INV-404')).resolves.toBeNull();
    });

    it('throws when the query fails', async () => {
      const { client } = mockClient({ invoices: mockQuery({ data: null, error: { message: 'timeout' } }) });
      await expect(getInvoice(client, 'INV-1')).rejects.toThrow('Failed to fetch invoice INV-1: timeout');
    });
  });

  describe('getInvoiceLines', () => {
    it('maps rows to order lines and skips malformed ones', async () => {
      const query = mockQuery({
        data: [
          { invoice_no: 'INV-1', item_code: 1234, location: '10-01-A02', corridor: 10, zone: 'main', unit_type: 'PCS', qty: '3', exp_time: null },
          { invoice_no: 'INV-1', item_code: null, location: '10-01-A03' },
        ],
        error: null,
      });
      const { client, from } = mockClient({ invoice_items: query });

      const lines = await getInvoiceLines(client, 'INV-1');

      expect(from).toHaveBeenCalledWith('invoice_items');
      expect(query.eq).toHaveBeenCalledWith('invoice_no', 'INV-1');
      expect(lines).toEqual([
        { itemCode: '1234', qty: 3, unitType: 'PCS', location: '10-01-A02', zone: 'main', corridor: '10' },
      ]);
    });

    it('throws when the query fails', async () => {
      const { client } = mockClient({ invoice_items: mockQuery({ data: null, error: { message: 'timeout' } }) });
      await expect(getInvoiceLines(client, 'INV-1')).rejects.toThrow('Failed to fetch invoice lines: timeout');
    });
  });

  describe('getItemMasterByCodes', () => {
    it('looks up each distinct code once', async () => {
      const query = mockQuery({
        data: [
          {
            item_code_365: 'A1',
            active: null,
            attribute_1_code_365: 'VPACK',
            number_of_pieces: '6',
            wms_fragility: 'YES',
            wms_spill_risk: true,
            wms_pick_difficulty: 3,
          },
        ],
        error: null,
      });
      const { client, from } = mockClient({ ps_items_dw: query });

      const items = await getItemMasterByCodes(client, ['A1', 'A1', '', 'B2']);

      expect(from).toHaveBeenCalledWith('ps_items_dw');
      expect(query.in).toHaveBeenCalledWith('item_code_365', ['A1', 'B2']);
      expect(items.size).toBe(1);
      expect(items.get('A1')).toEqual({
        itemCode: 'A1',
        active: true,
        unitType: null,
        fragility: 'YES',
        spillRisk: true,
        pressureSensitivity: null,
        temperatureSensitivity: null,
        pickDifficulty: 3,
        piecesPerUnit: 6,
        packAttribute: 'VPACK',
      });
    });

    it('does not query for an empty code list', async () => {
      const { client, from } = mockClient({});
      await expect(getItemMasterByCodes(client, [])).resolves.toEqual(new Map());
      expect(from).not.toHaveBeenCalled();
    });
  });

  describe('getOpenInvoiceNumbers', () => {
    it('selects invoices in the open statuses up to the limit', async () => {
      const query = mockQuery({ data: [{ invoice_no: 'INV-1' }, { invoice_no: 'INV-2' }], error: null });
      const { client } = mockClient({ invoices: query });

      await expect(getOpenInvoiceNumbers(client)).resolves.toEqual(['INV-1', 'INV-2']);
      expect(query.in).toHaveBeenCalledWith('status', DEFAULT_OPEN_STATUSES);
      expect(query.limit).toHaveBeenCalledWith(500);
    });

    it('returns nothing for an empty status list', async () => {
      const { client, from } = mockClient({});
      await expect(getOpenInvoiceNumbers(client, [])).resolves.toEqual([]);
      expect(from).not.toHaveBeenCalled();
    });

    it('throws when the query fails', async () => {
      const { client } = mockClient({ invoices: mockQuery({ data: null, error: { message: 'timeout' } }) });
      await expect(getOpenInvoiceNumbers(client, ['picking'], 10)).rejects.toThrow('Failed to fetch open invoices: timeout');
    });
  });
});
