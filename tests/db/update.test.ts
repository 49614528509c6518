import {
  createEstimateRun,
  lineMinutesByItemCode,
  persistEstimate,
  toEstimateLineRows,
  toEstimateRunRow,
} from '../../src/db/update';
import { estimateOrderTime } from '../../src/estimator/estimate';
import { DEFAULT_TIME_PARAMS } from '../../src/estimator/params';
import { ItemMaster, OrderLine } from '../../src/types/estimator.types';
import { makeLine } from '../estimator/helpers';
import { mockClient, mockQuery, silenceConsole } from '../helpers/supabaseMock';

const ok = { data: null, error: null };

function estimateFor(lines: OrderLine[]) {
  return estimateOrderTime({
    invoiceNo: 'INV-1',
    params: DEFAULT_TIME_PARAMS,
    summerMode: false,
    lines,
    itemsByCode: new Map<string, ItemMaster>(),
    now: new Date('2024-06-03T08:30:00.000Z'),
  });
}

// Two lines at one stop: A1 carries the 2 s walk (10 s), B1 is pick only (8 s). Total 159 s.
const result = estimateFor([makeLine({ itemCode: 'A1' }), makeLine({ itemCode: 'B1' })]);

describe('lineMinutesByItemCode', () => {
  it('adds up repeated item codes', () => {
    const repeated = estimateFor([makeLine({ itemCode: 'A1' }), makeLine({ itemCode: 'A1', qty: 3 })]);
    const minutes = lineMinutesByItemCode(repeated);
    expect(minutes.size).toBe(1);
    // 10 s for the first line with its walk, 10.2 s for the second
    expect(minutes.get('A1')).toBeCloseTo(20.2 / 60);
  });
});

describe('persistEstimate', () => {
  beforeEach(() => {
    silenceConsole();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('updates every line and the invoice total', async () => {
    const items = mockQuery(ok);
    const invoices = mockQuery(ok);
    const { client } = mockClient({ invoice_items: items, invoices });

    await persistEstimate(client, result);

    expect(items.update).toHaveBeenCalledTimes(2);
    expect(items.update).toHaveBeenNthCalledWith(1, { exp_time: 10 / 60 });
    expect(items.update).toHaveBeenNthCalledWith(2, { exp_time: 8 / 60 });
    expect(items.eq).toHaveBeenCalledWith('item_code', 'A1');
    expect(items.eq).toHaveBeenCalledWith('item_code', 'B1');
    expect(items.eq).toHaveBeenCalledWith('invoice_no', 'INV-1');
    expect(invoices.update).toHaveBeenCalledWith({ total_exp_time: 159 / 60 });
    expect(invoices.eq).toHaveBeenCalledWith('invoice_no', 'INV-1');
  });

  it('reports every failed update in one error', async () => {
    const { client } = mockClient({
      invoice_items: mockQuery({ data: null, error: { message: 'row locked' } }),
      invoices: mockQuery(ok),
    });

    await expect(persistEstimate(client, result)).rejects.toThrow(
      '2 update(s) failed for invoice INV-1: line A1, line B1. Check logs for details.',
    );
  });
});

describe('audit rows', () => {
  it('builds the run row from the estimate', () => {
    const row = toEstimateRunRow(result, DEFAULT_TIME_PARAMS, 3, 'manual');
    expect(row).toMatchObject({
      invoice_no: 'INV-1',
      estimator_version: result.estimatorVersion,
      params_revision: 3,
      estimated_total_seconds: 159,
      estimated_pick_seconds: 16,
      estimated_travel_seconds: 2,
      reason: 'manual',
    });
    expect(JSON.parse(row.params_snapshot_json)).toEqual(DEFAULT_TIME_PARAMS);
    expect(JSON.parse(row.breakdown_json)).toMatchObject({ overheadSeconds: 90, packSeconds: 51 });
  });

  it('builds one line row per invoice line', () => {
    const rows = toEstimateLineRows(result, 42);
    expect(rows.map(row => [row.run_id, row.item_code, row.estimated_walk_seconds, row.estimated_total_seconds])).toEqual([
      [42, 'A1', 2, 10],
      [42, 'B1', 0, 8],
    ]);
    expect(rows[0]).toMatchObject({ location: '10-01-A02', unit_type_normalized: 'item', qty: 1, estimated_pick_seconds: 8 });
  });
});

describe('createEstimateRun', () => {
  beforeEach(() => {
    silenceConsole();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('inserts the run and its lines', async () => {
    const runs = mockQuery({ data: { id: 42 }, error: null });
    const lines = mockQuery(ok);
    const { client } = mockClient({ oi_estimate_runs: runs, oi_estimate_lines: lines });

    await expect(createEstimateRun(client, result, DEFAULT_TIME_PARAMS, 3, 'manual')).resolves.toBe(42);

    expect(runs.insert).toHaveBeenCalledWith(toEstimateRunRow(result, DEFAULT_TIME_PARAMS, 3, 'manual'));
    expect(runs.select).toHaveBeenCalledWith('id');
    expect(lines.insert).toHaveBeenCalledWith(toEstimateLineRows(result, 42));
  });

  it('throws when the run insert fails', async () => {
    const lines = mockQuery(ok);
    const { client } = mockClient({
      oi_estimate_runs: mockQuery({ data: null, error: { message: 'duplicate key' } }),
      oi_estimate_lines: lines,
    });

    await expect(createEstimateRun(client, result, DEFAULT_TIME_PARAMS, 3, 'manual')).rejects.toThrow(
      'Failed to create estimate run: duplicate key',
    );
    expect(lines.insert).not.toHaveBeenCalled();
  });

  it('throws when the line insert fails', async () => {
    const { client } = mockClient({
      oi_estimate_runs: mockQuery({ data: { id: 7 }, error: null }),
      oi_estimate_lines: mockQuery({ data: null, error: { message: 'value too long' } }),
    });

    await expect(createEstimateRun(client, result, DEFAULT_TIME_PARAMS, 3, 'manual')).rejects.toThrow(
      'Failed to create estimate lines for run 7: value too long',
    );
  });
});
