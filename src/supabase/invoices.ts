import { SupabaseClient } from '@supabase/supabase-js';
import {
  DwItem,
  dwItemSchema,
  Invoice,
  invoiceItemSchema,
  InvoiceItem,
  invoiceSchema,
  InvoiceStatus,
} from '../types/database.types';
import { ItemMaster, OrderLine } from '../types/estimator.types';

// Invoices that are still in the warehouse and worth re-estimating
export const DEFAULT_OPEN_STATUSES: InvoiceStatus[] = ['not_started', 'picking', 'ready_for_dispatch'];
export const MAX_BULK_INVOICES = 500;

const INVOICE_ITEM_COLUMNS = 'invoice_no, item_code, location, corridor, zone, unit_type, qty, exp_time';
const DW_ITEM_COLUMNS = `
  item_code_365,
  item_name,
  active,
  attribute_1_code_365,
  number_of_pieces,
  wms_zone,
  wms_unit_type,
  wms_fragility,
  wms_temperature_sensitivity,
  wms_pressure_sensitivity,
  wms_spill_risk,
  wms_pick_difficulty
`;

export function toOrderLine(row: InvoiceItem): OrderLine {
  return {
    itemCode: row.item_code,
    qty: row.qty,
    unitType: row.unit_type,
    location: row.location,
    zone: row.zone,
    corridor: row.corridor,
  };
}

export function toItemMaster(row: DwItem): ItemMaster {
  return {
    itemCode: row.item_code_365,
    active: row.active ?? true,
    unitType: row.wms_unit_type,
    fragility: row.wms_fragility,
    spillRisk: row.wms_spill_risk,
    pressureSensitivity: row.wms_pressure_sensitivity,
    temperatureSensitivity: row.wms_temperature_sensitivity,
    pickDifficulty: row.wms_pick_difficulty,
    piecesPerUnit: row.number_of_pieces,
    packAttribute: row.attribute_1_code_365,
  };
}

/**
 * Fetches an invoice header.
 *
 * @returns The invoice, or null when no invoice has that number.
 * @throws Error if the query fails.
 */
export async function getInvoice(client: SupabaseClient, invoiceNo: string): Promise<Invoice | null> {
  const { data, error } = await client
    .from('invoices')
    .select('invoice_no, customer_name, status, total_lines, total_exp_time')
    .eq('invoice_no', invoiceNo)
    .maybeSingle();

  if (error) {
    console.error(`Error fetching invoice ${invoiceNo}:`, error);
    throw new Error(`Failed to fetch invoice ${invoiceNo}: ${error.message}`);
  }

  if (!data) {
    console.warn(`Invoice ${invoiceNo} not found.`);
    return null;
  }

  return invoiceSchema.parse(data);
}

/**
 * Fetches the lines of an invoice as estimator order lines.
 *
 * @throws Error if the query fails.
 */
export async function getInvoiceLines(client: SupabaseClient, invoiceNo: string): Promise<OrderLine[]> {
  const { data, error } = await client
    .from('invoice_items')
    .select(INVOICE_ITEM_COLUMNS)
    .eq('invoice_no', invoiceNo);

  if (error) {
    console.error(`Error fetching lines for invoice ${invoiceNo}:`, error);
    throw new Error(`Failed to fetch invoice lines: ${error.message}`);
  }

  if (!data) {
    console.warn(`No lines found for invoice ${invoiceNo}.`);
    return [];
  }

  const lines: OrderLine[] = [];
  for (const row of data) {
    const parsed = invoiceItemSchema.safeParse(row);
    if (!parsed.success) {
      console.warn(`Skipping malformed line on invoice ${invoiceNo}:`, parsed.error.issues);
      continue;
    }
    lines.push(toOrderLine(parsed.data));
  }

  console.log(`Fetched ${lines.length} lines for invoice ${invoiceNo}.`);
  return lines;
}

/**
 * Fetches item master rows for the given item codes.
 * Codes without a row are simply absent from the returned map.
 *
 * @throws Error if the query fails.
 */
export async function getItemMasterByCodes(client: SupabaseClient, itemCodes: string[]): Promise<Map<string, ItemMaster>> {
  const codes = Array.from(new Set(itemCodes.filter(code => code !== '')));
  const items = new Map<string, ItemMaster>();
  if (codes.length === 0) {
    return items;
  }

  const { data, error } = await client
    .from('ps_items_dw')
    .select(DW_ITEM_COLUMNS)
    .in('item_code_365', codes);

  if (error) {
    console.error('Error fetching item master rows:', error);
    throw new Error(`Failed to fetch item master rows: ${error.message}`);
  }

  for (const row of data ?? []) {
    const parsed = dwItemSchema.safeParse(row);
    if (!parsed.success) {
      console.warn('Skipping malformed item master row:', parsed.error.issues);
      continue;
    }
    items.set(parsed.data.item_code_365, toItemMaster(parsed.data));
  }

  if (items.size < codes.length) {
    console.warn(`Item master has no row for ${codes.length - items.size} of ${codes.length} item codes.`);
  }
  return items;
}

/**
 * Fetches the numbers of invoices still open in the warehouse.
 *
 * @param statuses - Invoice statuses counted as open.
 * @param limit - Upper bound on how many invoices one bulk run touches.
 * @throws Error if the query fails.
 */
export async function getOpenInvoiceNumbers(
  client: SupabaseClient,
  statuses: string[] = DEFAULT_OPEN_STATUSES,
  limit: number = MAX_BULK_INVOICES,
): Promise<string[]> {
  if (statuses.length === 0) {
    console.warn('getOpenInvoiceNumbers called with empty status list. Returning empty array.');
    return [];
  }

  const { data, error } = await client
    .from('invoices')
    .select('invoice_no')
    .in('status', statuses)
    .limit(limit);

  if (error) {
    console.error(`Error fetching invoices with statuses [${statuses.join(', ')}]:`, error);
    throw new Error(`Failed to fetch open invoices: ${error.message}`);
  }

  const invoiceNumbers = (data ?? [])
    .map(row => invoiceSchema.pick({ invoice_no: true }).safeParse(row))
    .flatMap(parsed => (parsed.success ? [parsed.data.invoice_no] : []));

  console.log(`Found ${invoiceNumbers.length} open invoices (statuses: ${statuses.join(', ')}).`);
  return invoiceNumbers;
}
