import { z } from 'zod';

// Row shapes for the warehouse tables the estimator reads and writes.
// Rows come back from Supabase untyped, so each read goes through these schemas.

export const INVOICE_STATUSES = [
  'not_started',
  'picking',
  'awaiting_batch_items',
  'awaiting_packing',
  'ready_for_dispatch',
  'shipped',
  'out_for_delivery',
  'delivered',
  'delivery_failed',
  'returned_to_warehouse',
] as const;

export type InvoiceStatus = (typeof INVOICE_STATUSES)[number];

const nullableText = z.string().nullable().catch(null);
const nullableNumber = z.coerce.number().finite().nullable().catch(null);

export const settingSchema = z.object({
  key: z.string(),
  value: z.string(),
});

export type Setting = z.infer<typeof settingSchema>;

export const invoiceSchema = z.object({
  invoice_no: z.string(),
  customer_name: nullableText,
  status: z.string(), // not every legacy status is in INVOICE_STATUSES
  total_lines: nullableNumber,
  total_exp_time: nullableNumber, // minutes
});

export type Invoice = z.infer<typeof invoiceSchema>;

export const invoiceItemSchema = z.object({
  invoice_no: z.string(),
  item_code: z.union([z.string(), z.number().transform(String)]),
  location: nullableText, // e.g. '10-01-A02'
  corridor: z.union([z.string(), z.number().transform(String)]).nullable().catch(null), // zero-padded, e.g. '09'
  zone: nullableText,
  unit_type: nullableText,
  qty: nullableNumber,
  exp_time: nullableNumber, // minutes
});

export type InvoiceItem = z.infer<typeof invoiceItemSchema>;

/**
 * Item master row (ps_items_dw). The wms_* columns are the operational
 * classification outputs: fragility YES/SEMI/NO, temperature
 * normal/heat_sensitive/cool_required, pressure low/medium/high, pick
 * difficulty 1-5. Older rows hold free text, so none of them are enums here.
 */
export const dwItemSchema = z.object({
  item_code_365: z.string(),
  item_name: nullableText,
  active: z.boolean().nullable().catch(null),
  attribute_1_code_365: nullableText, // 'VPACK' marks virtual packs
  number_of_pieces: nullableNumber,
  wms_zone: nullableText,
  wms_unit_type: nullableText,
  wms_fragility: nullableText,
  wms_temperature_sensitivity: nullableText,
  wms_pressure_sensitivity: nullableText,
  wms_spill_risk: z.union([z.boolean(), z.string()]).nullable().catch(null),
  wms_pick_difficulty: z.union([z.number(), z.string()]).nullable().catch(null),
});

export type DwItem = z.infer<typeof dwItemSchema>;

export interface EstimateRunRow {
  invoice_no: string;
  estimator_version: string;
  params_revision: number;
  params_snapshot_json: string;
  estimated_total_seconds: number;
  estimated_pick_seconds: number;
  estimated_travel_seconds: number;
  breakdown_json: string;
  reason: string;
}

export interface EstimateLineRow {
  run_id: number;
  invoice_no: string;
  item_code: string;
  location: string | null;
  unit_type_normalized: string;
  qty: number;
  estimated_pick_seconds: number;
  estimated_walk_seconds: number;
  estimated_total_seconds: number;
  breakdown_json: string | null;
}
