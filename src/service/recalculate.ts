import { SupabaseClient } from '@supabase/supabase-js';
import { createEstimateRun, persistEstimate } from '../db/update';
import { estimateOrderTime } from '../estimator/estimate';
import { TimeParams } from '../estimator/params';
import {
  DEFAULT_OPEN_STATUSES,
  getInvoice,
  getInvoiceLines,
  getItemMasterByCodes,
  getOpenInvoiceNumbers,
  MAX_BULK_INVOICES,
} from '../supabase/invoices';
import { getParamsRevision, getSummerMode, getTimeParams } from '../supabase/settings';
import { EstimateResult } from '../types/estimator.types';

export interface RecalculateOptions {
  /** Also record an audit run in oi_estimate_runs / oi_estimate_lines. */
  snapshot?: boolean;
  reason?: string;
  now?: Date;
}

export interface RecalculateOpenOptions extends RecalculateOptions {
  statuses?: string[];
  limit?: number;
}

export interface RecalculateOutcome {
  result: EstimateResult;
  runId: number | null;
}

export interface BulkRecalculateOutcome {
  recalculated: number;
  failed: { invoiceNo: string; error: string }[];
  lastResult: EstimateResult | null;
}

interface EstimatorSettings {
  params: TimeParams;
  summerMode: boolean;
}

async function loadEstimatorSettings(client: SupabaseClient): Promise<EstimatorSettings> {
  const [params, summerMode] = await Promise.all([getTimeParams(client), getSummerMode(client)]);
  return { params, summerMode };
}

async function recalculateWithSettings(
  client: SupabaseClient,
  invoiceNo: string,
  settings: EstimatorSettings,
  options: RecalculateOptions,
): Promise<RecalculateOutcome> {
  const invoice = await getInvoice(client, invoiceNo);
  if (!invoice) {
    throw new Error(`Invoice not found: ${invoiceNo}`);
  }

  const lines = await getInvoiceLines(client, invoiceNo);
  const itemsByCode = await getItemMasterByCodes(client, lines.map(line => line.itemCode));

  const result = estimateOrderTime({
    invoiceNo,
    params: settings.params,
    summerMode: settings.summerMode,
    lines,
    itemsByCode,
    now: options.now,
  });

  if (lines.length === 0) {
    console.warn(`Invoice ${invoiceNo} has no lines. Nothing to persist.`);
    return { result, runId: null };
  }

  await persistEstimate(client, result);

  let runId: number | null = null;
  if (options.snapshot) {
    const revision = await getParamsRevision(client);
    runId = await createEstimateRun(client, result, settings.params, revision, options.reason ?? 'manual');
  }

  return { result, runId };
}

/**
 * Re-estimates one invoice from the current parameter set and summer mode
 * and writes the minutes back to the invoice and its lines.
 *
 * @throws {ConfigurationError} when no parameter set is configured.
 * @throws Error when the invoice does not exist or a store call fails.
 */
export async function recalculateInvoice(
  client: SupabaseClient,
  invoiceNo: string,
  options: RecalculateOptions = {},
): Promise<RecalculateOutcome> {
  console.log(`Recalculating invoice ${invoiceNo}...`);
  const settings = await loadEstimatorSettings(client);
  const outcome = await recalculateWithSettings(client, invoiceNo, settings, options);
  console.log(`Invoice ${invoiceNo}: ${outcome.result.totalMinutes.toFixed(2)} min.`);
  return outcome;
}

/**
 * Re-estimates every open invoice, one at a time. Settings are read once for
 * the whole run. A failing invoice is logged and counted, the rest still run.
 *
 * @throws {ConfigurationError} when no parameter set is configured.
 */
export async function recalculateOpenInvoices(
  client: SupabaseClient,
  options: RecalculateOpenOptions = {},
): Promise<BulkRecalculateOutcome> {
  const statuses = options.statuses ?? DEFAULT_OPEN_STATUSES;
  const limit = options.limit ?? MAX_BULK_INVOICES;

  const settings = await loadEstimatorSettings(client);
  const invoiceNumbers = await getOpenInvoiceNumbers(client, statuses, limit);
  console.log(`Recalculating ${invoiceNumbers.length} open invoices...`);

  const outcome: BulkRecalculateOutcome = { recalculated: 0, failed: [], lastResult: null };
  const runOptions: RecalculateOptions = { ...options, reason: options.reason ?? 'bulk' };

  for (const invoiceNo of invoiceNumbers) {
    try {
      const { result } = await recalculateWithSettings(client, invoiceNo, settings, runOptions);
      outcome.recalculated += 1;
      outcome.lastResult = result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Failed to recalculate invoice ${invoiceNo}:`, message);
      outcome.failed.push({ invoiceNo, error: message });
    }
  }

  console.log(`Bulk recalculation done: ${outcome.recalculated} recalculated, ${outcome.failed.length} failed.`);
  return outcome;
}
