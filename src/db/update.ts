import { PostgrestError, SupabaseClient } from '@supabase/supabase-js';
import { TimeParams } from '../estimator/params';
import { EstimateLineRow, EstimateRunRow } from '../types/database.types';
import { EstimateResult } from '../types/estimator.types';

/**
 * Per-line expected minutes keyed by item code. An invoice holds one row per
 * item code, so repeated codes add up onto that row.
 */
export function lineMinutesByItemCode(result: EstimateResult): Map<string, number> {
  const minutes = new Map<string, number>();
  for (const line of result.lines) {
    minutes.set(line.itemCode, (minutes.get(line.itemCode) ?? 0) + line.minutes);
  }
  return minutes;
}

/**
 * Writes an estimate back: `invoice_items.exp_time` (minutes per line,
 * pick plus the walk attributed to it) and `invoices.total_exp_time`
 * (minutes for the whole invoice).
 *
 * @param supabase The Supabase client instance.
 * @param result The estimate to store.
 * @throws Throws an error if any update fails, listing what failed.
 */
export async function persistEstimate(supabase: SupabaseClient, result: EstimateResult): Promise<void> {
  const lineMinutes = lineMinutesByItemCode(result);
  console.log(`Persisting estimate for invoice ${result.invoiceNo}: ${result.totalMinutes.toFixed(2)} min over ${lineMinutes.size} lines...`);

  const targets: string[] = [];
  const updatePromises: PromiseLike<{ error: PostgrestError | null }>[] = Array.from(lineMinutes).map(([itemCode, minutes]) => {
    targets.push(`line ${itemCode}`);
    return supabase
      .from('invoice_items')
      .update({ exp_time: minutes })
      .eq('invoice_no', result.invoiceNo)
      .eq('item_code', itemCode);
  });

  targets.push('invoice total');
  updatePromises.push(
    supabase
      .from('invoices')
      .update({ total_exp_time: result.totalMinutes })
      .eq('invoice_no', result.invoiceNo),
  );

  const updateResults = await Promise.all(updatePromises);

  const failed: string[] = [];
  updateResults.forEach((updateResult, index) => {
    if (updateResult.error) {
      console.error(`Error updating ${targets[index]} of invoice ${result.invoiceNo}:`, updateResult.error);
      failed.push(targets[index]);
    }
  });

  if (failed.length > 0) {
    throw new Error(`${failed.length} update(s) failed for invoice ${result.invoiceNo}: ${failed.join(', ')}. Check logs for details.`);
  }

  console.log(`Estimate for invoice ${result.invoiceNo} persisted.`);
}

export function toEstimateRunRow(result: EstimateResult, params: TimeParams, paramsRevision: number, reason: string): EstimateRunRow {
  return {
    invoice_no: result.invoiceNo,
    estimator_version: result.estimatorVersion,
    params_revision: paramsRevision,
    params_snapshot_json: JSON.stringify(params),
    estimated_total_seconds: result.totalSeconds,
    estimated_pick_seconds: result.breakdown.pickSeconds,
    estimated_travel_seconds: result.breakdown.travelSeconds,
    breakdown_json: JSON.stringify({ ...result.breakdown, travel: result.travel, pack: result.pack }),
    reason,
  };
}

export function toEstimateLineRows(result: EstimateResult, runId: number): EstimateLineRow[] {
  return result.lines.map(line => ({
    run_id: runId,
    invoice_no: result.invoiceNo,
    item_code: line.itemCode,
    location: line.location,
    unit_type_normalized: line.unitType,
    qty: line.qty,
    estimated_pick_seconds: line.pickSeconds,
    estimated_walk_seconds: line.walkSeconds,
    estimated_total_seconds: line.totalSeconds,
    breakdown_json: JSON.stringify(line.debug),
  }));
}

/**
 * Records an audit snapshot of an estimate: one `oi_estimate_runs` row with
 * the parameter set and revision that produced it, and one
 * `oi_estimate_lines` row per invoice line.
 *
 * @returns The id of the new run.
 * @throws Throws an error if either insert fails.
 */
export async function createEstimateRun(
  supabase: SupabaseClient,
  result: EstimateResult,
  params: TimeParams,
  paramsRevision: number,
  reason: string,
): Promise<number> {
  const { data, error } = await supabase
    .from('oi_estimate_runs')
    .insert(toEstimateRunRow(result, params, paramsRevision, reason))
    .select('id')
    .single();

  if (error) {
    console.error(`Error creating estimate run for invoice ${result.invoiceNo}:`, error);
    throw new Error(`Failed to create estimate run: ${error.message}`);
  }

  const runId = Number(data?.id);
  if (!Number.isInteger(runId)) {
    throw new Error(`Estimate run for invoice ${result.invoiceNo} was created without an id.`);
  }

  const lineRows = toEstimateLineRows(result, runId);
  if (lineRows.length > 0) {
    const { error: linesError } = await supabase.from('oi_estimate_lines').insert(lineRows);
    if (linesError) {
      console.error(`Error creating estimate lines for run ${runId}:`, linesError);
      throw new Error(`Failed to create estimate lines for run ${runId}: ${linesError.message}`);
    }
  }

  console.log(`Created estimate run ${runId} for invoice ${result.invoiceNo} (${lineRows.length} lines, reason: ${reason}).`);
  return runId;
}
