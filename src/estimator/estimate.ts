import {
  EstimateBreakdown,
  EstimateInput,
  EstimateResult,
  ItemMaster,
  LineEstimate,
} from '../types/estimator.types';
import { estimatePackSeconds } from './pack';
import { resolveTimeParams } from './params';
import { estimatePickSecondsForLine } from './pick';
import { orderStopsOneTrip } from './sequence';
import { buildStops, stopForLine, stopKey } from './stops';
import { allocateWalkSeconds, estimateTravelSeconds } from './travel';

export const ESTIMATOR_VERSION = 'oi_estimator_v1.1';

const toMinutes = (seconds: number): number => seconds / 60;

function breakdownInMinutes(breakdown: EstimateBreakdown): EstimateBreakdown {
  return {
    overheadSeconds: toMinutes(breakdown.overheadSeconds),
    travelSeconds: toMinutes(breakdown.travelSeconds),
    pickSeconds: toMinutes(breakdown.pickSeconds),
    packSeconds: toMinutes(breakdown.packSeconds),
  };
}

function deepFreeze(value: unknown): void {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) {
    return;
  }
  Object.freeze(value);
  for (const child of Object.values(value)) {
    deepFreeze(child);
  }
}

function frozen(result: EstimateResult): EstimateResult {
  deepFreeze(result);
  return result;
}

function activeOnly(itemsByCode: Map<string, ItemMaster>): Map<string, ItemMaster> {
  return new Map(Array.from(itemsByCode).filter(([, item]) => item.active));
}

/**
 * Estimates how long one invoice takes to fulfil:
 * overhead + travel + pick + pack, in seconds and minutes.
 *
 * Pure: everything it needs comes in through `input`, nothing is read from or
 * written to storage. Bad line data degrades to defaults; the only failure is
 * a missing parameter set.
 *
 * @throws {ConfigurationError} when `input.params` is absent or empty.
 */
export function estimateOrderTime(input: EstimateInput): EstimateResult {
  const params = resolveTimeParams(input.params);
  const { invoiceNo, summerMode, lines } = input;
  const calculatedAt = (input.now ?? new Date()).toISOString();

  if (lines.length === 0) {
    const zero: EstimateBreakdown = { overheadSeconds: 0, travelSeconds: 0, pickSeconds: 0, packSeconds: 0 };
    return frozen({
      invoiceNo,
      totalSeconds: 0,
      totalMinutes: 0,
      breakdown: zero,
      breakdownMinutes: zero,
      lines: [],
      travel: estimateTravelSeconds([], params).debug,
      pack: { totalLines: 0, specialGroups: [], specialGroupCount: 0 },
      stopsOrdered: [],
      summerMode,
      paramsVersion: params.version,
      estimatorVersion: ESTIMATOR_VERSION,
      calculatedAt,
    });
  }

  const itemsByCode = activeOnly(input.itemsByCode);

  const stopsOrdered = orderStopsOneTrip(buildStops(lines, params), params);
  const travel = estimateTravelSeconds(stopsOrdered, params);
  const walkByStop = allocateWalkSeconds(travel.debug);

  const visited = new Set<string>();
  let pickSeconds = 0;
  const lineEstimates: LineEstimate[] = lines.map(line => {
    const pick = estimatePickSecondsForLine(line, itemsByCode.get(line.itemCode) ?? null, params, summerMode);
    pickSeconds += pick.seconds;

    const key = stopKey(stopForLine(line, params));
    let walkSeconds = 0;
    if (!visited.has(key)) {
      visited.add(key);
      walkSeconds = walkByStop.get(key) ?? 0;
    }

    const totalSeconds = pick.seconds + walkSeconds;
    return {
      itemCode: line.itemCode,
      location: line.location,
      unitType: pick.debug.unitType,
      qty: pick.debug.qty,
      pickSeconds: pick.seconds,
      walkSeconds,
      totalSeconds,
      minutes: toMinutes(totalSeconds),
      debug: pick.debug,
    };
  });

  const pack = estimatePackSeconds(lines, itemsByCode, params, summerMode);
  const overheadSeconds = params.overhead.start_seconds + params.overhead.end_seconds;

  const breakdown: EstimateBreakdown = {
    overheadSeconds,
    travelSeconds: travel.totalSeconds,
    pickSeconds,
    packSeconds: pack.seconds,
  };
  const totalSeconds = overheadSeconds + travel.totalSeconds + pickSeconds + pack.seconds;

  return frozen({
    invoiceNo,
    totalSeconds,
    totalMinutes: toMinutes(totalSeconds),
    breakdown,
    breakdownMinutes: breakdownInMinutes(breakdown),
    lines: lineEstimates,
    travel: travel.debug,
    pack: pack.debug,
    stopsOrdered,
    summerMode,
    paramsVersion: params.version,
    estimatorVersion: ESTIMATOR_VERSION,
    calculatedAt,
  });
}
