import { Stop, StopSortKey } from '../types/estimator.types';
import { safeInt } from './location';
import { TimeParams } from './params';

const UNKNOWN_ZONE_RANK = 999;
const NON_NUMERIC_CORRIDOR = 9999;
const UNKNOWN_BAY_OR_POS = 999;
const UNKNOWN_LEVEL = 'Z';

const padCorridor = (corridor: string): string => corridor.trim().padStart(2, '0');

export function upperCorridorSet(params: TimeParams): Set<string> {
  return new Set(params.location.upper_corridors.map(padCorridor));
}

/**
 * Whether a stop sits on the upper floor. Corridors compare zero-padded,
 * so a configured 70 matches '70' and 7 matches '07'.
 */
export function isUpperStop(stop: Pick<Stop, 'corridor'>, upper: Set<string>): boolean {
  return stop.corridor !== null && upper.has(padCorridor(stop.corridor));
}

export function zonePriorityMap(params: TimeParams): Map<string, number> {
  return new Map(params.travel.zone_priority.map((zone, index) => [zone.trim().toUpperCase(), index]));
}

export function stopSortKey(stop: Stop, zoneRanks: Map<string, number>): StopSortKey {
  return [
    zoneRanks.get(stop.zone) ?? UNKNOWN_ZONE_RANK,
    stop.corridor === null ? NON_NUMERIC_CORRIDOR : safeInt(stop.corridor, NON_NUMERIC_CORRIDOR),
    stop.bay ?? UNKNOWN_BAY_OR_POS,
    stop.level ?? UNKNOWN_LEVEL,
    stop.pos ?? UNKNOWN_BAY_OR_POS,
  ];
}

export function compareSortKeys(a: StopSortKey, b: StopSortKey): number {
  for (let i = 0; i < a.length; i++) {
    const left = a[i];
    const right = b[i];
    if (left === right) continue;
    if (typeof left === 'number' && typeof right === 'number') {
      return left - right;
    }
    return String(left) < String(right) ? -1 : 1;
  }
  return 0;
}

/**
 * Orders stops for a single picking trip: every ground floor stop first, then
 * the upstairs block, so the picker climbs the stairs at most once. Within
 * each floor stops are sorted by zone priority, then corridor, bay, level and
 * position.
 *
 * @param stops - Unique stops from buildStops.
 * @param params - Resolved parameter set (upper corridors, zone priority).
 * @returns A new array; the input is left untouched.
 */
export function orderStopsOneTrip(stops: Stop[], params: TimeParams): Stop[] {
  const upper = upperCorridorSet(params);
  const zoneRanks = zonePriorityMap(params);
  const byKey = (a: Stop, b: Stop) => compareSortKeys(stopSortKey(a, zoneRanks), stopSortKey(b, zoneRanks));

  const ground = stops.filter(stop => !isUpperStop(stop, upper)).sort(byKey);
  const upstairs = stops.filter(stop => isUpperStop(stop, upper)).sort(byKey);

  return [...ground, ...upstairs];
}
