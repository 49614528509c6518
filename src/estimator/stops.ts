import { OrderLine, Stop } from '../types/estimator.types';
import { parseLocation } from './location';
import { TimeParams } from './params';

export const DEFAULT_ZONE = 'MAIN';

export function normalizeZone(zone: string | null | undefined): string {
  return zone?.trim().toUpperCase() || DEFAULT_ZONE;
}

/**
 * Identity of a stop: two lines at the same (zone, corridor, bay, level, pos)
 * share one stop.
 */
export function stopKey(stop: Pick<Stop, 'zone' | 'corridor' | 'bay' | 'level' | 'pos'>): string {
  return JSON.stringify([stop.zone, stop.corridor, stop.bay, stop.level, stop.pos]);
}

/**
 * Resolves the stop an order line is picked from.
 */
export function stopForLine(line: OrderLine, params: TimeParams): Stop {
  const parsed = parseLocation(line.location, line.corridor, params);
  return {
    zone: normalizeZone(line.zone),
    corridor: parsed.corridor,
    bay: parsed.bay,
    level: parsed.level,
    pos: parsed.pos,
    location: line.location,
  };
}

/**
 * Collapses order lines into the unique physical stops they need, in the
 * order each stop is first seen. Sequencing happens later.
 *
 * @param lines - Invoice lines to pick.
 * @param params - Resolved parameter set (location pattern).
 * @returns One Stop per distinct location tuple.
 */
export function buildStops(lines: OrderLine[], params: TimeParams): Stop[] {
  const stops = new Map<string, Stop>();
  for (const line of lines) {
    const stop = stopForLine(line, params);
    const key = stopKey(stop);
    if (!stops.has(key)) {
      stops.set(key, stop);
    }
  }
  return Array.from(stops.values());
}
