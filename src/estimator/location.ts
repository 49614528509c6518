import { ParsedLocation } from '../types/estimator.types';
import { TimeParams } from './params';

const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

const compiledPatterns = new Map<string, RegExp | null>();

/**
 * Converts a loosely typed value to an integer, truncating decimals
 * ("2.7" -> 2). Anything that is not a finite number yields `fallback`.
 */
export function safeInt<T extends number | null>(value: unknown, fallback: T): number | T {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : fallback;
  }
  if (typeof value !== 'string') {
    return fallback;
  }
  const text = value.trim();
  if (!NUMERIC.test(text)) {
    return fallback;
  }
  const parsed = Number(text);
  return Number.isFinite(parsed) ? Math.trunc(parsed) : fallback;
}

/**
 * Strips all whitespace and upper-cases, so '31-04-E 02' and '31-04-e02'
 * both become '31-04-E02'.
 */
export function normalizeLocation(location: string): string {
  return location.replace(/\s+/g, '').toUpperCase();
}

/**
 * Compiles the configured location pattern. Named groups may also be written
 * as `(?P<corridor>...)`. Matching is anchored at the start of the string.
 * Returns null for an invalid pattern.
 */
export function compileLocationPattern(pattern: string): RegExp | null {
  if (compiledPatterns.has(pattern)) {
    return compiledPatterns.get(pattern) ?? null;
  }
  const source = pattern.replace(/\(\?P</g, '(?<');
  let compiled: RegExp | null;
  try {
    compiled = new RegExp(source.startsWith('^') ? source : `^(?:${source})`);
  } catch {
    compiled = null;
  }
  compiledPatterns.set(pattern, compiled);
  return compiled;
}

function unparsed(corridorFallback: string | null): ParsedLocation {
  return { corridor: corridorFallback, bay: null, level: null, pos: null };
}

/**
 * Splits a warehouse location such as '10-01-A02' into corridor, bay, level
 * and position using the configured pattern (groups `corridor`, `bay`,
 * `level`, `pos`).
 *
 * Dirty data never throws: an empty location, a broken pattern or a
 * non-matching string all produce null fields, with the corridor taken from
 * `corridorFallback` (the line's own corridor column) when one is given.
 */
export function parseLocation(
  location: string | null | undefined,
  corridorFallback: string | null | undefined,
  params: TimeParams,
): ParsedLocation {
  const fallback = corridorFallback?.trim() || null;
  if (!location || location.trim() === '') {
    return unparsed(fallback);
  }

  const pattern = compileLocationPattern(params.location.regex);
  if (!pattern) {
    return unparsed(fallback);
  }

  const match = pattern.exec(normalizeLocation(location));
  if (!match) {
    return unparsed(fallback);
  }

  const groups = match.groups ?? {};
  return {
    corridor: groups.corridor || fallback,
    bay: safeInt(groups.bay, null),
    level: groups.level || null,
    pos: safeInt(groups.pos, null),
  };
}

const pad2 = (value: number): string => String(value).padStart(2, '0');

/**
 * Rebuilds the canonical '{corridor}-{bay}-{level}{pos}' form, or null when
 * any part is unknown.
 */
export function formatLocation(parsed: ParsedLocation): string | null {
  const { corridor, bay, level, pos } = parsed;
  if (corridor === null || bay === null || level === null || pos === null) {
    return null;
  }
  return `${corridor}-${pad2(bay)}-${level}${pad2(pos)}`;
}
