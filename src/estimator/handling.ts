import { HandlingFlags, ItemMaster, SpecialGroup } from '../types/estimator.types';

const FRAGILE_YES = new Set(['yes', 'y', 'true', 'fragile']);
const FRAGILE_SEMI = new Set(['semi', 'moderate', 'medium']);
const TRUTHY = new Set(['true', '1', 'yes', 'y']);

const norm = (value: unknown): string => (value === null || value === undefined ? '' : String(value)).trim().toLowerCase();

export function isTruthyFlag(value: boolean | string | number | null | undefined): boolean {
  return value === true || TRUTHY.has(norm(value));
}

/**
 * Reads the handling attributes of an item master row. A missing row has no
 * special handling. Heat sensitivity only counts while summer mode is on.
 */
export function classifyHandling(item: ItemMaster | null, summerMode: boolean): HandlingFlags {
  if (item === null) {
    return { fragility: null, spill: false, pressureHigh: false, heatSensitive: false };
  }

  const fragility = norm(item.fragility);
  return {
    fragility: FRAGILE_YES.has(fragility) ? 'yes' : FRAGILE_SEMI.has(fragility) ? 'semi' : null,
    spill: isTruthyFlag(item.spillRisk),
    pressureHigh: norm(item.pressureSensitivity) === 'high',
    heatSensitive: summerMode && norm(item.temperatureSensitivity) === 'heat_sensitive',
  };
}

/**
 * Packing groups an item belongs to. Semi-fragile items still need the
 * fragile packing step.
 */
export function specialGroupsFor(flags: HandlingFlags): SpecialGroup[] {
  const groups: SpecialGroup[] = [];
  if (flags.fragility !== null) groups.push('fragile');
  if (flags.spill) groups.push('spill');
  if (flags.pressureHigh) groups.push('pressure_high');
  if (flags.heatSensitive) groups.push('heat_sensitive_summer');
  return groups;
}
