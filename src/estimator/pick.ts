import { ItemMaster, OrderLine, PickEstimate } from '../types/estimator.types';
import { classifyHandling } from './handling';
import { parseLocation, safeInt } from './location';
import { costFor, TimeParams } from './params';

const DEFAULT_UNIT_TYPE = 'item';
const DEFAULT_BASE_SECONDS = 6;
const DEFAULT_PER_QTY_SECONDS = 1.1;
const DEFAULT_DIFFICULTY = 2;

const UNIT_TYPE_SYNONYMS: Record<string, string> = {
  PCS: 'item',
  PIECE: 'item',
  ITEM: 'item',
  EA: 'item',
  UNIT: 'item',
  UNITS: 'item',
  PK: 'pack',
  PACK: 'pack',
  BX: 'box',
  BOX: 'box',
  CS: 'case',
  CASE: 'case',
  VPACK: 'virtual_pack',
  VIRTUAL_PACK: 'virtual_pack',
  'VIRTUAL PACK': 'virtual_pack',
  PIECES: 'virtual_pack',
};

/**
 * Maps the unit type spellings found on invoices ('Units', 'PCS', 'VPACK',
 * 'Pieces', ...) onto the keys used by the cost maps.
 */
export function normalizeUnitType(raw: string | null | undefined): string {
  const unitType = raw?.trim() ?? '';
  if (unitType === '') {
    return DEFAULT_UNIT_TYPE;
  }
  return UNIT_TYPE_SYNONYMS[unitType.toUpperCase()] ?? unitType.toLowerCase();
}

/**
 * Quantity the picker actually handles. For virtual packs the picker takes
 * individual pieces, so the invoiced quantity is multiplied by the pieces per
 * pack.
 */
export function displayQty(line: OrderLine, item: ItemMaster | null): number | null {
  if (!line.qty) {
    return line.qty;
  }
  if (item && item.piecesPerUnit && item.piecesPerUnit > 1 && item.packAttribute?.trim().toUpperCase() === 'VPACK') {
    return line.qty * item.piecesPerUnit;
  }
  return line.qty;
}

/**
 * Extra seconds for fetching a ladder, from the first ladder rule whose
 * corridors and levels both match.
 */
export function ladderSecondsFor(corridor: string | null, level: string | null, params: TimeParams): number {
  if (corridor === null || level === null) {
    return 0;
  }
  const paddedCorridor = corridor.trim().padStart(2, '0');
  const upperLevel = level.toUpperCase();
  for (const rule of params.pick.ladder_rules) {
    const corridors = rule.corridors.map(c => c.trim().padStart(2, '0'));
    const levels = rule.levels.map(l => l.toUpperCase());
    if (corridors.includes(paddedCorridor) && levels.includes(upperLevel)) {
      return rule.ladder_seconds;
    }
  }
  return 0;
}

/**
 * Estimates the touch time for one invoice line: base cost for the unit type,
 * an increment per additional unit, and penalties for the shelf level, ladder
 * access, pick difficulty and handling requirements.
 *
 * @param line - The invoice line.
 * @param item - Its item master row, or null when the master has none.
 * @param params - Resolved parameter set.
 * @param summerMode - Whether heat-sensitive items need extra care.
 * @returns Seconds (never negative) with the terms that produced them.
 */
export function estimatePickSecondsForLine(
  line: OrderLine,
  item: ItemMaster | null,
  params: TimeParams,
  summerMode: boolean,
): PickEstimate {
  const pick = params.pick;

  const unitType = normalizeUnitType(line.unitType || item?.unitType);
  const base =
    costFor(pick.base_by_unit_type, unitType) ?? costFor(pick.base_by_unit_type, DEFAULT_UNIT_TYPE) ?? DEFAULT_BASE_SECONDS;
  const perQty =
    costFor(pick.per_qty_by_unit_type, unitType) ??
    costFor(pick.per_qty_by_unit_type, DEFAULT_UNIT_TYPE) ??
    DEFAULT_PER_QTY_SECONDS;
  const qty = Math.max(1, safeInt(displayQty(line, item), 1));

  const parsed = parseLocation(line.location, line.corridor, params);
  const level = parsed.level?.toUpperCase() ?? null;
  const levelPenalty = level === null ? 0 : costFor(pick.level_seconds, level) ?? 0;
  const ladderPenalty = ladderSecondsFor(parsed.corridor, level, params);

  const difficulty = String(safeInt(item?.pickDifficulty, DEFAULT_DIFFICULTY));
  const difficultyPenalty = costFor(pick.difficulty_seconds, difficulty) ?? 0;

  const flags = classifyHandling(item, summerMode);
  const penalties = pick.handling_seconds;
  let handling = 0;
  if (flags.fragility === 'yes') handling += costFor(penalties, 'fragility_yes') ?? 0;
  if (flags.fragility === 'semi') handling += costFor(penalties, 'fragility_semi') ?? 0;
  if (flags.spill) handling += costFor(penalties, 'spill_true') ?? 0;
  if (flags.pressureHigh) handling += costFor(penalties, 'pressure_high') ?? 0;
  if (flags.heatSensitive) handling += costFor(penalties, 'heat_sensitive_summer') ?? 0;

  const alignScan = pick.sec_align_scan_per_line;
  const seconds =
    base + perQty * (qty - 1) + alignScan + levelPenalty + ladderPenalty + difficultyPenalty + handling;

  return {
    seconds: Math.max(0, seconds),
    debug: {
      unitType,
      qty,
      base,
      perQty,
      alignScan,
      level,
      levelPenalty,
      ladderPenalty,
      difficulty,
      difficultyPenalty,
      handling,
      flags,
      summerMode,
    },
  };
}
