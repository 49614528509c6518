import { z } from 'zod';
import defaultTimeParams from './defaultTimeParams.json';
import { ConfigurationError } from './errors';

const NUMERIC = /^\s*-?\d+(\.\d+)?\s*$/;

// Numbers may arrive as JSON numbers or as numeric strings typed into the admin screen.
const numericValue = z.union([
  z.number().finite(),
  z.string().regex(NUMERIC).transform(Number),
]);

const seconds = (fallback: number) => numericValue.catch(fallback);

/**
 * A map of numeric costs. Entries that are not numeric are dropped so that a
 * lookup falls through to its default instead of producing NaN.
 */
const secondsMap = (fallback: Record<string, number>) =>
  z
    .record(z.string(), z.unknown())
    .transform((raw): Record<string, number> => {
      const entries: [string, number][] = [];
      for (const [key, value] of Object.entries(raw)) {
        const parsed = numericValue.safeParse(value);
        if (parsed.success) {
          entries.push([key, parsed.data]);
        }
      }
      return Object.fromEntries(entries);
    })
    .catch(fallback);

/**
 * Looks up a cost by an own key only, so keys such as 'constructor' coming
 * from line data never resolve to Object.prototype members.
 */
export function costFor(map: Record<string, number>, key: string): number | undefined {
  return Object.hasOwn(map, key) ? map[key] : undefined;
}

const corridorList = (fallback: string[]) =>
  z.array(z.union([z.string(), z.number()]).transform(String)).catch(fallback);

const ladderRuleSchema = z.object({
  corridors: corridorList([]),
  levels: z.array(z.string()).catch([]),
  ladder_seconds: seconds(0),
});

const D = defaultTimeParams;

export const timeParamsSchema = z
  .object({
    version: z.union([z.string(), z.number()]).transform(String).catch(D.version),
    location: z
      .object({
        regex: z.string().min(1).catch(D.location.regex),
        upper_corridors: corridorList(D.location.upper_corridors),
      })
      .passthrough(),
    overhead: z
      .object({
        start_seconds: seconds(D.overhead.start_seconds),
        end_seconds: seconds(D.overhead.end_seconds),
      })
      .passthrough(),
    travel: z
      .object({
        sec_align_per_stop: seconds(D.travel.sec_align_per_stop),
        sec_per_corridor_change: seconds(D.travel.sec_per_corridor_change),
        sec_per_corridor_step: seconds(D.travel.sec_per_corridor_step),
        sec_per_bay_step: seconds(D.travel.sec_per_bay_step),
        sec_per_pos_step: seconds(D.travel.sec_per_pos_step),
        sec_stairs_up: seconds(D.travel.sec_stairs_up),
        sec_stairs_down: seconds(D.travel.sec_stairs_down),
        upper_walk_multiplier: seconds(D.travel.upper_walk_multiplier),
        zone_switch_seconds: seconds(D.travel.zone_switch_seconds),
        zone_priority: z.array(z.string()).catch(D.travel.zone_priority),
      })
      .passthrough(),
    pick: z
      .object({
        sec_align_scan_per_line: seconds(D.pick.sec_align_scan_per_line),
        base_by_unit_type: secondsMap(D.pick.base_by_unit_type),
        per_qty_by_unit_type: secondsMap(D.pick.per_qty_by_unit_type),
        level_seconds: secondsMap(D.pick.level_seconds),
        difficulty_seconds: secondsMap(D.pick.difficulty_seconds),
        handling_seconds: secondsMap(D.pick.handling_seconds),
        ladder_rules: z.array(ladderRuleSchema).catch(D.pick.ladder_rules),
      })
      .passthrough(),
    pack: z
      .object({
        base_seconds: seconds(D.pack.base_seconds),
        per_line_seconds: seconds(D.pack.per_line_seconds),
        special_group_seconds: seconds(D.pack.special_group_seconds),
      })
      .passthrough(),
  })
  .passthrough();

export type TimeParams = z.infer<typeof timeParamsSchema>;

const SECTIONS = ['location', 'overhead', 'travel', 'pick', 'pack'] as const;

export const DEFAULT_TIME_PARAMS: TimeParams = timeParamsSchema.parse(defaultTimeParams);

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Older payloads carry `sec_align_per_move` instead of `sec_align_per_stop`.
 * The per-move value becomes the per-stop cost when only it is present.
 */
function migrateAlignKeys(raw: Record<string, unknown>): Record<string, unknown> {
  const travel = raw.travel;
  if (!isRecord(travel) || 'sec_align_per_stop' in travel || !('sec_align_per_move' in travel)) {
    return raw;
  }
  return { ...raw, travel: { ...travel, sec_align_per_stop: travel.sec_align_per_move } };
}

/**
 * Turns a stored parameter payload into a complete, validated TimeParams.
 *
 * Each section is laid over its defaults key by key; cost maps
 * (`base_by_unit_type` and friends) replace the default map as a whole so that
 * an unconfigured unit type falls back to the `item` entry. Keys we do not
 * know about are kept for the audit snapshot.
 *
 * @throws {ConfigurationError} when the payload is absent, empty or not an object.
 */
export function resolveTimeParams(raw: unknown): TimeParams {
  if (!isRecord(raw) || Object.keys(raw).length === 0) {
    throw new ConfigurationError('Order time parameter set is missing or not a JSON object.');
  }

  const migrated = migrateAlignKeys(raw);
  const merged: Record<string, unknown> = { ...migrated };
  for (const section of SECTIONS) {
    const override = migrated[section];
    merged[section] = { ...D[section], ...(isRecord(override) ? override : {}) };
  }

  return timeParamsSchema.parse(merged);
}
