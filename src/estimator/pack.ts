import { ItemMaster, OrderLine, PackEstimate, SpecialGroup } from '../types/estimator.types';
import { classifyHandling, specialGroupsFor } from './handling';
import { TimeParams } from './params';

const GROUP_ORDER: SpecialGroup[] = ['fragile', 'spill', 'pressure_high', 'heat_sensitive_summer'];

/**
 * Packing time for a whole invoice: a base, a cost per line, and one extra
 * step per special handling group present on any line. A group is charged
 * once however many lines need it.
 *
 * @param lines - All lines of the invoice.
 * @param itemsByCode - Item master rows keyed by item code; lines without a row add no group.
 * @param params - Resolved parameter set.
 * @param summerMode - Whether heat-sensitive items form a group.
 */
export function estimatePackSeconds(
  lines: OrderLine[],
  itemsByCode: Map<string, ItemMaster>,
  params: TimeParams,
  summerMode: boolean,
): PackEstimate {
  const pack = params.pack;

  const present = new Set<SpecialGroup>();
  for (const line of lines) {
    const item = itemsByCode.get(line.itemCode) ?? null;
    specialGroupsFor(classifyHandling(item, summerMode)).forEach(group => present.add(group));
  }
  const specialGroups = GROUP_ORDER.filter(group => present.has(group));

  const seconds = pack.base_seconds + pack.per_line_seconds * lines.length + pack.special_group_seconds * specialGroups.length;

  return {
    seconds: Math.max(0, seconds),
    debug: {
      totalLines: lines.length,
      specialGroups,
      specialGroupCount: specialGroups.length,
    },
  };
}
