import { Stop, TravelDebug, TravelEstimate, TravelStep } from '../types/estimator.types';
import { safeInt } from './location';
import { TimeParams } from './params';
import { isUpperStop, upperCorridorSet } from './sequence';
import { stopKey } from './stops';

function emptyTravelDebug(): TravelDebug {
  return { stops: 0, zoneSwitches: 0, corridorChanges: 0, baySteps: 0, posSteps: 0, stairsSeconds: 0, steps: [] };
}

/**
 * Walks an ordered route and sums the walking cost.
 *
 * Every stop pays the alignment cost, including the first. Moving from the
 * previous stop adds, where applicable: a zone switch; a corridor change plus
 * `sec_per_corridor_step` for each corridor skipped over (jump - 1); bay and
 * position steps when both stops know them. Upstairs stops pay an extra
 * `align * (upper_walk_multiplier - 1)`. This only scales the alignment
 * portion, not the distance walked, and is kept that way so new estimates
 * stay comparable with historical ones.
 *
 * Stairs (up + down) are charged once per route when any stop is upstairs,
 * however many upstairs stops there are.
 *
 * @param ordered - Stops in walking order, from orderStopsOneTrip.
 * @param params - Resolved parameter set.
 */
export function estimateTravelSeconds(ordered: Stop[], params: TimeParams): TravelEstimate {
  if (ordered.length === 0) {
    return { totalSeconds: 0, debug: emptyTravelDebug() };
  }

  const travel = params.travel;
  const upper = upperCorridorSet(params);
  const debug = emptyTravelDebug();
  debug.stops = ordered.length;

  let total = 0;
  let prev: Stop | null = null;

  ordered.forEach((stop, index) => {
    const step: TravelStep = {
      index,
      stopKey: stopKey(stop),
      alignSeconds: travel.sec_align_per_stop,
      zoneSwitchSeconds: 0,
      corridorSeconds: 0,
      baySeconds: 0,
      posSeconds: 0,
      upperExtraSeconds: 0,
      totalSeconds: 0,
    };

    if (prev !== null) {
      if (prev.zone !== stop.zone) {
        step.zoneSwitchSeconds = travel.zone_switch_seconds;
        debug.zoneSwitches++;
      }

      if ((prev.corridor ?? '') !== (stop.corridor ?? '')) {
        step.corridorSeconds = travel.sec_per_corridor_change;
        debug.corridorChanges++;
        const from = safeInt(prev.corridor, null);
        const to = safeInt(stop.corridor, null);
        if (from !== null && to !== null) {
          const jump = Math.abs(to - from);
          if (jump > 1) {
            step.corridorSeconds += (jump - 1) * travel.sec_per_corridor_step;
          }
        }
      }

      if (prev.bay !== null && stop.bay !== null) {
        const bays = Math.abs(stop.bay - prev.bay);
        step.baySeconds = bays * travel.sec_per_bay_step;
        debug.baySteps += bays;
      }

      if (prev.pos !== null && stop.pos !== null) {
        const positions = Math.abs(stop.pos - prev.pos);
        step.posSeconds = positions * travel.sec_per_pos_step;
        debug.posSteps += positions;
      }
    }

    if (travel.upper_walk_multiplier !== 1 && isUpperStop(stop, upper)) {
      step.upperExtraSeconds = travel.sec_align_per_stop * (travel.upper_walk_multiplier - 1);
    }

    step.totalSeconds =
      step.alignSeconds +
      step.zoneSwitchSeconds +
      step.corridorSeconds +
      step.baySeconds +
      step.posSeconds +
      step.upperExtraSeconds;
    total += step.totalSeconds;
    debug.steps.push(step);
    prev = stop;
  });

  if (ordered.some(stop => isUpperStop(stop, upper))) {
    debug.stairsSeconds = travel.sec_stairs_up + travel.sec_stairs_down;
  }

  return { totalSeconds: total + debug.stairsSeconds, debug };
}

/**
 * Maps each stop to the seconds spent walking onto it, so the time can be
 * attributed to the first line picked there. Stairs stay at order level.
 */
export function allocateWalkSeconds(debug: TravelDebug): Map<string, number> {
  const walk = new Map<string, number>();
  for (const step of debug.steps) {
    walk.set(step.stopKey, step.totalSeconds);
  }
  return walk;
}
