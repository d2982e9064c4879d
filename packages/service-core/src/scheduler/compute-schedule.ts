import _ from 'lodash';

export type TablePlacement = {
  table_id: number;
  capture_id: string;
  /**
   * Mid hand-off. `capture_id` is then the destination of the table.
   */
  in_flight: boolean;
};

export type ScheduleInput = {
  table_ids: number[];
  capture_ids: string[];
  placements: TablePlacement[];
};

export type TableMove = {
  table_id: number;
  /**
   * Null for a table that is not assigned yet.
   */
  from: string | null;
  to: string;
};

type CaptureLoad = {
  capture_id: string;
  settled: number[];
  in_flight: number[];
};

const loadOf = (capture: CaptureLoad) => capture.settled.length + capture.in_flight.length;

function collectLoads(input: ScheduleInput) {
  const tables = new Set(input.table_ids);
  const loads = new Map<string, CaptureLoad>(
    _.uniq(input.capture_ids).map((capture_id) => [capture_id, { capture_id, settled: [], in_flight: [] }])
  );
  const placed = new Set<number>();
  const frozen = new Set<number>();
  for (const placement of input.placements) {
    if (!tables.has(placement.table_id) || placed.has(placement.table_id)) {
      continue;
    }
    if (placement.in_flight) {
      // Tables mid hand-off never move, even when their destination is gone.
      frozen.add(placement.table_id);
    }
    const load = loads.get(placement.capture_id);
    if (load == null) {
      continue;
    }
    placed.add(placement.table_id);
    (placement.in_flight ? load.in_flight : load.settled).push(placement.table_id);
  }
  const unassigned = _.sortBy(_.uniq(input.table_ids)).filter((id) => !placed.has(id) && !frozen.has(id));
  return { loads: [...loads.values()], unassigned, table_count: _.uniq(input.table_ids).length };
}

/**
 * Places every unassigned table on the capture with the fewest tables, ties broken by capture id.
 * Tables that already have a capture stay where they are.
 */
export function computeInitialAssignment(input: ScheduleInput): TableMove[] {
  const { loads, unassigned } = collectLoads(input);
  if (loads.length == 0) {
    return [];
  }
  const moves: TableMove[] = [];
  for (const table_id of unassigned) {
    const target = _.minBy(_.sortBy(loads, (l) => l.capture_id), loadOf);
    if (target == null) {
      break;
    }
    target.settled.push(table_id);
    moves.push({ table_id, from: null, to: target.capture_id });
  }
  return moves;
}

/**
 * Computes the moves that balance the table set over the captures with minimal churn.
 *
 * Each capture gets `floor(n / m)` tables; the remaining `n mod m` go to the first captures
 * ordered by current load (descending), then id. Captures above their target give up their
 * highest table ids. Those tables and the unassigned ones are handed to captures below target,
 * lowest table id first.
 */
export function computeSchedule(input: ScheduleInput): TableMove[] {
  const { loads, unassigned, table_count } = collectLoads(input);
  const m = loads.length;
  if (m == 0) {
    return [];
  }

  const ordered = _.orderBy(loads, [loadOf, (l) => l.capture_id], ['desc', 'asc']);
  const base = Math.floor(table_count / m);
  const remainder = table_count % m;
  const targets = new Map(ordered.map((l, index) => [l.capture_id, base + (index < remainder ? 1 : 0)]));
  const targetOf = (load: CaptureLoad) => targets.get(load.capture_id) ?? base;

  const pool: { table_id: number; from: string | null }[] = unassigned.map((table_id) => ({ table_id, from: null }));
  for (const load of ordered) {
    const excess = loadOf(load) - targetOf(load);
    if (excess <= 0) {
      continue;
    }
    const released = _.orderBy(load.settled, [(id) => id], ['desc']).slice(0, excess);
    load.settled = load.settled.filter((id) => !released.includes(id));
    pool.push(...released.map((table_id) => ({ table_id, from: load.capture_id })));
  }

  const sortedPool = _.sortBy(pool, (entry) => entry.table_id);
  const moves: TableMove[] = [];
  for (const load of ordered) {
    while (loadOf(load) < targetOf(load) && sortedPool.length > 0) {
      const entry = sortedPool.shift();
      if (entry == null) {
        break;
      }
      load.settled.push(entry.table_id);
      if (entry.from != load.capture_id) {
        moves.push({ table_id: entry.table_id, from: entry.from, to: load.capture_id });
      }
    }
  }
  return moves;
}
