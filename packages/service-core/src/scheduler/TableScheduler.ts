import {
  CaptureNotFoundError,
  ChangefeedUpdateRefusedError,
  Logger,
  TableHandOffInProgressError,
  TableNotFoundError
} from '@changeplane/lib-services-framework';
import { ControlPlaneStorage } from '../storage/ControlPlaneStorage.js';
import { ChangefeedInfo, ChangefeedState, OwnerToken, TableAckState, TablePhase, TableTask } from '../storage/model.js';
import { computeInitialAssignment, computeSchedule, TablePlacement, TableMove } from './compute-schedule.js';

export type SchedulingRound = {
  token: OwnerToken;
  /**
   * Ids of the captures that are alive in this round.
   */
  live: Set<string>;
};

export type ScheduleOptions = {
  rebalance: boolean;
};

/**
 * A releasing task whose holder stopped it, never started it, or died.
 */
export const isDrained = (task: TableTask, live: Set<string>) => {
  return task.phase == TablePhase.RELEASING && (task.state != TableAckState.RUNNING || !live.has(task.capture_id));
};

/**
 * Owner-side table scheduling of one changefeed. Every method reads its input from the
 * given tasks and writes assignment changes to the store with the owner token.
 */
export class TableScheduler {
  constructor(
    private storage: ControlPlaneStorage,
    private logger: Logger
  ) {}

  /**
   * Scheduling of a changefeed in state `normal`: finishes hand-offs, drops tasks of dead
   * captures, assigns unassigned tables and optionally rebalances.
   */
  async scheduleChangefeed(round: SchedulingRound, cf: ChangefeedInfo, tasks: TableTask[], options: ScheduleOptions) {
    const { token, live } = round;
    const current: TableTask[] = [];

    for (const task of tasks) {
      if (task.phase == TablePhase.ASSIGNED && !live.has(task.capture_id)) {
        this.logger.info(`Table ${task.table_id} of ${cf.id} lost its capture ${task.capture_id}, rescheduling`);
        await this.storage.deleteTableTask(token, cf.id, task.table_id);
      } else if (isDrained(task, live)) {
        current.push(...(await this.finishHandOff(token, task, live)));
      } else {
        current.push(task);
      }
    }

    const input = {
      table_ids: cf.table_ids,
      capture_ids: [...live],
      placements: current.map(placementOf)
    };
    const initial = computeInitialAssignment(input);
    for (const move of initial) {
      const task = await this.storage.assignTableTask(token, {
        changefeed_id: cf.id,
        table_id: move.table_id,
        capture_id: move.to
      });
      current.push(task);
    }
    if (initial.length > 0) {
      this.logger.info(`Assigned ${initial.length} table(s) of ${cf.id}`);
    }

    if (!options.rebalance) {
      return;
    }
    const moves = computeSchedule({ ...input, placements: current.map(placementOf) });
    for (const move of moves) {
      await this.applyMove(token, cf.id, move);
    }
    if (moves.length > 0) {
      this.logger.info(`Rebalancing ${cf.id}: moving ${moves.length} table(s)`);
    }
  }

  /**
   * Scheduling of a changefeed that must not run: releases every task and deletes the drained ones.
   * @returns the number of tasks that still exist.
   */
  async revokeChangefeed(round: SchedulingRound, cf: ChangefeedInfo, tasks: TableTask[]): Promise<number> {
    const { token, live } = round;
    let remaining = 0;
    for (const task of tasks) {
      if (isDrained(task, live) || !live.has(task.capture_id)) {
        await this.storage.deleteTableTask(token, cf.id, task.table_id);
      } else if (task.phase == TablePhase.ASSIGNED || task.move_target != null) {
        await this.storage.releaseTableTask(token, cf.id, task.table_id, null);
        remaining++;
      } else {
        remaining++;
      }
    }
    return remaining;
  }

  /**
   * Applies an explicit table move.
   *
   * @throws a ServiceError if the move is no longer possible; the store is unchanged in that case.
   */
  async moveTable(round: SchedulingRound, cf: ChangefeedInfo, tasks: TableTask[], table_id: number, target: string) {
    const { token, live } = round;
    if (cf.state != ChangefeedState.NORMAL) {
      throw new ChangefeedUpdateRefusedError(cf.id, `tables of a ${cf.state} changefeed cannot be moved`);
    }
    if (!cf.table_ids.includes(table_id)) {
      throw new TableNotFoundError(cf.id, table_id);
    }
    if (!live.has(target)) {
      throw new CaptureNotFoundError(target);
    }
    const task = tasks.find((t) => t.table_id == table_id);
    if (task == null || (task.phase == TablePhase.ASSIGNED && !live.has(task.capture_id))) {
      await this.storage.assignTableTask(token, { changefeed_id: cf.id, table_id, capture_id: target });
      return;
    }
    if (task.phase == TablePhase.RELEASING) {
      throw new TableHandOffInProgressError(cf.id, table_id);
    }
    if (task.capture_id == target) {
      return;
    }
    this.logger.info(`Moving table ${table_id} of ${cf.id} from ${task.capture_id} to ${target}`);
    await this.storage.releaseTableTask(token, cf.id, table_id, target);
  }

  private async finishHandOff(token: OwnerToken, task: TableTask, live: Set<string>): Promise<TableTask[]> {
    if (task.move_target != null && live.has(task.move_target)) {
      const assigned = await this.storage.assignTableTask(token, {
        changefeed_id: task.changefeed_id,
        table_id: task.table_id,
        capture_id: task.move_target
      });
      return [assigned];
    }
    await this.storage.deleteTableTask(token, task.changefeed_id, task.table_id);
    return [];
  }

  private async applyMove(token: OwnerToken, changefeed_id: string, move: TableMove) {
    if (move.from == null) {
      await this.storage.assignTableTask(token, { changefeed_id, table_id: move.table_id, capture_id: move.to });
    } else {
      await this.storage.releaseTableTask(token, changefeed_id, move.table_id, move.to);
    }
  }
}

function placementOf(task: TableTask): TablePlacement {
  if (task.phase == TablePhase.ASSIGNED) {
    return { table_id: task.table_id, capture_id: task.capture_id, in_flight: false };
  }
  // Released without a target: still counted on its holder until it is drained.
  return { table_id: task.table_id, capture_id: task.move_target ?? task.capture_id, in_flight: true };
}
