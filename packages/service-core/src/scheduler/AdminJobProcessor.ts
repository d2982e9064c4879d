import {
  ChangefeedNotFoundError,
  ChangefeedUpdateRefusedError,
  errors,
  Logger,
  OwnerLeaseLostError,
  ServiceAssertionError,
  StorageUnavailableError
} from '@changeplane/lib-services-framework';
import _ from 'lodash';
import { isLifecycleJob, LifecycleJobType, nextState } from '../changefeed/changefeed-state.js';
import { ChangefeedUpdate, ControlPlaneStorage } from '../storage/ControlPlaneStorage.js';
import {
  AdminJob,
  AdminJobState,
  AdminJobType,
  ChangefeedInfo,
  ChangefeedState,
  TablePhase,
  toRunningError
} from '../storage/model.js';
import { SchedulingRound, TableScheduler } from './TableScheduler.js';

/**
 * Errors that leave a job in `applying` so that it is re-applied, instead of failing it.
 */
const isRetryable = (error: unknown) => {
  return (
    errors.matchesErrorCode(error, OwnerLeaseLostError.CODE) ||
    errors.matchesErrorCode(error, StorageUnavailableError.CODE) ||
    !errors.isServiceError(error)
  );
};

/**
 * Applies the durable admin job queue: FIFO per changefeed, changefeeds concurrently.
 */
export class AdminJobProcessor {
  constructor(
    private storage: ControlPlaneStorage,
    private scheduler: TableScheduler,
    private logger: Logger
  ) {}

  async processJobs(round: SchedulingRound) {
    const pending = await this.storage.listAdminJobs({ states: [AdminJobState.QUEUED, AdminJobState.APPLYING] });
    const queues = _.groupBy(pending, (job) => job.changefeed_id);

    const results = await Promise.allSettled(
      Object.values(queues).map(async (queue) => {
        for (const job of queue) {
          if (await this.awaitsHandOff(job)) {
            // Later jobs of this changefeed stay queued behind it.
            break;
          }
          await this.processJob(round, job);
        }
      })
    );
    const failure = results.find((result): result is PromiseRejectedResult => result.status == 'rejected');
    if (failure) {
      throw failure.reason;
    }
  }

  /**
   * A table move waits until a hand-off of the same table, such as one started by a rebalance, has completed.
   */
  private async awaitsHandOff(job: AdminJob) {
    if (job.type != AdminJobType.MOVE_TABLE || job.table_id == null) {
      return false;
    }
    const tasks = await this.storage.listTableTasks({ changefeed_id: job.changefeed_id });
    return tasks.some((t) => t.table_id == job.table_id && t.phase == TablePhase.RELEASING);
  }

  private async processJob(round: SchedulingRound, job: AdminJob) {
    const { token } = round;
    if (job.state == AdminJobState.QUEUED) {
      await this.storage.updateAdminJob(token, job.id, { state: AdminJobState.APPLYING });
    } else {
      this.logger.info(`Re-applying admin job ${job.seq} (${job.type}) of ${job.changefeed_id}`);
    }

    try {
      await this.apply(round, job);
    } catch (e) {
      if (isRetryable(e)) {
        throw e;
      }
      const error = errors.asServiceError(e);
      this.logger.warn(`Admin job ${job.seq} (${job.type}) of ${job.changefeed_id} failed: ${error.errorData.description}`);
      await this.storage.updateAdminJob(token, job.id, {
        state: AdminJobState.FAILED,
        error: toRunningError(error.code, error.errorData.description)
      });
      return;
    }
    await this.storage.updateAdminJob(token, job.id, { state: AdminJobState.DONE, error: null });
    this.logger.info(`Applied admin job ${job.seq} (${job.type}) of ${job.changefeed_id}`);
  }

  private async apply(round: SchedulingRound, job: AdminJob) {
    const cf = await this.storage.getChangefeed(job.changefeed_id);
    if (cf == null) {
      throw new ChangefeedNotFoundError(job.changefeed_id);
    }

    const type = job.type;
    if (isLifecycleJob(type)) {
      await this.applyLifecycle(round, cf, type);
      return;
    }

    switch (type) {
      case AdminJobType.MOVE_TABLE: {
        if (job.table_id == null || job.capture_id == null) {
          throw new ServiceAssertionError(`move_table job ${job.id} without table or capture`);
        }
        const tasks = await this.storage.listTableTasks({ changefeed_id: cf.id });
        await this.scheduler.moveTable(round, cf, tasks, job.table_id, job.capture_id);
        return;
      }
      case AdminJobType.REBALANCE: {
        if (cf.state != ChangefeedState.NORMAL) {
          return;
        }
        const tasks = await this.storage.listTableTasks({ changefeed_id: cf.id });
        await this.scheduler.scheduleChangefeed(round, cf, tasks, { rebalance: true });
        return;
      }
    }
  }

  private async applyLifecycle(round: SchedulingRound, cf: ChangefeedInfo, type: LifecycleJobType) {
    const transition = nextState(cf.state, type);
    switch (transition.kind) {
      case 'noop':
        return;
      case 'refused':
        throw new ChangefeedUpdateRefusedError(cf.id, transition.reason);
      case 'transition': {
        const update: ChangefeedUpdate = { state: transition.to, error: null };
        if (transition.to == ChangefeedState.REMOVED) {
          update.removed_at = new Date();
        }
        const updated = await this.storage.updateChangefeed(cf.id, update, {
          owner: round.token,
          expected_state: [cf.state]
        });
        if (updated == null) {
          throw new ChangefeedNotFoundError(cf.id);
        }
        this.logger.info(`Changefeed ${cf.id}: ${cf.state} -> ${transition.to}`);
      }
    }
  }
}
