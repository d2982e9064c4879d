import { Logger, ProcessorFatalError } from '@changeplane/lib-services-framework';
import { OwnerLease } from '../election/LeaseElector.js';
import { ControlPlaneStorage } from '../storage/ControlPlaneStorage.js';
import {
  CaptureInfo,
  ChangefeedInfo,
  ChangefeedState,
  ProcessorStatus,
  TableAckState,
  TablePhase,
  toRunningError
} from '../storage/model.js';
import { AdminJobProcessor } from './AdminJobProcessor.js';
import { SchedulingRound, TableScheduler } from './TableScheduler.js';

export type OwnerOptions = {
  storage: ControlPlaneStorage;
  lease: OwnerLease;
  removed_gc_grace_ms: number;
  logger: Logger;
};

/**
 * The scheduling role of the elected capture.
 *
 * Holds no state that matters for correctness: every tick recomputes from the store,
 * so a successor picks up wherever this owner stopped.
 */
export class Owner {
  readonly scheduler: TableScheduler;
  readonly jobs: AdminJobProcessor;

  private lastMembership: string | null = null;

  constructor(private options: OwnerOptions) {
    this.scheduler = new TableScheduler(options.storage, options.logger);
    this.jobs = new AdminJobProcessor(options.storage, this.scheduler, options.logger);
  }

  get capture_id() {
    return this.options.lease.token.capture_id;
  }

  /**
   * One scheduling round.
   * @throws OwnerLeaseLostError once the lease is gone. The owner must not be used after that.
   */
  async tick() {
    const { storage, lease } = this.options;
    await lease.renew();

    const live = await this.expireCaptures();
    const round: SchedulingRound = { token: lease.token, live: new Set(live.map((c) => c.id)) };

    await this.jobs.processJobs(round);

    const membership = [...round.live].sort().join(',');
    const membershipChanged = membership != this.lastMembership;
    this.lastMembership = membership;

    for (const listed of await storage.listChangefeeds()) {
      const cf = await this.foldProcessorReports(round, listed);
      await this.schedule(round, cf, membershipChanged);
    }
  }

  private async expireCaptures(): Promise<CaptureInfo[]> {
    const { storage, logger } = this.options;
    const now = Date.now();
    const live: CaptureInfo[] = [];
    for (const capture of await storage.listCaptures()) {
      if (capture.expires_at.getTime() > now) {
        live.push(capture);
        continue;
      }
      logger.warn(`Capture ${capture.id} (${capture.address}) missed its heartbeat deadline, removing it`);
      await storage.deregisterCapture(capture.id);
      for (const processor of await storage.listProcessors({ capture_id: capture.id })) {
        await storage.deleteProcessor(processor.changefeed_id, processor.capture_id);
      }
    }
    return live;
  }

  /**
   * Turns a processor fault into the changefeed `error` state, and advances the checkpoint
   * once every table of the changefeed runs.
   */
  private async foldProcessorReports(round: SchedulingRound, cf: ChangefeedInfo): Promise<ChangefeedInfo> {
    const { storage, logger } = this.options;
    if (cf.state != ChangefeedState.NORMAL) {
      return cf;
    }
    const processors = await storage.listProcessors({ changefeed_id: cf.id });

    const failed = processors.find((p) => p.status == ProcessorStatus.ERROR);
    if (failed) {
      const error = failed.error ?? toRunningError(ProcessorFatalError.CODE, `processor on ${failed.capture_id} failed`);
      logger.error(`Changefeed ${cf.id} failed on capture ${failed.capture_id}: ${error.message}`);
      const updated = await storage.updateChangefeed(
        cf.id,
        { state: ChangefeedState.ERROR, error },
        { owner: round.token, expected_state: [ChangefeedState.NORMAL] }
      );
      return updated ?? cf;
    }

    if (cf.table_ids.length == 0) {
      return cf;
    }
    const tasks = await storage.listTableTasks({ changefeed_id: cf.id });
    const allRunning =
      tasks.length == cf.table_ids.length &&
      tasks.every((t) => t.phase == TablePhase.ASSIGNED && t.state == TableAckState.RUNNING);
    const reporting = processors.filter((p) => p.table_ids.length > 0);
    const reported = new Set(reporting.flatMap((p) => p.table_ids));
    if (!allRunning || cf.table_ids.some((id) => !reported.has(id))) {
      return cf;
    }
    const checkpoint_ts = Math.min(...reporting.map((p) => p.checkpoint_ts));
    if (checkpoint_ts <= cf.checkpoint_ts) {
      return cf;
    }
    const updated = await storage.updateChangefeed(
      cf.id,
      { checkpoint_ts },
      { owner: round.token, expected_state: [ChangefeedState.NORMAL] }
    );
    return updated ?? cf;
  }

  private async schedule(round: SchedulingRound, cf: ChangefeedInfo, membershipChanged: boolean) {
    const { storage, logger, removed_gc_grace_ms } = this.options;
    const tasks = await storage.listTableTasks({ changefeed_id: cf.id });

    if (cf.state == ChangefeedState.NORMAL) {
      await this.scheduler.scheduleChangefeed(round, cf, tasks, { rebalance: membershipChanged });
      return;
    }

    const remaining = await this.scheduler.revokeChangefeed(round, cf, tasks);
    if (remaining > 0) {
      return;
    }

    // Nothing runs any more. Reports of failed processors are kept in the changefeed error.
    let processors = await storage.listProcessors({ changefeed_id: cf.id });
    for (const processor of processors.filter((p) => p.status == ProcessorStatus.ERROR)) {
      await storage.deleteProcessor(processor.changefeed_id, processor.capture_id);
    }
    processors = processors.filter((p) => p.status != ProcessorStatus.ERROR);

    if (
      cf.state == ChangefeedState.REMOVED &&
      processors.length == 0 &&
      (cf.removed_at?.getTime() ?? 0) + removed_gc_grace_ms <= Date.now()
    ) {
      await storage.deleteChangefeed(round.token, cf.id);
      logger.info(`Purged removed changefeed ${cf.id}`);
    }
  }
}
