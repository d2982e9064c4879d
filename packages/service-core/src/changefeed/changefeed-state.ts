import { AdminJobType, ChangefeedState } from '../storage/model.js';

export type LifecycleJobType = AdminJobType.PAUSE | AdminJobType.RESUME | AdminJobType.REMOVE;

/**
 * Result of applying a lifecycle job to a changefeed state.
 */
export type StateTransition =
  | { kind: 'transition'; to: ChangefeedState }
  | { kind: 'noop' }
  | { kind: 'refused'; reason: string };

const transition = (to: ChangefeedState): StateTransition => ({ kind: 'transition', to });
const noop: StateTransition = { kind: 'noop' };
const refused = (reason: string): StateTransition => ({ kind: 'refused', reason });

const TRANSITIONS: Record<ChangefeedState, Record<LifecycleJobType, StateTransition>> = {
  [ChangefeedState.NORMAL]: {
    [AdminJobType.PAUSE]: transition(ChangefeedState.STOPPED),
    [AdminJobType.RESUME]: noop,
    [AdminJobType.REMOVE]: transition(ChangefeedState.REMOVED)
  },
  [ChangefeedState.STOPPED]: {
    [AdminJobType.PAUSE]: noop,
    [AdminJobType.RESUME]: transition(ChangefeedState.NORMAL),
    [AdminJobType.REMOVE]: transition(ChangefeedState.REMOVED)
  },
  [ChangefeedState.ERROR]: {
    [AdminJobType.PAUSE]: transition(ChangefeedState.STOPPED),
    [AdminJobType.RESUME]: transition(ChangefeedState.NORMAL),
    [AdminJobType.REMOVE]: transition(ChangefeedState.REMOVED)
  },
  [ChangefeedState.REMOVED]: {
    [AdminJobType.PAUSE]: refused('changefeed has been removed'),
    [AdminJobType.RESUME]: refused('changefeed has been removed'),
    [AdminJobType.REMOVE]: noop
  }
};

export const nextState = (state: ChangefeedState, job: LifecycleJobType): StateTransition => {
  return TRANSITIONS[state][job];
};

export const isLifecycleJob = (type: AdminJobType): type is LifecycleJobType => {
  return type == AdminJobType.PAUSE || type == AdminJobType.RESUME || type == AdminJobType.REMOVE;
};

/**
 * States in which the owner schedules tables of the changefeed.
 */
export const isSchedulable = (state: ChangefeedState) => state == ChangefeedState.NORMAL;

const CHANGEFEED_ID_PATTERN = /^[a-zA-Z0-9]+(-[a-zA-Z0-9]+)*$/;

export const isValidChangefeedId = (id: string) => CHANGEFEED_ID_PATTERN.test(id);

/**
 * Timestamps are milliseconds since the epoch, bounded by the latest time a Date can hold.
 */
export const MAX_TS = 8_640_000_000_000_000;

export const isValidTs = (ts: number) => Number.isSafeInteger(ts) && ts >= 0 && ts <= MAX_TS;

/**
 * ISO time of a timestamp, or undefined when it cannot be represented.
 */
export const formatTs = (ts: number) => (isValidTs(ts) ? new Date(ts).toISOString() : undefined);
