export type ProbeState = {
  ready: boolean;
  started: boolean;
  touched_at: Date;
};

/**
 * Process health as served by the probe routes. Capture heartbeats touch the probe;
 * a probe left untouched for `poll_timeout_ms` fails liveness.
 */
export type ProbeModule = {
  poll_timeout_ms: number;

  state(): ProbeState;
  isAlive(now?: Date): boolean;

  ready(): Promise<void>;
  unready(): Promise<void>;
  touch(): Promise<void>;
};
