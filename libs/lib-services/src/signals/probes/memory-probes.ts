import { ProbeModule, ProbeState } from './probes.js';

export type ProbeParams = {
  poll_timeout_ms: number;
};

export const DEFAULT_PROBE_POLL_TIMEOUT_MS = 10_000;

/**
 * Probe state kept in process memory. Exposed over HTTP by the probe routes.
 */
export const createInMemoryProbe = (params?: ProbeParams): ProbeModule => {
  const poll_timeout_ms = params?.poll_timeout_ms ?? DEFAULT_PROBE_POLL_TIMEOUT_MS;
  const state: ProbeState = {
    ready: false,
    started: false,
    touched_at: new Date()
  };

  return {
    poll_timeout_ms,

    state: () => ({ ...state }),
    isAlive: (now = new Date()) => now.getTime() - state.touched_at.getTime() < poll_timeout_ms,
    ready: async () => {
      state.ready = true;
      state.started = true;
      state.touched_at = new Date();
    },
    unready: async () => {
      state.ready = false;
    },
    touch: async () => {
      state.touched_at = new Date();
    }
  };
};
