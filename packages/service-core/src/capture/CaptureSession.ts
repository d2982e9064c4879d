import * as uuid from 'uuid';
import { ControlPlaneStorage } from '../storage/ControlPlaneStorage.js';
import { CaptureInfo } from '../storage/model.js';

export type CaptureSessionOptions = {
  storage: ControlPlaneStorage;
  address: string;
  version: string;
  capture_ttl_ms: number;
};

/**
 * The registration of one capture incarnation. A new incarnation gets a new id.
 */
export class CaptureSession {
  readonly id = uuid.v4();
  readonly started_at = new Date();

  constructor(private options: CaptureSessionOptions) {}

  get info(): CaptureInfo {
    return {
      id: this.id,
      address: this.options.address,
      version: this.options.version,
      started_at: this.started_at,
      expires_at: this.nextDeadline()
    };
  }

  async register() {
    await this.options.storage.registerCapture(this.info);
  }

  /**
   * @returns false once the registration is gone, for example after the owner expired it.
   */
  async heartbeat(): Promise<boolean> {
    return this.options.storage.heartbeatCapture(this.id, this.nextDeadline());
  }

  async deregister() {
    await this.options.storage.deregisterCapture(this.id);
  }

  private nextDeadline() {
    return new Date(Date.now() + this.options.capture_ttl_ms);
  }
}
