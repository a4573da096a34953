export const GLOBAL_INTERVAL_MS = 100;
export const DEVICE_INTERVAL_MS = 300;

export type Clock = () => number;

/**
 * Minimum spacing between sends, globally and per device. Timestamps come
 * from a monotonic clock and are only ever overwritten.
 */
export class Throttle {
  private readonly clock: Clock;
  private readonly globalInterval: number;
  private readonly deviceInterval: number;
  private lastGlobal = Number.NEGATIVE_INFINITY;
  private readonly lastDevice = new Map<string, number>();

  constructor(
    clock: Clock = () => performance.now(),
    globalInterval = GLOBAL_INTERVAL_MS,
    deviceInterval = DEVICE_INTERVAL_MS
  ) {
    this.clock = clock;
    this.globalInterval = globalInterval;
    this.deviceInterval = deviceInterval;
  }

  /**
   * Claims the global window. False while another send is within it.
   */
  acquireGlobal = (now = this.clock()): boolean => {
    if (now - this.lastGlobal < this.globalInterval) {
      return false;
    }
    this.lastGlobal = now;
    return true;
  };

  /**
   * Claims the window of one device. False while its previous send is
   * within it.
   */
  acquireDevice = (deviceId: string, now = this.clock()): boolean => {
    const last = this.lastDevice.get(deviceId) ?? Number.NEGATIVE_INFINITY;
    if (now - last < this.deviceInterval) {
      return false;
    }
    this.lastDevice.set(deviceId, now);
    return true;
  };

  /**
   * Single-device send: both windows must be open; neither is claimed
   * otherwise.
   */
  acquire = (deviceId: string): boolean => {
    const now = this.clock();
    const last = this.lastDevice.get(deviceId) ?? Number.NEGATIVE_INFINITY;
    if (
      now - this.lastGlobal < this.globalInterval ||
      now - last < this.deviceInterval
    ) {
      return false;
    }
    this.lastGlobal = now;
    this.lastDevice.set(deviceId, now);
    return true;
  };
}
