/**
 * Per-call fuel budget for an inline guest.
 *
 * Checked on every host function invocation: a guest that keeps calling
 * into the host is stopped there, by throwing out of the import, which
 * unwinds the guest stack as a trap. Wall-clock limits need a thread the
 * guest cannot block, so a time-limited guest always runs in a worker.
 *
 * Fuel is counted in host-call units.
 */

import { ExtensionError } from '../errors.js';

export interface MeterLimits {
  maxFuel?: number;
}

export class ExecutionMeter {
  private limits: MeterLimits;
  private fuelRemaining = Infinity;
  private extensionId: string | undefined;
  /** Set once a limit has tripped, so the container knows the instance is tainted. */
  exceeded: ExtensionError | null = null;

  constructor(limits: MeterLimits, extensionId?: string) {
    this.limits = limits;
    this.extensionId = extensionId;
  }

  start(): void {
    this.exceeded = null;
    this.fuelRemaining = this.limits.maxFuel ?? Infinity;
  }

  stop(): void {
    this.fuelRemaining = Infinity;
  }

  /** Consume fuel for one host call. Throws on exhaustion. */
  charge(units = 1): void {
    this.fuelRemaining -= units;
    if (this.fuelRemaining < 0) {
      this.exceeded ??= new ExtensionError(
        'RESOURCE_EXHAUSTED',
        `Fuel limit of ${this.limits.maxFuel} host calls exceeded`,
        { extensionId: this.extensionId },
      );
      throw this.exceeded;
    }
  }
}
