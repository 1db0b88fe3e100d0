import {
  deviceId,
  type DeviceId,
  type DeviceKind,
  type DeviceListing,
  type DeviceSnapshot,
  type Diagnostic,
} from "./types";

export const DEFAULT_REMOVAL_THRESHOLD = 3;

export interface TrackedDevice {
  id: DeviceId;
  kind: DeviceKind;
  gid: number;
  name: string;
  /**
   * Last successful snapshot. Failures never replace it.
   */
  snapshot?: DeviceSnapshot;
  lastFailure?: Diagnostic;
  /**
   * Consecutive successful listings this device was missing from.
   */
  absentCycles: number;
  notFoundCount: number;
}

export interface ReconcileResult {
  added: DeviceId[];
  evicted: DeviceId[];
}

/**
 * Per-device state owned by the coordinator.
 *
 * Devices are created from the vendor listing, updated by each poll and
 * evicted after `removalThreshold` consecutive absences or not-found
 * responses, so one flaky listing does not drop a device.
 */
export class DeviceTable {
  private rows = new Map<DeviceId, TrackedDevice>();

  constructor(private removalThreshold: number = DEFAULT_REMOVAL_THRESHOLD) {}

  devices(): TrackedDevice[] {
    return [...this.rows.values()];
  }

  get(id: DeviceId): TrackedDevice | undefined {
    return this.rows.get(id);
  }

  snapshot(id: DeviceId): DeviceSnapshot | undefined {
    return this.rows.get(id)?.snapshot;
  }

  /**
   * Applies a successful listing of one device kind.
   */
  reconcile(kind: DeviceKind, listing: DeviceListing[]): ReconcileResult {
    const added: DeviceId[] = [];
    const evicted: DeviceId[] = [];
    const listed = new Set<DeviceId>();

    for (const entry of listing) {
      const id = deviceId(kind, entry.gid);
      listed.add(id);

      const existing = this.rows.get(id);
      if (existing) {
        existing.name = entry.name;
        existing.absentCycles = 0;
        continue;
      }

      this.rows.set(id, {
        id,
        kind,
        gid: entry.gid,
        name: entry.name,
        absentCycles: 0,
        notFoundCount: 0,
      });
      added.push(id);
    }

    for (const row of this.rows.values()) {
      if (row.kind !== kind || listed.has(row.id)) {
        continue;
      }

      row.absentCycles += 1;
      if (row.absentCycles >= this.removalThreshold) {
        evicted.push(row.id);
      }
    }

    evicted.forEach((id) => this.rows.delete(id));

    return { added, evicted };
  }

  recordSuccess(id: DeviceId, snapshot: DeviceSnapshot): void {
    const row = this.rows.get(id);
    if (!row) {
      return;
    }

    row.snapshot = snapshot;
    row.lastFailure = undefined;
    row.notFoundCount = 0;
  }

  recordFailure(id: DeviceId, diagnostic: Diagnostic): void {
    const row = this.rows.get(id);
    if (row) {
      row.lastFailure = diagnostic;
    }
  }

  /**
   * @returns the consecutive count, and whether the device was evicted
   */
  recordNotFound(
    id: DeviceId,
    diagnostic: Diagnostic
  ): { count: number; evicted: boolean } {
    const row = this.rows.get(id);
    if (!row) {
      return { count: 0, evicted: false };
    }

    row.notFoundCount += 1;
    row.lastFailure = { ...diagnostic, consecutive: row.notFoundCount };

    if (row.notFoundCount >= this.removalThreshold) {
      this.rows.delete(id);
      return { count: row.notFoundCount, evicted: true };
    }

    return { count: row.notFoundCount, evicted: false };
  }
}
