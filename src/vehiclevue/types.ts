import type { Observable } from "rxjs";

/**
 * Sentinel for a value the vendor did not give us, or gave us in a shape we
 * could not use. Zero is a real reading and never stands in for this.
 */
export const UNKNOWN = "unknown" as const;
export type Unknown = typeof UNKNOWN;

export type OrUnknown<T> = T | Unknown;

export type DeviceKind = "vehicle" | "charger";

/**
 * Stable id used for the device table and the published entities.
 * Formatted as `<kind>-<gid>`.
 */
export type DeviceId = string;

export const deviceId = (kind: DeviceKind, gid: number): DeviceId =>
  `${kind}-${gid}`;

export type ChargingState = "charging" | "not_charging" | "unknown";

export type AttributeValue = string | number | boolean | null;

interface SnapshotBase {
  id: DeviceId;
  gid: number;
  name: string;
  updatedAt: Date;
  attributes: Record<string, AttributeValue>;
}

export interface VehicleSnapshot extends SnapshotBase {
  kind: "vehicle";
  /**
   * Percentage in [0, 100].
   */
  battery: OrUnknown<number>;
  chargingState: ChargingState;
}

export interface ChargerSnapshot extends SnapshotBase {
  kind: "charger";
  on: OrUnknown<boolean>;
  status: OrUnknown<string>;
  message: OrUnknown<string>;
  /**
   * Amps the charger reports it is delivering.
   */
  chargingRate: OrUnknown<number>;
  maxChargingRate: OrUnknown<number>;
  powerKw: OrUnknown<number>;
  /**
   * True when no usage sample matched this poll and `powerKw` was derived
   * from `chargingRate`.
   */
  powerIsEstimated: boolean;
}

export type DeviceSnapshot = VehicleSnapshot | ChargerSnapshot;

/**
 * Entry from the vendor's device listing.
 */
export interface DeviceListing {
  kind: DeviceKind;
  gid: number;
  name: string;
}

/**
 * Vehicle status as returned by the vendor. Only the gid has been checked,
 * every other field is validated by the mapper.
 */
export interface VehicleRaw {
  kind: "vehicle";
  vehicleGid: number;
  batteryLevel?: unknown;
  batteryRange?: unknown;
  chargingState?: unknown;
  chargePowerKw?: unknown;
  vehicleState?: unknown;
  chargeLimitPercent?: unknown;
  minutesToFullCharge?: unknown;
  fetchedAt: Date;
}

export interface ChargerRaw {
  kind: "charger";
  deviceGid: number;
  chargerOn?: unknown;
  status?: unknown;
  message?: unknown;
  chargingRate?: unknown;
  maxChargingRate?: unknown;
  iconLabel?: unknown;
  iconDetailText?: unknown;
  faultText?: unknown;
  loadGid?: unknown;
  proControlCode?: unknown;
  debugCode?: unknown;
  fetchedAt: Date;
}

/**
 * A live power reading from the usage endpoint.
 */
export interface UsageSample {
  kw: number;
  sampledAt: Date;
}

export interface Credentials {
  email: string;
  password: string;
}

export interface Session {
  idToken: string;
  expiresAt: Date;
}

export type FailureKind = "auth" | "rate_limited" | "transient" | "not_found";

export interface Diagnostic {
  kind: FailureKind;
  message: string;
  at: Date;
  /**
   * False when the fetch was never issued because the cycle was already
   * rate limited.
   */
  attempted: boolean;
  /**
   * Polling has stopped and the user has to act.
   */
  fatal: boolean;
  /**
   * Consecutive not-found responses, for `not_found` diagnostics.
   */
  consecutive?: number;
}

/**
 * A field the mapper could not use. The field is reported as unknown and the
 * rest of the snapshot is still published.
 */
export interface MappingAnomaly {
  deviceId: DeviceId;
  field: string;
  value: unknown;
  reason: string;
}

export type PollResult =
  | {
      ok: true;
      deviceId: DeviceId;
      snapshot: DeviceSnapshot;
      anomalies: MappingAnomaly[];
    }
  | {
      ok: false;
      deviceId: DeviceId;
      failure: Diagnostic;
    };

export type CycleOutcome = "ok" | "partial" | "rate_limited" | "halted";

export interface CycleReport {
  startedAt: Date;
  outcome: CycleOutcome;
  results: PollResult[];
  added: DeviceId[];
  evicted: DeviceId[];
  /**
   * Milliseconds until the next cycle. Meaningless once halted.
   */
  nextInterval: number;
  /**
   * Why polling stopped, set on halted reports.
   */
  reason?: string;
}

/**
 * What the coordinator needs from the vendor. Every call errors with a
 * `VendorError`.
 */
export interface VendorClient {
  authenticate$(credentials: Credentials): Observable<Session>;
  listVehicles$(session: Session): Observable<DeviceListing[]>;
  listChargers$(session: Session): Observable<DeviceListing[]>;
  fetchVehicleStatus$(session: Session, gid: number): Observable<VehicleRaw>;
  fetchChargerStatus$(session: Session, gid: number): Observable<ChargerRaw>;
  /**
   * Emits `null` when the vendor has no sample for that instant.
   */
  fetchUsageSample$(
    session: Session,
    gid: number,
    at: Date
  ): Observable<UsageSample | null>;
}

/**
 * Where snapshots end up. A failure never clears the last published value.
 */
export interface EntitySink {
  publish$(id: DeviceId, snapshot: DeviceSnapshot): Observable<unknown>;
  publishFailure$(id: DeviceId, diagnostic: Diagnostic): Observable<unknown>;
  /**
   * The device is gone upstream.
   */
  retire$(id: DeviceId): Observable<unknown>;
}
