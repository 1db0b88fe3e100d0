import { differenceInMilliseconds } from "date-fns";
import { z } from "zod";
import { estimatePower, type Phase } from "./estimatePower";
import {
  deviceId,
  UNKNOWN,
  type AttributeValue,
  type ChargerRaw,
  type ChargerSnapshot,
  type ChargingState,
  type DeviceId,
  type MappingAnomaly,
  type OrUnknown,
  type UsageSample,
  type VehicleRaw,
  type VehicleSnapshot,
} from "./types";

const percentage = z.number().finite().min(0).max(100);
const amps = z.number().finite().nonnegative();
const count = z.number().finite();
const text = z.string();
const flag = z.boolean();
const code = z.union([z.string(), z.number()]);

export type MappingResult<S> = {
  snapshot: S;
  anomalies: MappingAnomaly[];
};

export interface ChargerMappingOptions {
  assumedVoltage: number;
  phase: Phase;
  /**
   * How far apart (ms) a usage sample and the charger reading may be and
   * still describe the same moment.
   */
  usageTolerance: number;
}

/**
 * Reads one optional field. Missing values are unknown; values of the wrong
 * shape are unknown and reported as an anomaly.
 */
function fieldReader(id: DeviceId, anomalies: MappingAnomaly[]) {
  return function read<T extends AttributeValue>(
    field: string,
    value: unknown,
    schema: z.ZodType<T>
  ): OrUnknown<T> {
    if (value === undefined || value === null) {
      return UNKNOWN;
    }

    const parsed = schema.safeParse(value);
    if (parsed.success) {
      return parsed.data;
    }

    anomalies.push({
      deviceId: id,
      field,
      value,
      reason: parsed.error.issues[0]?.message ?? "invalid value",
    });

    return UNKNOWN;
  };
}

const CHARGING = new Set(["charging"]);
const NOT_CHARGING = new Set([
  "notcharging",
  "disconnected",
  "complete",
  "stopped",
  "idle",
  "connected",
]);

/**
 * The vendor's explicit charging flag wins. Only when it is missing or
 * unrecognised do we infer from the reported charge power.
 */
export function deriveChargingState(
  chargingState: unknown,
  chargePowerKw: unknown
): ChargingState {
  if (typeof chargingState === "boolean") {
    return chargingState ? "charging" : "not_charging";
  }

  if (typeof chargingState === "string") {
    const normalized = chargingState.toLowerCase().replace(/[\s_-]/g, "");
    if (CHARGING.has(normalized)) {
      return "charging";
    }
    if (NOT_CHARGING.has(normalized)) {
      return "not_charging";
    }
  }

  if (typeof chargePowerKw === "number" && Number.isFinite(chargePowerKw)) {
    return chargePowerKw > 0 ? "charging" : "not_charging";
  }

  return "unknown";
}

export function mapVehicle(
  raw: VehicleRaw,
  name: string
): MappingResult<VehicleSnapshot> {
  const id = deviceId("vehicle", raw.vehicleGid);
  const anomalies: MappingAnomaly[] = [];
  const read = fieldReader(id, anomalies);

  const battery = read("batteryLevel", raw.batteryLevel, percentage);
  const chargingState = deriveChargingState(
    raw.chargingState,
    raw.chargePowerKw
  );

  return {
    snapshot: {
      kind: "vehicle",
      id,
      gid: raw.vehicleGid,
      name,
      battery,
      chargingState,
      updatedAt: raw.fetchedAt,
      attributes: {
        vehicle_state: read("vehicleState", raw.vehicleState, text),
        battery_range: read("batteryRange", raw.batteryRange, count),
        charge_limit_percent: read(
          "chargeLimitPercent",
          raw.chargeLimitPercent,
          percentage
        ),
        minutes_to_full_charge: read(
          "minutesToFullCharge",
          raw.minutesToFullCharge,
          count
        ),
        charging_state_raw: read(
          "chargingState",
          raw.chargingState,
          z.union([text, flag])
        ),
      },
    },
    anomalies,
  };
}

/**
 * Picks the usage sample when it describes the same moment as the charger
 * reading.
 */
export function matchingSample(
  sample: UsageSample | null,
  readingAt: Date,
  tolerance: number
): UsageSample | null {
  if (sample === null) {
    return null;
  }

  const apart = Math.abs(differenceInMilliseconds(sample.sampledAt, readingAt));

  return apart <= tolerance ? sample : null;
}

export function mapCharger(
  raw: ChargerRaw,
  name: string,
  sample: UsageSample | null,
  options: ChargerMappingOptions
): MappingResult<ChargerSnapshot> {
  const id = deviceId("charger", raw.deviceGid);
  const anomalies: MappingAnomaly[] = [];
  const read = fieldReader(id, anomalies);

  const on = read("chargerOn", raw.chargerOn, flag);
  const vendorStatus = read("status", raw.status, text);
  const message = read("message", raw.message, text);
  const chargingRate = read("chargingRate", raw.chargingRate, amps);
  const maxChargingRate = read("maxChargingRate", raw.maxChargingRate, amps);

  let status: OrUnknown<string> = vendorStatus;
  if (vendorStatus === UNKNOWN || vendorStatus === "") {
    status = on === UNKNOWN ? UNKNOWN : on ? "on" : "off";
  }

  const live = matchingSample(sample, raw.fetchedAt, options.usageTolerance);

  let powerKw: OrUnknown<number> = UNKNOWN;
  if (live) {
    powerKw = live.kw;
  } else if (chargingRate !== UNKNOWN) {
    powerKw = estimatePower(chargingRate, options.assumedVoltage, options.phase);
  }

  return {
    snapshot: {
      kind: "charger",
      id,
      gid: raw.deviceGid,
      name,
      on,
      status,
      message,
      chargingRate,
      maxChargingRate,
      powerKw,
      powerIsEstimated: live === null,
      updatedAt: raw.fetchedAt,
      attributes: {
        charger_on: on,
        message,
        icon_label: read("iconLabel", raw.iconLabel, text),
        icon_detail_text: read("iconDetailText", raw.iconDetailText, text),
        fault_text: read("faultText", raw.faultText, text),
        charging_rate: chargingRate,
        max_charging_rate: maxChargingRate,
        load_gid: read("loadGid", raw.loadGid, count),
        pro_control_code: read("proControlCode", raw.proControlCode, code),
        debug_code: read("debugCode", raw.debugCode, code),
        live_power_kw: live ? live.kw : UNKNOWN,
        assumed_voltage: options.assumedVoltage,
        power_is_estimated: live === null,
      },
    },
    anomalies,
  };
}
