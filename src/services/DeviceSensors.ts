import DEBUG from "debug";
import { concat, EMPTY, Observable } from "rxjs";
import { switchMap, tap } from "rxjs/operators";
import {
  UNKNOWN,
  type AttributeValue,
  type DeviceId,
  type DeviceSnapshot,
  type Diagnostic,
  type EntitySink,
  type OrUnknown,
} from "../vehiclevue/types";
import type { IServicesCradle } from "./cradle";
import type Discovery from "./Discovery";
import type { DiscoveryEntity, EntityDescription } from "./Discovery";
import type HassStatus from "./HassStatus";
import type Mqtt from "./Mqtt";

const debug = DEBUG("vehiclevue.device-sensors");

const RETAIN = { qos: 1, retain: true } as const;

const VEHICLE_ENTITIES: EntityDescription[] = [
  {
    key: "battery",
    name: "Battery",
    valueTemplate: "{{ value_json.battery }}",
    deviceClass: "battery",
    stateClass: "measurement",
    unit: "%",
    precision: 0,
  },
  {
    key: "charging_state",
    name: "Charging state",
    valueTemplate: "{{ value_json.charging_state }}",
    icon: "mdi:ev-plug-type2",
  },
];

const CHARGER_ENTITIES: EntityDescription[] = [
  {
    key: "status",
    name: "Charger status",
    valueTemplate: "{{ value_json.status }}",
    icon: "mdi:ev-station",
  },
  {
    key: "power",
    name: "Charging power",
    valueTemplate: "{{ value_json.power_kw }}",
    deviceClass: "power",
    stateClass: "measurement",
    unit: "kW",
    precision: 2,
    icon: "mdi:flash",
  },
];

/**
 * Home Assistant renders a null as "None", which the MQTT sensor treats as
 * unknown.
 */
function orNull<T extends AttributeValue>(value: OrUnknown<T>): T | null {
  return value === UNKNOWN ? null : value;
}

export function statePayload(
  snapshot: DeviceSnapshot
): Record<string, AttributeValue> {
  const updated_at = snapshot.updatedAt.toISOString();

  if (snapshot.kind === "vehicle") {
    return {
      battery: orNull(snapshot.battery),
      charging_state:
        snapshot.chargingState === "unknown" ? null : snapshot.chargingState,
      updated_at,
    };
  }

  return {
    status: orNull(snapshot.status),
    on: orNull(snapshot.on),
    message: orNull(snapshot.message),
    charging_rate: orNull(snapshot.chargingRate),
    power_kw: orNull(snapshot.powerKw),
    power_is_estimated: snapshot.powerIsEstimated,
    updated_at,
  };
}

/**
 * The EntitySink backed by MQTT discovery sensors.
 *
 * A failed poll only touches the attributes (`last_error`) so the last good
 * reading stays visible. Entities go unavailable on fatal diagnostics and
 * when their device is retired.
 */
export default class DeviceSensors implements EntitySink {
  private mqtt: Mqtt;
  private discovery: Discovery;
  private hassStatus: HassStatus;
  private announced = new Map<DeviceId, DiscoveryEntity[]>();
  private attributes = new Map<DeviceId, Record<string, AttributeValue>>();

  constructor(
    dependencies: Pick<IServicesCradle, "mqtt" | "discovery" | "hassStatus">
  ) {
    this.mqtt = dependencies.mqtt;
    this.discovery = dependencies.discovery;
    this.hassStatus = dependencies.hassStatus;
  }

  publish$(id: DeviceId, snapshot: DeviceSnapshot): Observable<never> {
    const topics = this.discovery.topics(id);
    const attributes: Record<string, AttributeValue> = {
      ...snapshot.attributes,
      last_error: null,
      last_error_at: null,
    };
    this.attributes.set(id, attributes);

    return concat(
      this.announced.has(id) ? EMPTY : this.announceDevice$(id, snapshot),
      this.mqtt.publish$(topics.availability, "online", RETAIN),
      this.mqtt.publish$(topics.state, statePayload(snapshot), RETAIN),
      this.mqtt.publish$(topics.attributes, attributes, RETAIN)
    );
  }

  publishFailure$(id: DeviceId, diagnostic: Diagnostic): Observable<never> {
    const topics = this.discovery.topics(id);
    const attributes: Record<string, AttributeValue> = {
      ...this.attributes.get(id),
      last_error: `${diagnostic.kind}: ${diagnostic.message}`,
      last_error_at: diagnostic.at.toISOString(),
    };
    this.attributes.set(id, attributes);

    return concat(
      this.mqtt.publish$(topics.attributes, attributes, RETAIN),
      diagnostic.fatal
        ? this.mqtt.publish$(topics.availability, "offline", RETAIN)
        : EMPTY
    );
  }

  retire$(id: DeviceId): Observable<never> {
    debug("marking %s unavailable", id);
    this.attributes.delete(id);

    return this.mqtt.publish$(
      this.discovery.topics(id).availability,
      "offline",
      RETAIN
    );
  }

  /**
   * Announces every known entity again whenever Home Assistant comes online.
   */
  announce$(): Observable<never> {
    return this.hassStatus.online$.pipe(
      switchMap(() => {
        debug("announcing %d device(s)", this.announced.size);
        return concat(
          ...[...this.announced.values()]
            .flat()
            .map((entity) => this.mqtt.publish$(entity.topic, entity.payload))
        );
      })
    );
  }

  private announceDevice$(
    id: DeviceId,
    snapshot: DeviceSnapshot
  ): Observable<never> {
    const device = {
      id,
      name: snapshot.name,
      model: snapshot.kind === "vehicle" ? "Vehicle" : "EV Charger",
    };
    const entities = (
      snapshot.kind === "vehicle" ? VEHICLE_ENTITIES : CHARGER_ENTITIES
    ).map((entity) => this.discovery.sensor(device, entity));

    debug("announcing %s with %d entities", id, entities.length);

    return concat(
      ...entities.map((entity) => this.mqtt.publish$(entity.topic, entity.payload))
    ).pipe(
      tap({
        complete: () => {
          this.announced.set(id, entities);
        },
      })
    );
  }
}
