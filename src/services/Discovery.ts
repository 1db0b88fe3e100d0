import DEBUG from "debug";
import type Config from "./Config";
import type { IServicesCradle } from "./cradle";

const debug = DEBUG("vehiclevue.discovery");

export type DiscoveryDevice = {
  name: string;
  model: string;
  manufacturer: string;
  identifiers: string[];
};

/**
 * https://www.home-assistant.io/integrations/sensor.mqtt/
 */
export type SensorDiscoveryPayload = {
  unique_id: string;
  object_id: string;
  name: string;
  state_topic: string;
  value_template: string;
  json_attributes_topic: string;
  availability_topic: string;
  device: DiscoveryDevice;
  device_class?: string;
  state_class?: string;
  unit_of_measurement?: string;
  suggested_display_precision?: number;
  icon?: string;
};

export type DeviceTopics = {
  root: string;
  state: string;
  attributes: string;
  availability: string;
};

export type EntityDescription = {
  /**
   * Unique within the device, e.g. "battery" or "power".
   */
  key: string;
  name: string;
  valueTemplate: string;
  deviceClass?: string;
  stateClass?: string;
  unit?: string;
  precision?: number;
  icon?: string;
};

export type DeviceDescription = {
  /**
   * Stable id of the device, e.g. "charger-123".
   */
  id: string;
  name: string;
  model: string;
};

export type DiscoveryEntity = {
  topic: string;
  payload: SensorDiscoveryPayload;
};

/**
 * Builds MQTT discovery topics and payloads. Every device gets one state
 * topic, one attributes topic and one availability topic which all of its
 * entities share.
 */
export default class Discovery {
  private config: Config;

  constructor(dependencies: Pick<IServicesCradle, "config">) {
    this.config = dependencies.config;
  }

  topics(deviceId: string): DeviceTopics {
    const root = `${this.config.root().objectId}/${deviceId}`;

    return {
      root,
      state: `${root}/state`,
      attributes: `${root}/attributes`,
      availability: `${root}/availability`,
    };
  }

  sensor(device: DeviceDescription, entity: EntityDescription): DiscoveryEntity {
    const config = this.config.root();
    const uniqueId = [config.idPrefix, device.id, entity.key]
      .filter((v) => v)
      .join("-");
    const objectId = `${config.objectId}_${device.id}_${entity.key}`.replace(
      /-/g,
      "_"
    );
    const topics = this.topics(device.id);

    debug(`Creating discovery for sensor/${uniqueId} with object_id: ${objectId}`);

    return {
      topic: `${config.mqttDiscoveryPrefix}/sensor/${uniqueId}/config`,
      payload: {
        unique_id: uniqueId,
        object_id: objectId,
        name: entity.name,
        state_topic: topics.state,
        value_template: entity.valueTemplate,
        json_attributes_topic: topics.attributes,
        availability_topic: topics.availability,
        device: {
          name: device.name,
          model: device.model,
          manufacturer: "Emporia",
          identifiers: [`${config.objectId}_${device.id}`],
        },
        ...(entity.deviceClass ? { device_class: entity.deviceClass } : {}),
        ...(entity.stateClass ? { state_class: entity.stateClass } : {}),
        ...(entity.unit ? { unit_of_measurement: entity.unit } : {}),
        ...(entity.precision !== undefined
          ? { suggested_display_precision: entity.precision }
          : {}),
        ...(entity.icon ? { icon: entity.icon } : {}),
      },
    };
  }
}
