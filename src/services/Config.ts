import { existsSync } from "fs";
import { from, Observable } from "rxjs";

import convict from "convict";

import yaml from "js-yaml";

import { url } from "convict-format-with-validator";
import ms from "ms";
import { shareReplay } from "rxjs/operators";
import DEBUG from "debug";
import type { Phase } from "../vehiclevue/estimatePower";

const debug = DEBUG("vehiclevue.config");

convict.addParser({ extension: ["yml", "yaml"], parse: yaml.load });
convict.addFormat(url);
convict.addFormat({
  name: "duration",
  validate(value: unknown) {
    if (typeof value !== "string" || !(ms(value) > 0)) {
      throw new Error(`must be a duration like "30s" or "30m", got ${value}`);
    }
  },
});
convict.addFormat({
  name: "positive-int",
  validate(value: unknown) {
    if (!Number.isInteger(value) || Number(value) < 1) {
      throw new Error("must be a positive integer");
    }
  },
  coerce: (value: string) => parseInt(value, 10),
});

const CONVICT_SCHEMA = {
  emporia: {
    email: {
      default: "",
      doc: "Login of your Emporia account.",
      env: "EMPORIA_EMAIL",
      format: String,
    },
    password: {
      default: "",
      doc: "Password of your Emporia account.",
      env: "EMPORIA_PASSWORD",
      format: String,
      sensitive: true,
    },
    apiUrl: {
      default: "https://api.emporiaenergy.com",
      doc: "Base URL of the Emporia cloud API.",
      env: "EMPORIA_API_URL",
      format: "url",
    },
    userPoolId: {
      default: "us-east-2_ghlOXVLi1",
      doc: "Cognito user pool Emporia accounts live in.",
      env: "EMPORIA_USER_POOL_ID",
      format: String,
    },
    clientId: {
      default: "4qte47jbstod8apnfic0bunmrq",
      doc: "Cognito app client id of the Emporia app.",
      env: "EMPORIA_CLIENT_ID",
      format: String,
    },
  },
  mqttUrl: {
    default: "mqtt://mqtt.local",
    doc: "The URL to use for MQTT",
    env: "VEHICLEVUE_MQTT_URL",
    format: String,
  },
  mqttDiscoveryPrefix: {
    default: "homeassistant",
    doc: "The prefix Home Assistant listens on for MQTT discovery.",
    env: "VEHICLEVUE_MQTT_DISCOVERY_PREFIX",
    format: String,
  },
  idPrefix: {
    default: "vehiclevue",
    doc: "A prefix to put on the IDs. Maybe you want to have a secondary instance during development with different IDs so there is no overlap.",
    env: "VEHICLEVUE_ID_PREFIX",
    format: String,
  },
  polling: {
    interval: {
      default: "30m",
      doc: "Time between poll cycles. Polling more often runs into Emporia's rate limits.",
      env: "VEHICLEVUE_POLL_INTERVAL",
      format: "duration",
    },
    maxInterval: {
      default: "4h",
      doc: "Longest wait between cycles while backing off from rate limits.",
      env: "VEHICLEVUE_MAX_POLL_INTERVAL",
      format: "duration",
    },
    fetchTimeout: {
      default: "30s",
      doc: "How long one device may take to fetch before it counts as a transient failure.",
      env: "VEHICLEVUE_FETCH_TIMEOUT",
      format: "duration",
    },
    concurrency: {
      default: 2,
      doc: "Devices fetched in parallel within a cycle.",
      env: "VEHICLEVUE_CONCURRENCY",
      format: "positive-int",
    },
    removalThreshold: {
      default: 3,
      doc: "Consecutive cycles a device may be missing or not found before it is dropped.",
      env: "VEHICLEVUE_REMOVAL_THRESHOLD",
      format: "positive-int",
    },
    usageTolerance: {
      default: "5s",
      doc: "How far a live usage sample may be from the charger reading and still be used.",
      env: "VEHICLEVUE_USAGE_TOLERANCE",
      format: "duration",
    },
    assumedVoltage: {
      default: 240,
      doc: "Voltage used to estimate charging power from amps when no live sample exists.",
      env: "VEHICLEVUE_ASSUMED_VOLTAGE",
      format: Number,
    },
    phase: {
      default: "split",
      doc: "split: the charger sees the full voltage. single_leg: it sees half.",
      env: "VEHICLEVUE_PHASE",
      format: ["split", "single_leg"],
    },
  },
};

export interface IEmporiaConfig {
  email: string;
  password: string;
  apiUrl: string;
  userPoolId: string;
  clientId: string;
}

export interface IPollingConfig {
  interval: number;
  maxInterval: number;
  fetchTimeout: number;
  concurrency: number;
  removalThreshold: number;
  usageTolerance: number;
  assumedVoltage: number;
  phase: Phase;
}

export interface IRootConfig {
  emporia: IEmporiaConfig;
  idPrefix?: string;
  mqttDiscoveryPrefix: string;
  mqttUrl: string;
  objectId: string;
  polling: IPollingConfig;
}

/**
 * Reads the config file (when there is one) and the environment.
 */
export function loadRootConfig(
  path: string = process.env.CONFIG_PATH || "./config.yaml"
): IRootConfig {
  const config = convict(CONVICT_SCHEMA);
  if (existsSync(path)) {
    config.loadFile(path);
  } else {
    debug("no config file at %s, using defaults and environment", path);
  }

  config.validate();

  const phase = config.get("polling.phase");

  const root: IRootConfig = {
    emporia: {
      email: config.get("emporia.email"),
      password: config.get("emporia.password"),
      apiUrl: config.get("emporia.apiUrl"),
      userPoolId: config.get("emporia.userPoolId"),
      clientId: config.get("emporia.clientId"),
    },
    idPrefix: config.get("idPrefix"),
    mqttDiscoveryPrefix: config.get("mqttDiscoveryPrefix"),
    mqttUrl: config.get("mqttUrl"),
    objectId: "vehiclevue",
    polling: {
      interval: ms(config.get("polling.interval")),
      maxInterval: ms(config.get("polling.maxInterval")),
      fetchTimeout: ms(config.get("polling.fetchTimeout")),
      concurrency: config.get("polling.concurrency"),
      removalThreshold: config.get("polling.removalThreshold"),
      usageTolerance: ms(config.get("polling.usageTolerance")),
      assumedVoltage: config.get("polling.assumedVoltage"),
      phase: phase === "single_leg" ? "single_leg" : "split",
    },
  };
  debug("root: %s", config.toString());

  return root;
}

export default class Config {
  private loaded?: IRootConfig;

  root(): IRootConfig {
    if (!this.loaded) {
      this.loaded = loadRootConfig();
    }

    return this.loaded;
  }

  root$(): Observable<IRootConfig> {
    return from([this.root()]).pipe(shareReplay(1));
  }
}
