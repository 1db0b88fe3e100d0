import { createContainer, InjectionMode, asClass, asFunction } from "awilix";

import Config from "./Config";
import Mqtt from "./Mqtt";
import HassStatus from "./HassStatus";
import Discovery from "./Discovery";
import DeviceSensors from "./DeviceSensors";
import Emporia from "./Emporia";

export interface IServicesCradle {
  config: Config;
  mqtt: Mqtt;
  hassStatus: HassStatus;
  discovery: Discovery;
  deviceSensors: DeviceSensors;
  emporia: Emporia;
}

// sets up awilix ... .
const container = createContainer<IServicesCradle>({
  injectionMode: InjectionMode.PROXY,
});

// just register the services.
container.register({
  config: asClass(Config, { lifetime: "SINGLETON" }),
  mqtt: asClass(Mqtt, { lifetime: "SINGLETON" }),
  hassStatus: asClass(HassStatus, { lifetime: "SINGLETON" }),
  discovery: asClass(Discovery, { lifetime: "SINGLETON" }),
  deviceSensors: asClass(DeviceSensors, { lifetime: "SINGLETON" }),
  emporia: asFunction(
    ({ config }: Pick<IServicesCradle, "config">) =>
      new Emporia(config.root().emporia),
    { lifetime: "SINGLETON" }
  ),
});

export default container.cradle;
