import DEBUG from "debug";
import { Observable } from "rxjs";
import { filter, map, shareReplay, startWith, switchMap, tap } from "rxjs/operators";
import type Config from "./Config";
import type { IServicesCradle } from "./cradle";
import type Mqtt from "./Mqtt";

const debug = DEBUG("vehiclevue.hass-status");

/**
 * Home Assistant forgets MQTT discovery entities when it restarts, unless
 * they are announced again. It posts "online" on `<prefix>/status` when it
 * comes back.
 */
export default class HassStatus {
  private status$: Observable<string>;

  constructor(dependencies: Pick<IServicesCradle, "config" | "mqtt">) {
    const config: Config = dependencies.config;
    const mqtt: Mqtt = dependencies.mqtt;

    this.status$ = config.root$().pipe(
      switchMap((root) => mqtt.subscribe$(`${root.mqttDiscoveryPrefix}/status`)),
      tap((v) => {
        debug("status %s", v);
      }),
      shareReplay(1)
    );
  }

  /**
   * nexts whenever HASS goes online.
   */
  get online$(): Observable<boolean> {
    return this.status$.pipe(
      map((v) => v === "online"),
      filter((v) => v),
      startWith(true)
    );
  }
}
