import DEBUG from "debug";

import { connect, type IClientPublishOptions, type IPublishPacket } from "mqtt";

import { concat, Observable } from "rxjs";
import { filter, map, switchMap, tap, shareReplay, take } from "rxjs/operators";
import type Config from "./Config";
import type { IServicesCradle } from "./cradle";

export interface ISimplifiedMqttClient {
  message$: Observable<[string, Buffer, IPublishPacket]>;
  subscribe$: ({ topic }: { topic: string }) => Observable<never>;
  publish$: ({
    topic,
    payload,
    options,
  }: {
    topic: string;
    payload: string | Buffer;
    options?: IClientPublishOptions;
  }) => Observable<never>;
}

const debug = DEBUG("vehiclevue.mqtt");

function mqttClient(url: string): Observable<ISimplifiedMqttClient> {
  return new Observable<ISimplifiedMqttClient>((subscriber) => {
    debug("going to connect to %s", url);

    const client = connect(url);

    client.on("close", () => {
      debug("close");
    });

    client.on("error", (err) => {
      debug("error: %s", err.message);
    });

    client.on("connect", () => {
      debug("connect");

      subscriber.next({
        message$: new Observable<[string, Buffer, IPublishPacket]>(
          (messageSubscriber) => {
            const onMessage = (
              topic: string,
              payload: Buffer,
              packet: IPublishPacket
            ) => messageSubscriber.next([topic, payload, packet]);

            client.on("message", onMessage);
            return () => {
              client.removeListener("message", onMessage);
            };
          }
        ),
        publish$: ({ options, payload, topic }) => {
          debug("publishing to topic %s -> %s", topic, payload);

          return new Observable<never>((publishSubscriber) => {
            client.publish(topic, payload, options ?? { qos: 1 }, (err) => {
              if (err) {
                publishSubscriber.error(err);
                return;
              }

              publishSubscriber.complete();
            });
          });
        },
        subscribe$: ({ topic }) => {
          return new Observable<never>((subscribeSubscriber) => {
            client.subscribe(topic, (err) => {
              if (err) {
                subscribeSubscriber.error(err);
                return;
              }

              subscribeSubscriber.complete();
            });
          });
        },
      });
    });

    client.on("end", () => {
      subscriber.complete();
    });

    return () => {
      debug("request for socket termination");
      client.end();
    };
  }).pipe(
    // Without it every subscriber would open its own connection.
    shareReplay(1)
  );
}

export default class Mqtt {
  private config: Config;
  private client$: Observable<ISimplifiedMqttClient>;

  constructor(dependencies: Pick<IServicesCradle, "config">) {
    this.config = dependencies.config;

    debug("constructing mqtt instance");
    this.client$ = this.config.root$().pipe(
      switchMap((config) => mqttClient(config.mqttUrl)),
      shareReplay(1)
    );
  }

  public subscribe$(topic: string): Observable<string> {
    return this.client$.pipe(
      switchMap((d) => {
        const subscribe$ = d.subscribe$({ topic });

        const replies$ = d.message$.pipe(
          filter(([incomingTopic]) => incomingTopic === topic),
          map((args) => args[1].toString()),
          tap((msg) => debug("got message for topic %s -> %s", topic, msg))
        );

        return concat(subscribe$, replies$);
      })
    );
  }

  /**
   * Completes once the broker acknowledged the message.
   */
  public publish$(
    topic: string,
    payload: string | Buffer | object,
    options?: IClientPublishOptions
  ): Observable<never> {
    const body =
      typeof payload === "string" || Buffer.isBuffer(payload)
        ? payload
        : JSON.stringify(payload);

    return this.client$.pipe(
      take(1),
      switchMap((d) => d.publish$({ topic, payload: body, options })),
      tap({ complete: () => debug("completed publish to %s", topic) })
    );
  }
}
