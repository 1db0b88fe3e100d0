import {
  AuthenticationDetails,
  CognitoUser,
  CognitoUserPool,
  type CognitoUserSession,
} from "amazon-cognito-identity-js";
import { differenceInMilliseconds } from "date-fns";
import DEBUG from "debug";
import ms from "ms";
import { defer, Observable, throwError } from "rxjs";
import { fromFetch } from "rxjs/fetch";
import { catchError, map, shareReplay, tap } from "rxjs/operators";
import { z } from "zod";
import { kindForStatus, toVendorError, VendorError } from "../vehiclevue/errors";
import type {
  ChargerRaw,
  Credentials,
  DeviceListing,
  Session,
  UsageSample,
  VehicleRaw,
  VendorClient,
} from "../vehiclevue/types";
import type { IEmporiaConfig } from "./Config";

const debug = DEBUG("vehiclevue.emporia");

const vehicleSchema = z.object({
  vehicleGid: z.number(),
  displayName: z.unknown(),
  make: z.unknown(),
  model: z.unknown(),
});

const deviceSchema = z.object({
  deviceGid: z.number(),
  manufacturerDeviceId: z.unknown(),
  locationProperties: z
    .object({ deviceName: z.unknown(), displayName: z.unknown() })
    .nullish(),
  evCharger: z.unknown(),
  devices: z.array(z.unknown()).nullish(),
});

const devicesSchema = z.object({
  devices: z.array(z.unknown()),
});

const vehicleStatusSchema = z.object({
  batteryLevel: z.unknown(),
  batteryRange: z.unknown(),
  chargingState: z.unknown(),
  chargePowerKw: z.unknown(),
  vehicleState: z.unknown(),
  chargeLimitPercent: z.unknown(),
  minutesToFullCharge: z.unknown(),
});

const chargerStatusSchema = z.object({
  deviceGid: z.number(),
  chargerOn: z.unknown(),
  status: z.unknown(),
  message: z.unknown(),
  chargingRate: z.unknown(),
  maxChargingRate: z.unknown(),
  iconLabel: z.unknown(),
  iconDetailText: z.unknown(),
  faultText: z.unknown(),
  loadGid: z.unknown(),
  proControlCode: z.unknown(),
  debugCode: z.unknown(),
});

const devicesStatusSchema = z.object({
  evChargers: z.array(z.unknown()).nullish(),
});

/**
 * The status endpoint reports every charger on the account at once. Chargers
 * fetched within this window of each other share one response.
 */
const STATUS_LIST_TTL = ms("10s");

type ChargerStatusList = {
  evChargers: unknown[];
  fetchedAt: Date;
};

const channelUsageSchema = z.object({
  usage: z.number().nullish(),
});

const usageSchema = z.object({
  deviceListUsages: z.object({
    instant: z.string().nullish(),
    devices: z.array(
      z.object({
        deviceGid: z.number(),
        channelUsages: z.array(channelUsageSchema).nullish(),
      })
    ),
  }),
});

type EmporiaDevice = z.infer<typeof deviceSchema>;

function firstText(...values: unknown[]): string | undefined {
  return values.find(
    (v): v is string => typeof v === "string" && v.trim().length > 0
  );
}

/**
 * Flattens the device tree. Entries without a device gid are skipped.
 */
function flattenDevices(entries: unknown[]): EmporiaDevice[] {
  return entries.flatMap((entry) => {
    const parsed = deviceSchema.safeParse(entry);
    if (!parsed.success) {
      debug("skipping unreadable device entry: %o", entry);
      return [];
    }

    return [parsed.data, ...flattenDevices(parsed.data.devices ?? [])];
  });
}

/**
 * Converts a one-second kWh reading into kW. The charger's channels are
 * summed; when none of them carries a usage there is no sample.
 */
export function usageToKw(
  channels: ReadonlyArray<{ usage?: number | null }>
): number | null {
  const usages = channels
    .map((channel) => channel.usage)
    .filter((usage): usage is number => typeof usage === "number");

  if (usages.length === 0) {
    return null;
  }

  const kwh = usages.reduce((sum, usage) => sum + usage, 0);
  return Math.round(kwh * 3600 * 1000) / 1000;
}

/**
 * `Retry-After` is either seconds or an HTTP date.
 */
export function retryAfterMs(
  header: string | null,
  now: Date = new Date()
): number | undefined {
  if (!header) {
    return undefined;
  }

  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }

  const at = new Date(header);
  return Number.isNaN(at.getTime())
    ? undefined
    : Math.max(0, differenceInMilliseconds(at, now));
}

function cognitoError(err: unknown): VendorError {
  const code =
    typeof err === "object" && err !== null
      ? String(
          ("code" in err && err.code) || ("name" in err && err.name) || ""
        )
      : "";
  const message =
    typeof err === "object" && err !== null && "message" in err
      ? String(err.message)
      : String(err);

  switch (code) {
    case "NotAuthorizedException":
    case "UserNotFoundException":
    case "UserNotConfirmedException":
    case "PasswordResetRequiredException":
      return new VendorError("auth", message);
    case "TooManyRequestsException":
    case "LimitExceededException":
      return new VendorError("rate_limited", message);
    default:
      return new VendorError("transient", message);
  }
}

/**
 * Client for the Emporia cloud API, the one the Emporia app uses.
 *
 * Logs in against Emporia's Cognito user pool and sends the id token as the
 * `authtoken` header. Every call errors with a VendorError.
 */
export default class Emporia implements VendorClient {
  private apiUrl: string;
  private userPoolId: string;
  private clientId: string;
  private statusList?: {
    idToken: string;
    cachedAt: number;
    list$: Observable<ChargerStatusList>;
  };

  constructor({
    apiUrl,
    userPoolId,
    clientId,
  }: Pick<IEmporiaConfig, "apiUrl" | "userPoolId" | "clientId">) {
    this.apiUrl = apiUrl.replace(/\/+$/, "");
    this.userPoolId = userPoolId;
    this.clientId = clientId;
  }

  authenticate$({ email, password }: Credentials): Observable<Session> {
    return new Observable<Session>((subscriber) => {
      const pool = new CognitoUserPool({
        UserPoolId: this.userPoolId,
        ClientId: this.clientId,
      });
      const user = new CognitoUser({ Username: email, Pool: pool });

      debug("logging in as %s", email);
      user.authenticateUser(
        new AuthenticationDetails({ Username: email, Password: password }),
        {
          onSuccess: (session: CognitoUserSession) => {
            const idToken = session.getIdToken();
            debug("logged in, token valid until %o", idToken.getExpiration());
            subscriber.next({
              idToken: idToken.getJwtToken(),
              expiresAt: new Date(idToken.getExpiration() * 1000),
            });
            subscriber.complete();
          },
          onFailure: (err: unknown) => {
            subscriber.error(cognitoError(err));
          },
          newPasswordRequired: () => {
            subscriber.error(
              new VendorError("auth", "the account requires a new password")
            );
          },
          mfaRequired: () => {
            subscriber.error(
              new VendorError("auth", "multi-factor login is not supported")
            );
          },
        }
      );
    });
  }

  listVehicles$(session: Session): Observable<DeviceListing[]> {
    return this.get$(session, "customers/vehicles", z.array(z.unknown())).pipe(
      map((entries) =>
        entries.flatMap((entry): DeviceListing[] => {
          const parsed = vehicleSchema.safeParse(entry);
          if (!parsed.success) {
            debug("skipping unreadable vehicle entry: %o", entry);
            return [];
          }

          const { vehicleGid, displayName, make, model } = parsed.data;
          const makeModel = [make, model]
            .filter((v): v is string => typeof v === "string" && v !== "")
            .join(" ");

          return [
            {
              kind: "vehicle",
              gid: vehicleGid,
              name:
                firstText(displayName, makeModel) ?? `Vehicle ${vehicleGid}`,
            },
          ];
        })
      )
    );
  }

  listChargers$(session: Session): Observable<DeviceListing[]> {
    return this.get$(session, "customers/devices", devicesSchema).pipe(
      map(({ devices }) =>
        flattenDevices(devices)
          .filter((device) => device.evCharger !== undefined && device.evCharger !== null)
          .map(
            (device): DeviceListing => ({
              kind: "charger",
              gid: device.deviceGid,
              name:
                firstText(
                  device.locationProperties?.displayName,
                  device.locationProperties?.deviceName,
                  device.manufacturerDeviceId
                ) ?? `Charger ${device.deviceGid}`,
            })
          )
      )
    );
  }

  fetchVehicleStatus$(session: Session, gid: number): Observable<VehicleRaw> {
    return this.get$(
      session,
      `vehicles/v2/settings?vehicleGid=${gid}`,
      vehicleStatusSchema.nullable()
    ).pipe(
      map((status) => {
        if (status === null) {
          throw new VendorError("not_found", `vehicle ${gid} has no status`);
        }

        return {
          ...status,
          kind: "vehicle" as const,
          vehicleGid: gid,
          fetchedAt: new Date(),
        };
      })
    );
  }

  fetchChargerStatus$(session: Session, gid: number): Observable<ChargerRaw> {
    return this.chargerStatusList$(session).pipe(
      map(({ evChargers, fetchedAt }) => {
        const status = evChargers
          .map((entry) => chargerStatusSchema.safeParse(entry))
          .find((parsed) => parsed.success && parsed.data.deviceGid === gid);

        if (!status?.success) {
          throw new VendorError("not_found", `charger ${gid} is not reported`);
        }

        return {
          ...status.data,
          kind: "charger" as const,
          fetchedAt,
        };
      })
    );
  }

  private chargerStatusList$(session: Session): Observable<ChargerStatusList> {
    return defer(() => {
      const cached = this.statusList;
      if (
        cached &&
        cached.idToken === session.idToken &&
        Date.now() - cached.cachedAt < STATUS_LIST_TTL
      ) {
        return cached.list$;
      }

      // a failed request is not replayed, the next charger asks again
      const list$ = this.get$(
        session,
        "customers/devices/status",
        devicesStatusSchema
      ).pipe(
        map(({ evChargers }) => ({
          evChargers: evChargers ?? [],
          fetchedAt: new Date(),
        })),
        shareReplay(1)
      );
      this.statusList = { idToken: session.idToken, cachedAt: Date.now(), list$ };

      return list$;
    });
  }

  fetchUsageSample$(
    session: Session,
    gid: number,
    at: Date
  ): Observable<UsageSample | null> {
    const query = new URLSearchParams({
      apiMethod: "getDeviceListUsages",
      deviceGids: String(gid),
      instant: at.toISOString(),
      scale: "1S",
      energyUnit: "KilowattHours",
    });

    return this.get$(session, `AppAPI?${query.toString()}`, usageSchema).pipe(
      map(({ deviceListUsages }) => {
        const device = deviceListUsages.devices.find(
          (candidate) => candidate.deviceGid === gid
        );
        const kw = usageToKw(device?.channelUsages ?? []);
        if (kw === null) {
          return null;
        }

        const sampledAt = deviceListUsages.instant
          ? new Date(deviceListUsages.instant)
          : at;

        return {
          kw,
          sampledAt: Number.isNaN(sampledAt.getTime()) ? at : sampledAt,
        };
      })
    );
  }

  private get$<T>(
    session: Session,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Observable<T> {
    const url = `${this.apiUrl}/${path}`;
    const start = new Date();
    debug("fetching URL GET %s", url);

    return fromFetch(url, {
      method: "GET",
      headers: { authtoken: session.idToken, accept: "application/json" },
      selector: async (response) => {
        const kind = kindForStatus(response.status);
        if (kind) {
          throw new VendorError(
            kind,
            `GET ${path} failed with ${response.status}`,
            response.status,
            retryAfterMs(response.headers.get("retry-after"))
          );
        }

        const body: unknown = await response.json();
        const parsed = schema.safeParse(body);
        if (!parsed.success) {
          throw new VendorError(
            "transient",
            `unexpected payload from ${path}: ${parsed.error.issues[0]?.message}`
          );
        }

        return parsed.data;
      },
    }).pipe(
      tap(() =>
        debug(
          "success fetching GET %s %dms",
          url,
          differenceInMilliseconds(new Date(), start)
        )
      ),
      catchError((err: unknown) => {
        const error = toVendorError(err);
        debug(
          "failed fetching GET %s (%s) %dms",
          url,
          error.message,
          differenceInMilliseconds(new Date(), start)
        );
        return throwError(() => error);
      })
    );
  }
}
