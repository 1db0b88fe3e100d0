import DEBUG, { type Debugger } from "debug";
import ms from "ms";
import {
  asyncScheduler,
  concat,
  defer,
  EMPTY,
  from,
  Observable,
  of,
  type SchedulerLike,
  timer,
} from "rxjs";
import {
  catchError,
  concatMap,
  defaultIfEmpty,
  expand,
  ignoreElements,
  map,
  mergeMap,
  switchMap,
  throwIfEmpty,
  timeout,
  toArray,
} from "rxjs/operators";
import { nextInterval } from "./backoff";
import {
  DeviceTable,
  DEFAULT_REMOVAL_THRESHOLD,
  type TrackedDevice,
} from "./deviceTable";
import { toVendorError, VendorError } from "./errors";
import { DEFAULT_ASSUMED_VOLTAGE, type Phase } from "./estimatePower";
import { mapCharger, mapVehicle, type MappingResult } from "./mapState";
import type {
  Credentials,
  CycleOutcome,
  CycleReport,
  DeviceId,
  DeviceKind,
  DeviceListing,
  DeviceSnapshot,
  Diagnostic,
  EntitySink,
  PollResult,
  Session,
  VendorClient,
} from "./types";

export interface CoordinatorOptions {
  /** ms between cycles */
  interval: number;
  /** ms, ceiling for the rate-limit backoff */
  maxInterval: number;
  /** ms allowed for one device's fetch and mapping */
  fetchTimeout: number;
  /** devices fetched in parallel */
  concurrency: number;
  /** consecutive absences or not-found responses before a device is dropped */
  removalThreshold: number;
  /** ms a usage sample may be away from the charger reading */
  usageTolerance: number;
  assumedVoltage: number;
  phase: Phase;
}

export const DEFAULT_COORDINATOR_OPTIONS: CoordinatorOptions = {
  interval: ms("30m"),
  maxInterval: ms("4h"),
  fetchTimeout: ms("30s"),
  concurrency: 2,
  removalThreshold: DEFAULT_REMOVAL_THRESHOLD,
  usageTolerance: ms("5s"),
  assumedVoltage: DEFAULT_ASSUMED_VOLTAGE,
  phase: "split",
};

/**
 * Sessions closer than this to expiry are renewed before the cycle starts.
 */
const SESSION_REFRESH_MARGIN = ms("5m");

type CoordinatorDependencies = {
  client: VendorClient;
  sink: EntitySink;
  credentials: Credentials;
  options?: Partial<CoordinatorOptions>;
  scheduler?: SchedulerLike;
  debug?: Debugger;
};

/**
 * State shared by every fetch of one cycle. The first fetch to see a rate
 * limit or an auth failure flips the flag and later fetches check it before
 * they are issued.
 */
type CycleContext = {
  startedAt: Date;
  rateLimited: boolean;
  retryAfter?: number;
  authFailed: boolean;
  authReason?: string;
  added: DeviceId[];
  evicted: DeviceId[];
};

type SessionAttempt = { session: Session } | { error: VendorError };

/**
 * Drives the poll cycle: keeps the vendor session, reconciles the device
 * listing, fetches every tracked device and pushes the results to the sink.
 *
 * One device failing never stops the others. A rate limit stops the rest of
 * the cycle and backs off. Bad credentials halt polling.
 */
export default class PollCoordinator {
  readonly table: DeviceTable;
  readonly options: CoordinatorOptions;

  private client: VendorClient;
  private sink: EntitySink;
  private credentials: Credentials;
  private scheduler: SchedulerLike;
  private debug: Debugger;
  private session: Session | null = null;
  private currentInterval: number;

  constructor({
    client,
    sink,
    credentials,
    options,
    scheduler,
    debug,
  }: CoordinatorDependencies) {
    this.client = client;
    this.sink = sink;
    this.credentials = credentials;
    this.options = { ...DEFAULT_COORDINATOR_OPTIONS, ...options };
    this.scheduler = scheduler ?? asyncScheduler;
    this.debug = debug ?? DEBUG("vehiclevue.coordinator");
    this.table = new DeviceTable(this.options.removalThreshold);
    this.currentInterval = this.options.interval;
  }

  /**
   * Runs a cycle now and then one after every computed interval, until the
   * credentials are rejected or the subscriber leaves.
   */
  start$(): Observable<CycleReport> {
    return this.runCycle$().pipe(
      expand((report) => {
        if (report.outcome === "halted") {
          return EMPTY;
        }

        this.debug("next cycle in %s", ms(report.nextInterval));
        return timer(report.nextInterval, this.scheduler).pipe(
          switchMap(() => this.runCycle$())
        );
      })
    );
  }

  runCycle$(): Observable<CycleReport> {
    return defer(() => {
      const ctx: CycleContext = {
        startedAt: this.now(),
        rateLimited: false,
        authFailed: false,
        added: [],
        evicted: [],
      };

      return this.ensureSession$().pipe(
        map((session): SessionAttempt => ({ session })),
        catchError((err) =>
          of<SessionAttempt>({
            error: toVendorError(err, this.options.fetchTimeout),
          })
        ),
        switchMap((attempt) =>
          "session" in attempt
            ? this.poll$(attempt.session, ctx)
            : this.sessionFailed$(ctx, attempt.error)
        )
      );
    });
  }

  private now(): Date {
    return new Date(this.scheduler.now());
  }

  private ensureSession$(): Observable<Session> {
    return defer(() => {
      const session = this.session;
      if (
        session &&
        session.expiresAt.getTime() - this.scheduler.now() >
          SESSION_REFRESH_MARGIN
      ) {
        return of(session);
      }

      this.debug("authenticating as %s", this.credentials.email);
      return this.client.authenticate$(this.credentials).pipe(
        timeout({ first: this.options.fetchTimeout, scheduler: this.scheduler }),
        throwIfEmpty(
          () => new VendorError("transient", "authentication gave no session")
        ),
        map((fresh) => {
          this.session = fresh;
          return fresh;
        })
      );
    });
  }

  private poll$(session: Session, ctx: CycleContext): Observable<CycleReport> {
    return this.refreshListing$(session, ctx).pipe(
      switchMap((listingsOk) =>
        this.pollAll$(session, ctx).pipe(
          switchMap((results) => this.finish$(ctx, results, listingsOk))
        )
      )
    );
  }

  /**
   * Lists vehicles then chargers and reconciles the table for every kind that
   * listed successfully.
   *
   * @returns whether both listings succeeded
   */
  private refreshListing$(
    session: Session,
    ctx: CycleContext
  ): Observable<boolean> {
    const listings: [DeviceKind, () => Observable<DeviceListing[]>][] = [
      ["vehicle", () => this.client.listVehicles$(session)],
      ["charger", () => this.client.listChargers$(session)],
    ];

    return from(listings).pipe(
      concatMap(([kind, list$]) =>
        defer(() => {
          if (ctx.rateLimited || ctx.authFailed) {
            return of(false);
          }

          return list$().pipe(
            timeout({
              first: this.options.fetchTimeout,
              scheduler: this.scheduler,
            }),
            throwIfEmpty(
              () => new VendorError("transient", `empty ${kind} listing`)
            ),
            concatMap((listing) => {
              const { added, evicted } = this.table.reconcile(kind, listing);
              ctx.added.push(...added);
              ctx.evicted.push(...evicted);

              if (added.length > 0) {
                this.debug("tracking new %s(s): %o", kind, added);
              }

              return concat(
                ...evicted.map((id) => {
                  this.debug("%s left the listing, retiring", id);
                  return this.sinkCall$(`retire ${id}`, this.sink.retire$(id));
                }),
                of(true)
              );
            }),
            catchError((err) => {
              const error = toVendorError(err, this.options.fetchTimeout);
              this.debug("%s listing failed: %s", kind, error.message);
              this.flag(ctx, error);
              return of(false);
            })
          );
        })
      ),
      toArray(),
      map((results) => results.every((ok) => ok))
    );
  }

  private pollAll$(session: Session, ctx: CycleContext): Observable<PollResult[]> {
    return from(this.table.devices()).pipe(
      mergeMap(
        (device) => this.pollDevice$(device, session, ctx),
        this.options.concurrency
      ),
      toArray()
    );
  }

  /**
   * fetch → map → publish for one device. Errors end up as a failed
   * PollResult, never as an error on the stream.
   */
  private pollDevice$(
    device: TrackedDevice,
    session: Session,
    ctx: CycleContext
  ): Observable<PollResult> {
    const result$ = defer((): Observable<PollResult> => {
      if (ctx.rateLimited) {
        return of(
          this.failure(
            device,
            new VendorError("rate_limited", "skipped, cycle is rate limited"),
            false
          )
        );
      }

      if (ctx.authFailed) {
        return of(
          this.failure(
            device,
            new VendorError("auth", "skipped, session was rejected"),
            false
          )
        );
      }

      return this.fetchSnapshot$(device, session, ctx).pipe(
        timeout({ first: this.options.fetchTimeout, scheduler: this.scheduler }),
        throwIfEmpty(() => new VendorError("transient", "no response")),
        map(
          ({ snapshot, anomalies }): PollResult => ({
            ok: true,
            deviceId: device.id,
            snapshot,
            anomalies,
          })
        ),
        catchError((err) => {
          const error = toVendorError(err, this.options.fetchTimeout);
          this.flag(ctx, error);
          return of(this.failure(device, error, true));
        })
      );
    });

    return result$.pipe(concatMap((result) => this.apply$(device, result, ctx)));
  }

  private fetchSnapshot$(
    device: TrackedDevice,
    session: Session,
    ctx: CycleContext
  ): Observable<MappingResult<DeviceSnapshot>> {
    if (device.kind === "vehicle") {
      return this.client
        .fetchVehicleStatus$(session, device.gid)
        .pipe(map((raw) => mapVehicle(raw, device.name)));
    }

    return this.client.fetchChargerStatus$(session, device.gid).pipe(
      switchMap((raw) =>
        this.client.fetchUsageSample$(session, device.gid, raw.fetchedAt).pipe(
          defaultIfEmpty(null),
          catchError((err) => {
            const error = toVendorError(err);
            this.debug("no live power for %s: %s", device.id, error.message);
            this.flag(ctx, error);
            return of(null);
          }),
          map((sample) =>
            mapCharger(raw, device.name, sample, {
              assumedVoltage: this.options.assumedVoltage,
              phase: this.options.phase,
              usageTolerance: this.options.usageTolerance,
            })
          )
        )
      )
    );
  }

  /**
   * Records the result in the table and forwards it to the sink.
   */
  private apply$(
    device: TrackedDevice,
    result: PollResult,
    ctx: CycleContext
  ): Observable<PollResult> {
    if (result.ok) {
      result.anomalies.forEach((anomaly) =>
        this.debug(
          "unusable %s on %s (%s): %o",
          anomaly.field,
          anomaly.deviceId,
          anomaly.reason,
          anomaly.value
        )
      );
      this.table.recordSuccess(device.id, result.snapshot);

      return concat(
        this.sinkCall$(
          `publish ${device.id}`,
          this.sink.publish$(device.id, result.snapshot)
        ),
        of(result)
      );
    }

    if (result.failure.kind !== "not_found") {
      this.debug(
        "%s failed (%s): %s",
        device.id,
        result.failure.kind,
        result.failure.message
      );
      this.table.recordFailure(device.id, result.failure);

      return concat(
        this.sinkCall$(
          `report failure for ${device.id}`,
          this.sink.publishFailure$(device.id, result.failure)
        ),
        of(result)
      );
    }

    const { count, evicted } = this.table.recordNotFound(
      device.id,
      result.failure
    );
    const failure: Diagnostic = { ...result.failure, consecutive: count };
    this.debug("%s not found (%d in a row)", device.id, count);

    if (evicted) {
      ctx.evicted.push(device.id);
    }

    return concat(
      this.sinkCall$(
        `report failure for ${device.id}`,
        this.sink.publishFailure$(device.id, failure)
      ),
      evicted
        ? this.sinkCall$(`retire ${device.id}`, this.sink.retire$(device.id))
        : EMPTY,
      of<PollResult>({ ...result, failure })
    );
  }

  /**
   * A vendor request was rejected for bad credentials. Drop the session and
   * try exactly one fresh login before deciding whether to halt.
   */
  private finish$(
    ctx: CycleContext,
    results: PollResult[],
    listingsOk: boolean
  ): Observable<CycleReport> {
    if (!ctx.authFailed) {
      return of(this.report(ctx, results, listingsOk));
    }

    this.session = null;
    this.debug("session rejected (%s), logging in again", ctx.authReason);

    return this.ensureSession$().pipe(
      map(() => this.report(ctx, results, false)),
      catchError((err) => {
        const error = toVendorError(err, this.options.fetchTimeout);
        if (error.kind === "auth") {
          return this.halt$(ctx, error.message);
        }

        this.flag(ctx, error);
        return of(this.report(ctx, results, false));
      })
    );
  }

  /**
   * No session for this cycle. Every tracked device keeps its last value and
   * is told why it was not refreshed.
   */
  private sessionFailed$(
    ctx: CycleContext,
    error: VendorError
  ): Observable<CycleReport> {
    if (error.kind === "auth") {
      return this.halt$(ctx, error.message);
    }

    this.debug("could not get a session: %s", error.message);
    this.flag(ctx, error);

    return from(this.table.devices()).pipe(
      concatMap((device) =>
        this.apply$(device, this.failure(device, error, false), ctx)
      ),
      toArray(),
      map((results) => this.report(ctx, results, false))
    );
  }

  /**
   * Stops polling. Every tracked device gets a fatal diagnostic so the sink
   * can show it as unavailable.
   */
  private halt$(ctx: CycleContext, reason: string): Observable<CycleReport> {
    this.session = null;
    const at = this.now();

    return from(this.table.devices()).pipe(
      concatMap((device) => {
        const failure: Diagnostic = {
          kind: "auth",
          message: reason,
          at,
          attempted: false,
          fatal: true,
        };
        this.table.recordFailure(device.id, failure);

        return concat(
          this.sinkCall$(
            `report failure for ${device.id}`,
            this.sink.publishFailure$(device.id, failure)
          ),
          of<PollResult>({ ok: false, deviceId: device.id, failure })
        );
      }),
      toArray(),
      map(
        (results): CycleReport => ({
          startedAt: ctx.startedAt,
          outcome: "halted",
          results,
          added: ctx.added,
          evicted: ctx.evicted,
          nextInterval: this.currentInterval,
          reason,
        })
      )
    );
  }

  private report(
    ctx: CycleContext,
    results: PollResult[],
    listingsOk: boolean
  ): CycleReport {
    let outcome: CycleOutcome = "partial";
    if (ctx.rateLimited) {
      outcome = "rate_limited";
    } else if (listingsOk && !ctx.authFailed && results.every((r) => r.ok)) {
      outcome = "ok";
    }

    this.currentInterval = nextInterval(
      this.currentInterval,
      outcome,
      this.options,
      ctx.retryAfter
    );

    this.debug(
      "cycle %s: %d/%d devices refreshed",
      outcome,
      results.filter((r) => r.ok).length,
      results.length
    );

    return {
      startedAt: ctx.startedAt,
      outcome,
      results,
      added: ctx.added,
      evicted: ctx.evicted,
      nextInterval: this.currentInterval,
    };
  }

  private flag(ctx: CycleContext, error: VendorError): void {
    if (error.kind === "rate_limited" && !ctx.rateLimited) {
      this.debug("rate limited, suppressing the rest of this cycle");
      ctx.rateLimited = true;
      ctx.retryAfter = error.retryAfterMs;
    }

    if (error.kind === "auth" && !ctx.authFailed) {
      ctx.authFailed = true;
      ctx.authReason = error.message;
    }
  }

  private failure(
    device: TrackedDevice,
    error: VendorError,
    attempted: boolean
  ): PollResult {
    return {
      ok: false,
      deviceId: device.id,
      failure: {
        kind: error.kind,
        message: error.message,
        at: this.now(),
        attempted,
        fatal: false,
      },
    };
  }

  private sinkCall$(what: string, call$: Observable<unknown>): Observable<never> {
    return call$.pipe(
      timeout({ first: this.options.fetchTimeout, scheduler: this.scheduler }),
      ignoreElements(),
      catchError((err) => {
        this.debug(
          "sink could not %s: %s",
          what,
          err instanceof Error ? err.message : String(err)
        );
        return EMPTY;
      })
    );
  }
}
