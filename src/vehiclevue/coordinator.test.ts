import ms from "ms";
import {
  defer,
  EMPTY,
  lastValueFrom,
  NEVER,
  Observable,
  of,
  throwError,
  timer,
} from "rxjs";
import { map, switchMap, take } from "rxjs/operators";
import { TestScheduler } from "rxjs/testing";
import PollCoordinator, { type CoordinatorOptions } from "./coordinator";
import { VendorError } from "./errors";
import type {
  ChargerRaw,
  DeviceId,
  DeviceListing,
  DeviceSnapshot,
  Diagnostic,
  EntitySink,
  Session,
  UsageSample,
  VehicleRaw,
  VendorClient,
} from "./types";

const session = (): Session => ({
  idToken: "test-token",
  expiresAt: new Date(Date.now() + ms("1h")),
});

const vehicleRaw = (gid: number, batteryLevel: number): VehicleRaw => ({
  kind: "vehicle",
  vehicleGid: gid,
  batteryLevel,
  chargingState: "Charging",
  fetchedAt: new Date(),
});

const chargerRaw = (
  gid: number,
  fields: Partial<ChargerRaw> = {}
): ChargerRaw => ({
  kind: "charger",
  deviceGid: gid,
  fetchedAt: new Date(),
  ...fields,
});

const vehicles = (...gids: number[]): DeviceListing[] =>
  gids.map((gid) => ({ kind: "vehicle", gid, name: `Car ${gid}` }));

const chargers = (...gids: number[]): DeviceListing[] =>
  gids.map((gid) => ({ kind: "charger", gid, name: `Charger ${gid}` }));

class FakeClient implements VendorClient {
  calls: string[] = [];
  login: () => Observable<Session> = () => of(session());
  vehicles: () => Observable<DeviceListing[]> = () => of([]);
  chargers: () => Observable<DeviceListing[]> = () => of([]);
  vehicleStatus = new Map<number, () => Observable<VehicleRaw>>();
  chargerStatus = new Map<number, () => Observable<ChargerRaw>>();
  usage = new Map<number, () => Observable<UsageSample | null>>();

  authenticate$() {
    this.calls.push("authenticate");
    return this.login();
  }

  listVehicles$() {
    this.calls.push("listVehicles");
    return this.vehicles();
  }

  listChargers$() {
    this.calls.push("listChargers");
    return this.chargers();
  }

  fetchVehicleStatus$(_session: Session, gid: number) {
    this.calls.push(`vehicle-${gid}`);
    const status = this.vehicleStatus.get(gid);
    return status
      ? status()
      : throwError(() => new VendorError("not_found", `vehicle ${gid}`));
  }

  fetchChargerStatus$(_session: Session, gid: number) {
    this.calls.push(`charger-${gid}`);
    const status = this.chargerStatus.get(gid);
    return status
      ? status()
      : throwError(() => new VendorError("not_found", `charger ${gid}`));
  }

  fetchUsageSample$(_session: Session, gid: number) {
    this.calls.push(`usage-${gid}`);
    return this.usage.get(gid)?.() ?? of(null);
  }
}

class FakeSink implements EntitySink {
  published: [DeviceId, DeviceSnapshot][] = [];
  failures: [DeviceId, Diagnostic][] = [];
  retired: DeviceId[] = [];

  publish$(id: DeviceId, snapshot: DeviceSnapshot) {
    return defer(() => {
      this.published.push([id, snapshot]);
      return EMPTY;
    });
  }

  publishFailure$(id: DeviceId, diagnostic: Diagnostic) {
    return defer(() => {
      this.failures.push([id, diagnostic]);
      return EMPTY;
    });
  }

  retire$(id: DeviceId) {
    return defer(() => {
      this.retired.push(id);
      return EMPTY;
    });
  }
}

function setup(options: Partial<CoordinatorOptions> = {}) {
  const client = new FakeClient();
  const sink = new FakeSink();
  const coordinator = new PollCoordinator({
    client,
    sink,
    credentials: { email: "test@example.com", password: "test-secret" },
    options,
  });

  return { client, sink, coordinator };
}

describe("PollCoordinator", () => {
  describe("a healthy cycle", () => {
    it("should publish every device and report ok", async () => {
      const { client, sink, coordinator } = setup();
      client.vehicles = () => of(vehicles(1));
      client.chargers = () => of(chargers(22));
      client.vehicleStatus.set(1, () => of(vehicleRaw(1, 72)));
      client.chargerStatus.set(22, () =>
        of(chargerRaw(22, { chargerOn: true, chargingRate: 32, message: "Charging" }))
      );

      const report = await lastValueFrom(coordinator.runCycle$());

      expect(report.outcome).toBe("ok");
      expect(report.added).toEqual(["vehicle-1", "charger-22"]);
      expect(report.nextInterval).toBe(ms("30m"));
      expect(sink.published.map(([id]) => id)).toEqual([
        "vehicle-1",
        "charger-22",
      ]);
      expect(sink.published[0][1]).toMatchObject({
        battery: 72,
        chargingState: "charging",
      });
      expect(sink.published[1][1]).toMatchObject({
        on: true,
        message: "Charging",
        powerKw: 7.68,
        powerIsEstimated: true,
      });
    });

    it("should reuse the session across cycles", async () => {
      const { client, coordinator } = setup();

      await lastValueFrom(coordinator.runCycle$());
      await lastValueFrom(coordinator.runCycle$());

      expect(client.calls.filter((c) => c === "authenticate")).toHaveLength(1);
    });

    it("should renew a session about to expire", async () => {
      const { client, coordinator } = setup();
      client.login = () =>
        of({ idToken: "test-token", expiresAt: new Date(Date.now() + ms("1m")) });

      await lastValueFrom(coordinator.runCycle$());
      await lastValueFrom(coordinator.runCycle$());

      expect(client.calls.filter((c) => c === "authenticate")).toHaveLength(2);
    });
  });

  describe("usage samples", () => {
    const chargerAt = new Date("2024-05-01T12:00:00Z");

    function chargerSetup() {
      const context = setup();
      context.client.chargers = () => of(chargers(22));
      context.client.chargerStatus.set(22, () =>
        of(chargerRaw(22, { chargerOn: true, chargingRate: 32, fetchedAt: chargerAt }))
      );
      return context;
    }

    it("should publish the live sample instead of the estimate", async () => {
      const { client, sink, coordinator } = chargerSetup();
      client.usage.set(22, () => of({ kw: 7.412, sampledAt: chargerAt }));

      await lastValueFrom(coordinator.runCycle$());

      expect(sink.published[0][1]).toMatchObject({
        powerKw: 7.412,
        powerIsEstimated: false,
      });
    });

    it("should fall back to the estimate when the sample fails", async () => {
      const { client, sink, coordinator } = chargerSetup();
      client.usage.set(22, () =>
        throwError(() => new VendorError("transient", "usage unavailable"))
      );

      const report = await lastValueFrom(coordinator.runCycle$());

      expect(report.outcome).toBe("ok");
      expect(sink.published[0][1]).toMatchObject({
        powerKw: 7.68,
        powerIsEstimated: true,
      });
    });
  });

  describe("rate limits", () => {
    it("should publish devices fetched before the limit and skip the rest", async () => {
      const { client, sink, coordinator } = setup();
      client.vehicles = () => of(vehicles(1, 2, 3, 4, 5));
      [1, 2, 4, 5].forEach((gid) =>
        client.vehicleStatus.set(gid, () => of(vehicleRaw(gid, 50 + gid)))
      );
      client.vehicleStatus.set(3, () =>
        throwError(
          () => new VendorError("rate_limited", "slow down", 429, ms("1m"))
        )
      );

      const report = await lastValueFrom(coordinator.runCycle$());

      expect(report.outcome).toBe("rate_limited");
      expect(sink.published.map(([id]) => id)).toEqual([
        "vehicle-1",
        "vehicle-2",
      ]);
      expect(client.calls).not.toContain("vehicle-4");
      expect(client.calls).not.toContain("vehicle-5");
      expect(
        report.results.map((r) =>
          r.ok ? "ok" : `${r.failure.kind}:${r.failure.attempted}`
        )
      ).toEqual([
        "ok",
        "ok",
        "rate_limited:true",
        "rate_limited:false",
        "rate_limited:false",
      ]);
      expect(sink.failures.map(([id]) => id)).toEqual([
        "vehicle-3",
        "vehicle-4",
        "vehicle-5",
      ]);
      expect(report.nextInterval).toBe(ms("1h"));
    });

    it("should skip polling when a listing is rate limited", async () => {
      const { client, coordinator } = setup();
      client.vehicles = () =>
        throwError(() => new VendorError("rate_limited", "slow down", 429));

      const report = await lastValueFrom(coordinator.runCycle$());

      expect(report.outcome).toBe("rate_limited");
      expect(client.calls).toEqual(["authenticate", "listVehicles"]);
    });
  });

  describe("bounded fan-out", () => {
    it("should keep at most `concurrency` fetches in flight", () => {
      const testScheduler = new TestScheduler((actual, expected) => {
        expect(actual).toEqual(expected);
      });
      const issued: [string, number][] = [];

      testScheduler.run(({ expectObservable }) => {
        const { client, coordinator } = setup({ concurrency: 2 });
        client.vehicles = () => of(vehicles(1, 2, 3, 4, 5));
        [1, 2, 3, 4, 5].forEach((gid) =>
          client.vehicleStatus.set(gid, () => {
            issued.push([`vehicle-${gid}`, testScheduler.now()]);
            return timer(100).pipe(map(() => vehicleRaw(gid, 50)));
          })
        );

        expectObservable(
          coordinator.runCycle$().pipe(map((report) => report.outcome))
        ).toBe("300ms (a|)", { a: "ok" });
      });

      expect(issued).toEqual([
        ["vehicle-1", 0],
        ["vehicle-2", 0],
        ["vehicle-3", 100],
        ["vehicle-4", 100],
        ["vehicle-5", 200],
      ]);
    });

    it("should not issue fetches after a rate limit while a sibling is still in flight", () => {
      const testScheduler = new TestScheduler((actual, expected) => {
        expect(actual).toEqual(expected);
      });
      const issued: [string, number][] = [];

      testScheduler.run(({ expectObservable }) => {
        const { client, sink, coordinator } = setup({ concurrency: 2 });
        client.vehicles = () => of(vehicles(1, 2, 3, 4, 5));
        [2, 3, 4, 5].forEach((gid) =>
          client.vehicleStatus.set(gid, () => {
            issued.push([`vehicle-${gid}`, testScheduler.now()]);
            return timer(gid === 2 ? 150 : 100).pipe(
              map(() => vehicleRaw(gid, 50))
            );
          })
        );
        client.vehicleStatus.set(1, () => {
          issued.push(["vehicle-1", testScheduler.now()]);
          return timer(100).pipe(
            switchMap(() =>
              throwError(
                () => new VendorError("rate_limited", "slow down", 429)
              )
            )
          );
        });

        expectObservable(
          coordinator.runCycle$().pipe(
            map((report) => [
              report.outcome,
              ...report.results.map((r) =>
                r.ok
                  ? `${r.deviceId}:ok`
                  : `${r.deviceId}:${r.failure.kind}:${r.failure.attempted}`
              ),
            ])
          )
        ).toBe("150ms (a|)", {
          a: [
            "rate_limited",
            "vehicle-1:rate_limited:true",
            "vehicle-3:rate_limited:false",
            "vehicle-4:rate_limited:false",
            "vehicle-5:rate_limited:false",
            "vehicle-2:ok",
          ],
        });

        testScheduler.schedule(() => {
          expect(sink.published.map(([id]) => id)).toEqual(["vehicle-2"]);
        }, 200);
      });

      expect(issued).toEqual([
        ["vehicle-1", 0],
        ["vehicle-2", 0],
      ]);
    });
  });

  describe("transient failures", () => {
    it("should keep the last snapshot of the failing device only", async () => {
      const { client, sink, coordinator } = setup();
      client.vehicles = () => of(vehicles(1, 2));
      client.vehicleStatus.set(1, () => of(vehicleRaw(1, 50)));
      client.vehicleStatus.set(2, () => of(vehicleRaw(2, 60)));
      await lastValueFrom(coordinator.runCycle$());

      client.vehicleStatus.set(1, () =>
        throwError(() => new VendorError("transient", "bad gateway", 502))
      );
      client.vehicleStatus.set(2, () => of(vehicleRaw(2, 65)));
      const report = await lastValueFrom(coordinator.runCycle$());

      expect(report.outcome).toBe("partial");
      expect(coordinator.table.snapshot("vehicle-1")).toMatchObject({
        battery: 50,
      });
      expect(coordinator.table.snapshot("vehicle-2")).toMatchObject({
        battery: 65,
      });
      expect(sink.published.map(([id]) => id)).toEqual([
        "vehicle-1",
        "vehicle-2",
        "vehicle-2",
      ]);
      expect(sink.failures).toHaveLength(1);
      expect(sink.failures[0][0]).toBe("vehicle-1");
      expect(sink.failures[0][1]).toMatchObject({
        kind: "transient",
        message: "bad gateway",
        attempted: true,
        fatal: false,
      });
    });

    it("should keep polling tracked devices when a listing fails", async () => {
      const { client, coordinator } = setup();
      client.vehicles = () => of(vehicles(1));
      client.vehicleStatus.set(1, () => of(vehicleRaw(1, 50)));
      await lastValueFrom(coordinator.runCycle$());

      client.vehicles = () =>
        throwError(() => new VendorError("transient", "bad gateway", 502));
      const report = await lastValueFrom(coordinator.runCycle$());

      expect(report.outcome).toBe("partial");
      expect(report.results.map((r) => r.ok)).toEqual([true]);
      expect(coordinator.table.get("vehicle-1")?.absentCycles).toBe(0);
    });

    it("should report every device when no session can be had", async () => {
      const { client, sink, coordinator } = setup();
      client.login = () =>
        of({ idToken: "test-token", expiresAt: new Date(Date.now() + ms("1m")) });
      client.vehicles = () => of(vehicles(1));
      client.vehicleStatus.set(1, () => of(vehicleRaw(1, 50)));
      await lastValueFrom(coordinator.runCycle$());

      client.login = () =>
        throwError(() => new VendorError("transient", "connection reset"));
      const report = await lastValueFrom(coordinator.runCycle$());

      expect(report.outcome).toBe("partial");
      expect(sink.failures[0][1]).toMatchObject({
        kind: "transient",
        message: "connection reset",
        attempted: false,
      });
      expect(coordinator.table.snapshot("vehicle-1")).toMatchObject({
        battery: 50,
      });
    });

    it("should time out a device that does not answer", () => {
      const testScheduler = new TestScheduler((actual, expected) => {
        expect(actual).toEqual(expected);
      });

      testScheduler.run(({ expectObservable }) => {
        const { client, coordinator } = setup({ fetchTimeout: 1000 });
        client.vehicles = () => of(vehicles(1, 2));
        client.vehicleStatus.set(1, () => NEVER);
        client.vehicleStatus.set(2, () => of(vehicleRaw(2, 60)));

        const results$ = coordinator.runCycle$().pipe(
          map((report) =>
            report.results.map((r) => (r.ok ? "ok" : r.failure.message))
          )
        );

        expectObservable(results$).toBe("1000ms (a|)", {
          a: ["ok", "timed out after 1000ms"],
        });
      });
    });
  });

  describe("removed devices", () => {
    it("should drop a device after it missed three listings", async () => {
      const { client, sink, coordinator } = setup({ removalThreshold: 3 });
      client.vehicles = () => of(vehicles(1));
      client.vehicleStatus.set(1, () => of(vehicleRaw(1, 50)));
      await lastValueFrom(coordinator.runCycle$());

      client.vehicles = () => of([]);
      const second = await lastValueFrom(coordinator.runCycle$());
      const third = await lastValueFrom(coordinator.runCycle$());

      expect(second.evicted).toEqual([]);
      expect(third.evicted).toEqual([]);
      expect(coordinator.table.snapshot("vehicle-1")).toMatchObject({
        battery: 50,
      });

      const fourth = await lastValueFrom(coordinator.runCycle$());

      expect(fourth.evicted).toEqual(["vehicle-1"]);
      expect(fourth.results).toEqual([]);
      expect(coordinator.table.get("vehicle-1")).toBeUndefined();
      expect(sink.retired).toEqual(["vehicle-1"]);
    });

    it("should drop a device after three not-found responses", async () => {
      const { client, sink, coordinator } = setup({ removalThreshold: 3 });
      client.chargers = () => of(chargers(7));

      const counts: (number | undefined)[] = [];
      for (let i = 0; i < 3; i++) {
        const report = await lastValueFrom(coordinator.runCycle$());
        const [result] = report.results;
        counts.push(result.ok ? undefined : result.failure.consecutive);
        if (i < 2) {
          expect(coordinator.table.get("charger-7")).toBeDefined();
          expect(sink.retired).toEqual([]);
        } else {
          expect(report.evicted).toEqual(["charger-7"]);
        }
      }

      expect(counts).toEqual([1, 2, 3]);
      expect(sink.failures.map(([, d]) => d.kind)).toEqual([
        "not_found",
        "not_found",
        "not_found",
      ]);
      expect(sink.retired).toEqual(["charger-7"]);
    });
  });

  describe("authentication", () => {
    it("should halt when the credentials are rejected", () => {
      const testScheduler = new TestScheduler((actual, expected) => {
        expect(actual).toEqual(expected);
      });

      testScheduler.run(({ expectObservable }) => {
        const { client, coordinator } = setup();
        client.login = () =>
          throwError(
            () => new VendorError("auth", "Incorrect username or password.")
          );

        expectObservable(
          coordinator
            .start$()
            .pipe(map((report) => `${report.outcome}: ${report.reason}`))
        ).toBe("(a|)", { a: "halted: Incorrect username or password." });
      });
    });

    it("should log in again once after a rejected request", async () => {
      const { client, coordinator } = setup();
      client.vehicles = () => of(vehicles(1, 2));
      client.vehicleStatus.set(1, () =>
        throwError(() => new VendorError("auth", "GET failed with 401", 401))
      );
      client.vehicleStatus.set(2, () => of(vehicleRaw(2, 60)));

      const report = await lastValueFrom(coordinator.runCycle$());

      expect(report.outcome).toBe("partial");
      expect(client.calls.filter((c) => c === "authenticate")).toHaveLength(2);
      expect(client.calls).not.toContain("vehicle-2");
      expect(
        report.results.map((r) => (r.ok ? "ok" : r.failure.attempted))
      ).toEqual([true, false]);
    });

    it("should mark every device unavailable when the new login fails too", async () => {
      const { client, sink, coordinator } = setup();
      client.vehicles = () => of(vehicles(1, 2));
      client.vehicleStatus.set(1, () => of(vehicleRaw(1, 50)));
      client.vehicleStatus.set(2, () => of(vehicleRaw(2, 60)));
      await lastValueFrom(coordinator.runCycle$());

      client.vehicleStatus.set(1, () =>
        throwError(() => new VendorError("auth", "GET failed with 401", 401))
      );
      client.login = () =>
        throwError(() => new VendorError("auth", "Password attempts exceeded"));
      const report = await lastValueFrom(coordinator.runCycle$());

      expect(report.outcome).toBe("halted");
      expect(report.results).toEqual([
        expect.objectContaining({
          ok: false,
          deviceId: "vehicle-1",
          failure: expect.objectContaining({ kind: "auth", fatal: true }),
        }),
        expect.objectContaining({
          ok: false,
          deviceId: "vehicle-2",
          failure: expect.objectContaining({ kind: "auth", fatal: true }),
        }),
      ]);
      expect(
        sink.failures.slice(-2).map(([id, d]) => [id, d.fatal, d.message])
      ).toEqual([
        ["vehicle-1", true, "Password attempts exceeded"],
        ["vehicle-2", true, "Password attempts exceeded"],
      ]);
      expect(coordinator.table.snapshot("vehicle-2")).toMatchObject({
        battery: 60,
      });
    });
  });

  describe("scheduling", () => {
    it("should back off after a rate limit and reset after a good cycle", () => {
      const testScheduler = new TestScheduler((actual, expected) => {
        expect(actual).toEqual(expected);
      });

      testScheduler.run(({ expectObservable }) => {
        const { client, coordinator } = setup({
          interval: 1000,
          maxInterval: 8000,
        });
        let polls = 0;
        client.vehicles = () => of(vehicles(1));
        client.vehicleStatus.set(1, () => {
          polls += 1;
          return polls === 1
            ? throwError(() => new VendorError("rate_limited", "slow down", 429))
            : of(vehicleRaw(1, 50));
        });

        expectObservable(
          coordinator.start$().pipe(
            take(3),
            map((report) => `${report.outcome}:${report.nextInterval}`)
          )
        ).toBe("a 1999ms b 999ms (c|)", {
          a: "rate_limited:2000",
          b: "ok:1000",
          c: "ok:1000",
        });
      });
    });
  });
});
