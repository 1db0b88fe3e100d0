import DEBUG from "debug";
import { merge, Observable } from "rxjs";
import { tap } from "rxjs/operators";
import type { IServicesCradle } from "../services/cradle";
import PollCoordinator from "./coordinator";
import { AuthenticationRequiredError } from "./errors";
import type { CycleReport } from "./types";

const debug = DEBUG("vehiclevue.bridge");

export function createCoordinator({
  config,
  emporia,
  deviceSensors,
}: Pick<IServicesCradle, "config" | "emporia" | "deviceSensors">): PollCoordinator {
  const { emporia: account, polling } = config.root();

  return new PollCoordinator({
    client: emporia,
    sink: deviceSensors,
    credentials: { email: account.email, password: account.password },
    options: polling,
  });
}

/**
 * Polls Emporia forever and keeps the Home Assistant entities up to date.
 * Errors with AuthenticationRequiredError once the credentials are rejected.
 */
export default function bridge$(
  services: Pick<
    IServicesCradle,
    "config" | "emporia" | "deviceSensors"
  >
): Observable<CycleReport> {
  const coordinator = createCoordinator(services);

  const cycles$ = coordinator.start$().pipe(
    tap((report) => {
      debug(
        "cycle %s, %d device(s), next in %dms",
        report.outcome,
        report.results.length,
        report.nextInterval
      );

      if (report.outcome === "halted") {
        throw new AuthenticationRequiredError(
          report.reason ?? "credentials were rejected"
        );
      }
    })
  );

  return merge(cycles$, services.deviceSensors.announce$());
}
