import DEBUG from "debug";
import { throwError, timer } from "rxjs";

import { catchError, switchMap, tap } from "rxjs/operators";

import servicesCradle from "./services/cradle";
import bridge$ from "./vehiclevue";
import { AuthenticationRequiredError } from "./vehiclevue/errors";

const debug = DEBUG("vehiclevue.index");

const { emporia } = servicesCradle.config.root();
if (!emporia.email || !emporia.password) {
  console.error(
    "Emporia credentials missing, set EMPORIA_EMAIL and EMPORIA_PASSWORD or emporia.email and emporia.password in the config file."
  );
  process.exit(1);
}

const process$ = bridge$(servicesCradle).pipe(
  tap((report) => {
    debug(report);
  })
);

debug("starting up");
console.log("vehiclevue polling Emporia as %s", emporia.email);

process$
  .pipe(
    catchError((e, obs$) => {
      if (e instanceof AuthenticationRequiredError) {
        return throwError(() => e);
      }

      console.error("process errored", e);

      return timer(5000).pipe(switchMap(() => obs$));
    })
  )
  .subscribe({
    error(e: unknown) {
      if (e instanceof AuthenticationRequiredError) {
        console.error(e.message);
      } else {
        console.error("process failed", e);
      }

      process.exit(1);
    },
    complete() {
      debug("completed process");
      process.exit(0);
    },
  });
