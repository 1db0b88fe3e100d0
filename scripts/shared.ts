import * as readline from "readline";
import { firstValueFrom, of } from "rxjs";
import { Writable } from "stream";
import { catchError } from "rxjs/operators";
import type { IPollingConfig } from "../src/services/Config";
import type Emporia from "../src/services/Emporia";
import { toVendorError } from "../src/vehiclevue/errors";
import {
  mapCharger,
  mapVehicle,
  type MappingResult,
} from "../src/vehiclevue/mapState";
import type {
  ChargerSnapshot,
  Credentials,
  DeviceListing,
  DeviceSnapshot,
  Session,
  UsageSample,
  VehicleSnapshot,
} from "../src/vehiclevue/types";

export function credentialsFromEnv(
  env: NodeJS.ProcessEnv
): Credentials | null {
  const email = env.EMPORIA_EMAIL?.trim();
  const password = env.EMPORIA_PASSWORD;

  return email && password ? { email, password } : null;
}

export interface Prompt {
  ask(question: string): Promise<string>;
  /**
   * Asks without echoing what is typed, for passwords.
   */
  askHidden(question: string): Promise<string>;
  close(): void;
}

export function createPrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompt {
  let muted = false;
  const echo = new Writable({
    write(
      chunk: Buffer | string,
      _encoding: BufferEncoding,
      callback: (error?: Error | null) => void
    ) {
      if (!muted) {
        output.write(chunk);
      }
      callback();
    },
  });
  const rl = readline.createInterface({ input, output: echo, terminal: true });

  const ask = (question: string) =>
    new Promise<string>((resolve) => {
      rl.question(question, (answer) => resolve(answer.trim()));
    });

  return {
    ask,
    async askHidden(question) {
      output.write(question);
      muted = true;
      try {
        return await ask("");
      } finally {
        muted = false;
        output.write("\n");
      }
    },
    close: () => rl.close(),
  };
}

export function errorMessage(err: unknown): string {
  return toVendorError(err).message;
}

/**
 * Logs in or exits the process with code 1.
 */
export async function login(
  client: Emporia,
  credentials: Credentials
): Promise<Session> {
  try {
    const session = await firstValueFrom(client.authenticate$(credentials));
    console.log(`✅ Logged in as ${credentials.email}`);
    return session;
  } catch (err) {
    console.error(`❌ Login failed: ${errorMessage(err)}`);
    process.exit(1);
  }
}

const show = (value: unknown): string =>
  value === null || value === undefined ? "n/a" : String(value);

export function formatSnapshot(snapshot: DeviceSnapshot): string[] {
  const header = `${snapshot.name} (${snapshot.id})`;

  if (snapshot.kind === "vehicle") {
    return [
      header,
      `  battery:        ${show(snapshot.battery)}${
        typeof snapshot.battery === "number" ? "%" : ""
      }`,
      `  charging state: ${snapshot.chargingState}`,
    ];
  }

  return [
    header,
    `  status:         ${show(snapshot.status)}`,
    `  on:             ${show(snapshot.on)}`,
    `  message:        ${show(snapshot.message)}`,
    `  charging rate:  ${show(snapshot.chargingRate)} A`,
    `  power:          ${show(snapshot.powerKw)} kW${
      snapshot.powerIsEstimated ? " (estimated)" : ""
    }`,
  ];
}

export async function fetchVehicle(
  client: Emporia,
  session: Session,
  vehicle: DeviceListing
): Promise<MappingResult<VehicleSnapshot>> {
  const raw = await firstValueFrom(
    client.fetchVehicleStatus$(session, vehicle.gid)
  );
  return mapVehicle(raw, vehicle.name);
}

/**
 * Charger status plus the live sample for the same instant, when Emporia has
 * one.
 */
export async function fetchCharger(
  client: Emporia,
  session: Session,
  charger: DeviceListing,
  polling: IPollingConfig
): Promise<MappingResult<ChargerSnapshot> & { sample: UsageSample | null }> {
  const raw = await firstValueFrom(
    client.fetchChargerStatus$(session, charger.gid)
  );
  const sample = await firstValueFrom(
    client.fetchUsageSample$(session, charger.gid, raw.fetchedAt).pipe(
      catchError((err: unknown) => {
        console.warn(`  ⚠️  no live power: ${errorMessage(err)}`);
        return of(null);
      })
    ),
    { defaultValue: null }
  );

  return {
    ...mapCharger(raw, charger.name, sample, polling),
    sample,
  };
}
