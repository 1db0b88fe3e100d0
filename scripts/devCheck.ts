/**
 * Logs in with EMPORIA_EMAIL / EMPORIA_PASSWORD, lists vehicles and chargers
 * and prints the snapshots the bridge would publish. Nothing is sent to MQTT.
 *
 * Usage:
 *   EMPORIA_EMAIL=... EMPORIA_PASSWORD=... npm run dev-check
 */

import { firstValueFrom } from "rxjs";
import { loadRootConfig } from "../src/services/Config";
import Emporia from "../src/services/Emporia";
import type { MappingAnomaly } from "../src/vehiclevue/types";
import {
  credentialsFromEnv,
  errorMessage,
  fetchCharger,
  fetchVehicle,
  formatSnapshot,
  login,
} from "./shared";

function printAnomalies(anomalies: MappingAnomaly[]) {
  for (const anomaly of anomalies) {
    console.warn(
      `  ⚠️  ${anomaly.field} unusable (${anomaly.reason}): ${JSON.stringify(
        anomaly.value
      )}`
    );
  }
}

async function main() {
  const credentials = credentialsFromEnv(process.env);
  if (!credentials) {
    console.error("❌ EMPORIA_EMAIL and EMPORIA_PASSWORD must be set");
    process.exit(1);
  }

  const config = loadRootConfig();
  const client = new Emporia(config.emporia);
  const session = await login(client, credentials);

  console.log();
  console.log("Vehicles");
  console.log("=".repeat(40));
  const vehicles = await firstValueFrom(client.listVehicles$(session));
  if (vehicles.length === 0) {
    console.log("(none)");
  }

  for (const vehicle of vehicles) {
    try {
      const { snapshot, anomalies } = await fetchVehicle(
        client,
        session,
        vehicle
      );
      console.log(formatSnapshot(snapshot).join("\n"));
      printAnomalies(anomalies);
    } catch (err) {
      console.error(`❌ ${vehicle.name}: ${errorMessage(err)}`);
    }
  }

  console.log();
  console.log("Chargers");
  console.log("=".repeat(40));
  const chargers = await firstValueFrom(client.listChargers$(session));
  if (chargers.length === 0) {
    console.log("(none)");
  }

  for (const charger of chargers) {
    try {
      const { snapshot, anomalies } = await fetchCharger(
        client,
        session,
        charger,
        config.polling
      );
      console.log(formatSnapshot(snapshot).join("\n"));
      printAnomalies(anomalies);
    } catch (err) {
      console.error(`❌ ${charger.name}: ${errorMessage(err)}`);
    }
  }
}

main().catch((err: unknown) => {
  console.error(`❌ ${errorMessage(err)}`);
  process.exit(1);
});
