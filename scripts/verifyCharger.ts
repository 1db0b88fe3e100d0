/**
 * Asks for Emporia credentials and prints what each charger reports, next to
 * the power the bridge would estimate from its amps. EMPORIA_EMAIL and
 * EMPORIA_PASSWORD skip the questions when set.
 *
 * Usage:
 *   npm run verify-charger
 */

import { firstValueFrom } from "rxjs";
import { loadRootConfig } from "../src/services/Config";
import Emporia from "../src/services/Emporia";
import { estimatePower } from "../src/vehiclevue/estimatePower";
import { createPrompt, errorMessage, fetchCharger, login } from "./shared";

async function main() {
  const prompt = createPrompt();
  const email =
    process.env.EMPORIA_EMAIL?.trim() || (await prompt.ask("Emporia email: "));
  const password =
    process.env.EMPORIA_PASSWORD ||
    (await prompt.askHidden("Emporia password: "));
  prompt.close();

  if (!email || !password) {
    console.error("❌ Email and password are required");
    process.exit(1);
  }

  const config = loadRootConfig();
  const { assumedVoltage, phase } = config.polling;
  const client = new Emporia(config.emporia);
  const session = await login(client, { email, password });

  const chargers = await firstValueFrom(client.listChargers$(session));
  console.log(`\nFound ${chargers.length} charger(s)`);

  for (const charger of chargers) {
    console.log(`\n${charger.name} (gid ${charger.gid})`);

    try {
      const { snapshot, sample } = await fetchCharger(
        client,
        session,
        charger,
        config.polling
      );
      const amps = snapshot.chargingRate;

      console.log(`  status:          ${snapshot.status}`);
      console.log(`  message:         ${snapshot.message}`);
      console.log(`  amps:            ${amps}`);
      console.log(
        `  estimated power: ${
          amps === "unknown"
            ? "n/a"
            : `${estimatePower(amps, assumedVoltage, phase)} kW at ${assumedVoltage} V (${phase})`
        }`
      );
      console.log(`  live power:      ${sample ? `${sample.kw} kW` : "n/a"}`);
    } catch (err) {
      console.error(`  ❌ ${errorMessage(err)}`);
    }
  }
}

main().catch((err: unknown) => {
  console.error(`❌ ${errorMessage(err)}`);
  process.exit(1);
});
