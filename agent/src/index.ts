/**
 * Companion Entry Point
 *
 * Loads the environment and settings, starts logging, then hands over to
 * the bootstrap. Exits 0 on SIGINT/SIGTERM or when the terminal closes,
 * 1 on a fatal startup error.
 */

import { loadCompanionEnv } from "./core/env.js";
import { loadSettings, validateSettings } from "./core/config.js";
import { createComponentLogger, initAgentLogging } from "./logging.js";
import { createCompanion, type Companion } from "./app.js";

const log = createComponentLogger("main");

function handleSignals(companion: Companion): void {
  const onSignal = (signal: string) => {
    log.info(`Received ${signal}; shutting down`);
    companion
      .shutdown()
      .then(() => process.exit(0))
      .catch(err => {
        log.error("Shutdown failed", err);
        process.exit(1);
      });
  };
  process.once("SIGINT", () => onSignal("SIGINT"));
  process.once("SIGTERM", () => onSignal("SIGTERM"));
}

async function main(): Promise<void> {
  const envFiles = loadCompanionEnv();
  const settings = loadSettings();
  initAgentLogging();
  log.debug("Environment loaded", { files: envFiles });
  validateSettings(settings);

  const companion = await createCompanion(settings);
  handleSignals(companion);

  await companion.run();
  await companion.shutdown();
  process.exit(0);
}

main().catch(err => {
  log.fatal("Companion failed to start", err);
  process.exit(1);
});
