/**
 * Environment Loading
 *
 * Loads `.env` files into process.env at startup with dotenv.
 * Variables already present in the environment take precedence.
 */

import { config } from "dotenv";
import { existsSync } from "fs";
import path from "path";

/**
 * Load `<cwd>/.env`, then `<configDir>/.env`. Returns the files that were read.
 */
export function loadCompanionEnv(cwd: string = process.cwd()): string[] {
  const loaded: string[] = [];
  const rootEnv = path.resolve(cwd, ".env");
  if (existsSync(rootEnv)) {
    config({ path: rootEnv });
    loaded.push(rootEnv);
  }

  const configDir = process.env.CONFIG_DIR || "Configurables";
  const configEnv = path.resolve(cwd, configDir, ".env");
  if (existsSync(configEnv)) {
    config({ path: configEnv });
    loaded.push(configEnv);
  }
  return loaded;
}
