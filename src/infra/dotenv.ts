import { config } from "dotenv";
import { resolve } from "node:path";
import { existsSync } from "node:fs";
import { createLogger } from "../logging.js";

const log = createLogger("dotenv");

/** Loads `.env` from the working directory without overriding real env vars. */
export function loadDotenv(dir?: string): boolean {
  const envPath = resolve(dir ?? process.cwd(), ".env");
  if (!existsSync(envPath)) {
    return false;
  }
  const result = config({ path: envPath, override: false });
  if (result.error) {
    log.warn(`Failed to parse ${envPath}: ${result.error.message}`);
    return false;
  }
  return true;
}
