import * as dotenv from "dotenv";

// stdout is the client connection in bridge mode, so dotenv must stay silent.
dotenv.config({ quiet: true });

const DEFAULT_MAX_BODY_BYTES = 1048576;

/**
 * Read a non-negative integer setting; anything that is not all digits keeps the fallback.
 */
export function integerSetting(raw: string | undefined, fallback: number): number {
  const trimmed = raw?.trim();
  if (!trimmed || !/^\d+$/.test(trimmed)) {
    return fallback;
  }
  return Number.parseInt(trimmed, 10);
}

/**
 * Environment-derived defaults. Everything else comes from the INI configuration file.
 */
export const ENV = {
  CONFIG_PATH: process.env.BUILD_BRIDGE_CONFIG ?? "/etc/build-bridge.ini",
  LOG_LEVEL: process.env.BUILD_BRIDGE_LOG_LEVEL ?? "info",
  MAX_BODY_BYTES: integerSetting(process.env.BUILD_BRIDGE_MAX_BODY_BYTES, DEFAULT_MAX_BODY_BYTES)
} as const;
