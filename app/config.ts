/**
 * App configuration — read from the environment once, with defaults.
 */

export interface AppConfig {
  /** Catalog name of the vehicle to assemble. */
  readonly vehicleConfig: string;
  readonly vehicleSize: string;
}

const DEFAULT_VEHICLE_CONFIG = "road";
const DEFAULT_VEHICLE_SIZE = "L";

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    vehicleConfig: env.VEHICLE_CONFIG ?? DEFAULT_VEHICLE_CONFIG,
    vehicleSize: env.VEHICLE_SIZE ?? DEFAULT_VEHICLE_SIZE,
  };
}
