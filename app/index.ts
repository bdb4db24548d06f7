/**
 * Process entry — assemble the configured vehicle and log its spares.
 */

import { assembleVehicle, formatSpares } from "./assemble.js";
import { loadConfig } from "./config.js";

const config = loadConfig();

try {
  const vehicle = assembleVehicle(config);
  console.info(`Assembled ${config.vehicleConfig} vehicle`);
  for (const line of formatSpares(vehicle)) console.info(line);
} catch (err) {
  console.error(`Failed to assemble ${config.vehicleConfig} vehicle:`, err);
  throw err;
}
