/**
 * Assemble a vehicle from the catalog. No I/O.
 */

import { getVehicleConfig } from "../domain/catalog.js";
import type { PartRole } from "../domain/core.js";
import type { Part } from "../domain/part.js";
import { build } from "../domain/partsFactory.js";
import { Vehicle } from "../domain/vehicle.js";
import type { AppConfig } from "./config.js";

export function assembleVehicle(config: AppConfig): Vehicle<Part> {
  const parts = build(getVehicleConfig(config.vehicleConfig));
  return new Vehicle({ size: config.vehicleSize, parts });
}

/** Summary line followed by one "<name>: <description>" line per spare. */
export function formatSpares<T extends PartRole>(vehicle: Vehicle<T>): string[] {
  const spares = vehicle.spares();
  return [
    `size ${vehicle.sizeLabel()}, ${vehicle.parts.size()} parts, ${spares.length} spares`,
    ...spares.map((part) => `${part.name}: ${part.description}`),
  ];
}
