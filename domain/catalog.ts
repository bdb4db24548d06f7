/**
 * Vehicle configuration catalog and validation of untyped config input.
 */

import type { ConfigRow, ConfigTable } from "./core.js";
import {
  InvalidArgumentError,
  MalformedRowError,
  NotFoundError,
  ValidationError,
} from "./errors.js";

export const ROAD_CONFIG: ConfigTable = [
  ["chain", "10-speed"],
  ["tire_size", "23"],
  ["tape_color", "red"],
];

export const MOUNTAIN_CONFIG: ConfigTable = [
  ["chain", "10-speed"],
  ["tire_size", "2.1"],
  ["front_shock", "Manitou", false],
  ["rear_shock", "Fox"],
];

export const RECUMBENT_CONFIG: ConfigTable = [
  ["chain", "9-speed"],
  ["tire_size", "28"],
  ["flag", "tall and orange"],
];

const CATALOG: ReadonlyMap<string, ConfigTable> = new Map([
  ["road", ROAD_CONFIG],
  ["mountain", MOUNTAIN_CONFIG],
  ["recumbent", RECUMBENT_CONFIG],
]);

/** Names of all catalog entries, in declaration order. */
export function listVehicleConfigs(): string[] {
  return [...CATALOG.keys()];
}

/** Look up a named config. Throws NotFoundError for unknown names. */
export function getVehicleConfig(name: string): ConfigTable {
  const config = CATALOG.get(name);
  if (config === undefined) {
    throw new NotFoundError(`Unknown vehicle config: ${name}`, {
      name,
      known: listVehicleConfigs(),
    });
  }
  return config;
}

function parseRow(raw: unknown, rowIndex: number): ConfigRow {
  if (!Array.isArray(raw) || raw.length < 2) throw new MalformedRowError(rowIndex);
  const [name, description, needsSpare]: unknown[] = raw;
  if (typeof name !== "string") {
    throw new ValidationError(`Row ${rowIndex}: name must be a string`, { rowIndex });
  }
  if (typeof description !== "string") {
    throw new ValidationError(`Row ${rowIndex}: description must be a string`, { rowIndex });
  }
  if (raw.length < 3) return [name, description];
  if (typeof needsSpare !== "boolean") {
    throw new ValidationError(`Row ${rowIndex}: needsSpare must be a boolean`, { rowIndex });
  }
  return [name, description, needsSpare];
}

/** Validate untyped input (e.g. decoded JSON) into a config table. */
export function parseConfigTable(raw: unknown): ConfigTable {
  if (!Array.isArray(raw)) {
    throw new InvalidArgumentError("Config table must be an array of rows", {
      received: raw === null ? "null" : typeof raw,
    });
  }
  return raw.map((row: unknown, index) => parseRow(row, index));
}
