/**
 * Runtime role checks. A value plays a role when it answers the role's
 * messages, whatever its class.
 */

import type { PartRole, PartsRole } from "./core.js";

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/** True when value exposes string name, string description and boolean needsSpare. */
export function isPartRole(value: unknown): value is PartRole {
  return (
    isObject(value) &&
    typeof value.name === "string" &&
    typeof value.description === "string" &&
    typeof value.needsSpare === "boolean"
  );
}

/** True when value exposes callable spares() and size(). */
export function isPartsRole(value: unknown): value is PartsRole {
  return isObject(value) && typeof value.spares === "function" && typeof value.size === "function";
}
