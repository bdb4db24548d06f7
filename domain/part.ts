/**
 * Part — a single replaceable component. Value object, no behavior.
 */

import type { PartRole } from "./core.js";
import { MissingFieldError } from "./errors.js";

/** Construction fields. needsSpare defaults to true when absent. */
export interface PartFields {
  readonly name?: string;
  readonly description?: string;
  readonly needsSpare?: boolean;
}

export class Part implements PartRole {
  readonly name: string;
  readonly description: string;
  readonly needsSpare: boolean;

  constructor(fields: PartFields) {
    if (fields.name === undefined) throw new MissingFieldError("name");
    if (fields.description === undefined) {
      throw new MissingFieldError("description", { name: fields.name });
    }
    this.name = fields.name;
    this.description = fields.description;
    this.needsSpare = fields.needsSpare ?? true;
    Object.freeze(this);
  }
}

/** Create a Part. Throws MissingFieldError when name or description is absent. */
export function createPart(fields: PartFields): Part {
  return new Part(fields);
}
