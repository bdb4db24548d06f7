/**
 * Vehicle — composed of an injected parts collection.
 * Never builds its own parts; spares are delegated.
 */

import type { PartRole, PartsRole } from "./core.js";
import { InvalidArgumentError, MissingFieldError } from "./errors.js";
import { isPartsRole } from "./roles.js";

export interface VehicleFields<T extends PartRole> {
  readonly size?: string;
  readonly parts?: PartsRole<T>;
}

export class Vehicle<T extends PartRole = PartRole> {
  readonly size: string;
  readonly parts: PartsRole<T>;

  constructor(fields: VehicleFields<T>) {
    if (fields.size === undefined) throw new MissingFieldError("size");
    if (fields.parts === undefined) throw new MissingFieldError("parts", { size: fields.size });
    if (!isPartsRole(fields.parts)) {
      throw new InvalidArgumentError("parts must respond to spares() and size()", {
        size: fields.size,
      });
    }
    this.size = fields.size;
    this.parts = fields.parts;
    Object.freeze(this);
  }

  /** Same result as parts.spares(). */
  spares(): T[] {
    return this.parts.spares();
  }

  sizeLabel(): string {
    return this.size;
  }
}
