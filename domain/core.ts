/**
 * Domain core — role contracts and configuration shapes.
 * Framework-independent. No behavior.
 */

// --- Roles ---

/** Anything that answers name, description and needsSpare plays the part role. */
export interface PartRole {
  readonly name: string;
  readonly description: string;
  readonly needsSpare: boolean;
}

/** Anything that can count its parts and list those needing a spare. */
export interface PartsRole<T extends PartRole = PartRole> {
  spares(): T[];
  size(): number;
}

// --- Configuration ---

/** One configuration row: name, description, optional needsSpare (default true). */
export type ConfigRow = readonly [name: string, description: string, needsSpare?: boolean];

/** Ordered configuration table. Row order becomes part order. */
export type ConfigTable = readonly ConfigRow[];
