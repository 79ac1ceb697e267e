/**
 * src/lib/region-table.ts
 *
 * Static assembly → parliamentary constituency mapping. The table is authored
 * grouped by region (region → boundary names) and inverted once at load into
 * a name → region index.
 */

import { DataIntegrityError } from '../utils/errors';
import { canonicalName } from '../utils/names';

export type RegionGroups = Readonly<Record<string, readonly string[]>>;

export class RegionTable {
  private readonly byName: Map<string, string>;
  // Fallback index tolerating case and reservation-suffix variants
  private readonly byCanonical: Map<string, string>;
  private readonly regionNames: string[];

  private constructor(byName: Map<string, string>, regionNames: string[]) {
    this.byName = byName;
    this.regionNames = regionNames;
    this.byCanonical = new Map();
    for (const [name, region] of byName) {
      const key = canonicalName(name);
      if (!this.byCanonical.has(key)) {
        this.byCanonical.set(key, region);
      }
    }
  }

  /**
   * @throws DataIntegrityError when a boundary name is listed under two regions
   */
  static fromGroups(groups: RegionGroups): RegionTable {
    const byName = new Map<string, string>();

    for (const [region, names] of Object.entries(groups)) {
      for (const rawName of names) {
        const name = rawName.trim();
        const existing = byName.get(name);
        if (existing !== undefined) {
          throw new DataIntegrityError(
            `Boundary "${name}" is mapped to both "${existing}" and "${region}"`
          );
        }
        byName.set(name, region);
      }
    }

    return new RegionTable(byName, Object.keys(groups));
  }

  /** Parent region of a boundary, or null when the table has no entry for it. */
  regionFor(boundaryName: string): string | null {
    const name = boundaryName.trim();
    return this.byName.get(name) ?? this.byCanonical.get(canonicalName(name)) ?? null;
  }

  regions(): string[] {
    return [...this.regionNames];
  }

  boundaryNames(): string[] {
    return [...this.byName.keys()];
  }

  get size(): number {
    return this.byName.size;
  }
}
