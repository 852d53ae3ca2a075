// ---------------------------------------------------------------------------
// The admissible category labels, as fetched from the categories table.
// ---------------------------------------------------------------------------

import type { CategoryLabel } from "../../core/types.js";

/** Field names tried, in order, for a category's display name. */
const NAME_FIELDS = ["Name", "name", "Category", "category"] as const;
const DESCRIPTION_FIELDS = ["Description", "description"] as const;

export interface CategoryRow {
  id: number;
  [field: string]: unknown;
}

function firstString(row: CategoryRow, fields: readonly string[]): string | null {
  for (const field of fields) {
    const value = row[field];
    if (typeof value === "string" && value.trim().length > 0) return value.trim();
  }
  return null;
}

/** `null` when the row has no usable name. */
export function labelFromRow(row: CategoryRow): CategoryLabel | null {
  const name = firstString(row, NAME_FIELDS);
  if (!name) return null;
  return Object.freeze({
    id: row.id,
    name,
    description: firstString(row, DESCRIPTION_FIELDS),
  });
}

/**
 * A fixed, immutable set of labels keyed by id and indexed by exact name.
 * Built once per invocation and passed by value to whoever validates
 * label choices.
 */
export class CategorySet {
  private readonly byId: ReadonlyMap<number, CategoryLabel>;
  private readonly byName: ReadonlyMap<string, CategoryLabel>;

  constructor(labels: readonly CategoryLabel[]) {
    const byId = new Map<number, CategoryLabel>();
    const byName = new Map<string, CategoryLabel>();
    for (const label of labels) {
      if (byId.has(label.id)) continue;
      byId.set(label.id, label);
      // First row wins when two rows share a name.
      if (!byName.has(label.name)) byName.set(label.name, label);
    }
    this.byId = byId;
    this.byName = byName;
  }

  static fromRows(rows: readonly CategoryRow[]): CategorySet {
    return new CategorySet(
      rows.map(labelFromRow).filter((l): l is CategoryLabel => l !== null),
    );
  }

  get size(): number {
    return this.byId.size;
  }

  /** Names in table order, one per distinct name. */
  names(): string[] {
    return [...this.byName.keys()];
  }

  /** Exact, case-sensitive lookup. */
  findByName(name: string): CategoryLabel | undefined {
    return this.byName.get(name);
  }

  /** True when `label` is the very entry held under its id. */
  contains(label: CategoryLabel): boolean {
    const held = this.byId.get(label.id);
    return held !== undefined && held.name === label.name;
  }
}
