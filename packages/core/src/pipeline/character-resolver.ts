// ============================================
// Character Name Resolution
// ============================================

import type { Logger } from "../logger/index.js";

const PARENTHETICAL = /\s*\([^)]*\)\s*/g;

/**
 * Maps loosely written character names from an outline ("Mira (the smith)",
 * "captain Oren") onto the registered cast.
 *
 * Matching is case-insensitive and tried in this order:
 * 1. exact name
 * 2. a registered name contained in the planned name (longest wins)
 * 3. the planned name contained in a registered name
 * 4. the planned name with parentheticals removed, matched exactly
 */
export class CharacterResolver {
  private readonly byKey: Map<string, string>;

  constructor(
    cast: readonly string[],
    private readonly logger?: Logger
  ) {
    this.byKey = new Map(cast.map((name) => [name.trim().toLowerCase(), name]));
  }

  resolve(planned: string): string | undefined {
    const key = planned.trim().toLowerCase();
    if (key.length === 0) {
      return undefined;
    }

    const exact = this.byKey.get(key);
    if (exact !== undefined) {
      return exact;
    }

    let best: string | undefined;
    let bestLength = 0;
    for (const [candidate, name] of this.byKey) {
      if (key.includes(candidate) && candidate.length > bestLength) {
        best = name;
        bestLength = candidate.length;
      }
    }
    if (best !== undefined) {
      return best;
    }

    for (const [candidate, name] of this.byKey) {
      if (candidate.includes(key)) {
        return name;
      }
    }

    const stripped = key.replace(PARENTHETICAL, " ").trim();
    return stripped === key ? undefined : this.byKey.get(stripped);
  }

  /**
   * Resolve a list, dropping unknown names and duplicates. Order follows the
   * first mention.
   */
  resolveAll(planned: readonly string[]): string[] {
    const resolved: string[] = [];
    for (const name of planned) {
      const match = this.resolve(name);
      if (match === undefined) {
        this.logger?.warn(`Unknown character "${name}" dropped`);
        continue;
      }
      if (!resolved.includes(match)) {
        resolved.push(match);
      }
    }
    return resolved;
  }
}
