/**
 * Depth-weighted spawn table.
 */

import type { RandomSource } from "@descent/contracts";

export interface RandomTableEntry {
  readonly name: string;
  readonly weight: number;
}

/**
 * Weighted list of entity kinds. Entries with a weight of zero or less
 * are dropped when added.
 */
export class RandomTable {
  private readonly entries: RandomTableEntry[] = [];
  private totalWeight = 0;

  add(name: string, weight: number): this {
    if (weight > 0) {
      this.entries.push({ name, weight });
      this.totalWeight += weight;
    }
    return this;
  }

  get total(): number {
    return this.totalWeight;
  }

  list(): readonly RandomTableEntry[] {
    return this.entries;
  }

  /**
   * Draw one entry with probability proportional to its weight.
   * Returns undefined for an empty table without consuming a roll.
   */
  roll(rng: RandomSource): string | undefined {
    if (this.totalWeight === 0) return undefined;

    let remaining = rng.rollDice(1, this.totalWeight) - 1;
    for (const entry of this.entries) {
      if (remaining < entry.weight) return entry.name;
      remaining -= entry.weight;
    }
    return undefined;
  }
}

/**
 * What may appear in a room or region at `depth`. Monsters and better
 * gear grow more likely the deeper the level.
 */
export function roomTable(depth: number): RandomTable {
  return new RandomTable()
    .add("Goblin", 10)
    .add("Orc", 1 + depth)
    .add("Health Potion", 7)
    .add("Fireball Scroll", 2 + depth)
    .add("Confusion Scroll", 2 + depth)
    .add("Magic Missile Scroll", 4)
    .add("Dagger", 3)
    .add("Shield", 3)
    .add("Longsword", depth - 1)
    .add("Tower Shield", depth - 1)
    .add("Rations", 10)
    .add("Magic Mapping Scroll", 2)
    .add("Bear Trap", 2);
}
