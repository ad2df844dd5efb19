/**
 * Level configuration resolution
 */

import {
  DungeonError,
  type LevelConfig,
  type LevelConfigInput,
  LevelConfigSchema,
} from "@descent/contracts";
import { getStrategyEntry } from "./generators/registry";

/**
 * Parse caller input into a complete config.
 *
 * @throws DungeonError CONFIG_INVALID with the zod issues in `details`
 * @throws DungeonError STRATEGY_NOT_FOUND for an unregistered strategy id
 */
export function resolveLevelConfig(input: LevelConfigInput = {}): LevelConfig {
  const parsed = LevelConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.map(String).join("."),
      message: issue.message,
    }));
    throw DungeonError.configInvalid(
      `Invalid level configuration: ${issues.map((i) => `${i.path || "(root)"}: ${i.message}`).join("; ")}`,
      { issues },
    );
  }

  if (parsed.data.strategy !== undefined) {
    getStrategyEntry(parsed.data.strategy);
  }
  return parsed.data;
}
