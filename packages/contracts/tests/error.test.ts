import { describe, expect, it } from "vitest";
import { DungeonError } from "../src";

describe("DungeonError", () => {
  it("carries its code and details", () => {
    const error = new DungeonError("NO_REACHABLE_EXIT", "nothing reachable", { start: 12 });
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("DungeonError");
    expect(error.code).toBe("NO_REACHABLE_EXIT");
    expect(error.details).toEqual({ start: 12 });
  });

  it("serializes to JSON without a details key when there are none", () => {
    const error = new DungeonError("NOT_BUILT", "not built");
    expect(error.toJSON()).toEqual({
      name: "DungeonError",
      code: "NOT_BUILT",
      message: "not built",
    });
  });

  it("builds iteration limit errors with the loop and limit", () => {
    const error = DungeonError.iterationLimit("drunkard walkers", 100, { strategy: "maze" });
    expect(error.code).toBe("ITERATION_LIMIT_EXCEEDED");
    expect(error.message).toBe("drunkard walkers exceeded its limit of 100 iterations");
    expect(error.details).toEqual({ loop: "drunkard walkers", limit: 100, strategy: "maze" });
  });

  it("builds config and generation failures", () => {
    expect(DungeonError.configInvalid("bad").code).toBe("CONFIG_INVALID");
    expect(DungeonError.generationFailed("gave up").code).toBe("GENERATION_FAILED");
  });

  it("recognizes its own instances only", () => {
    expect(DungeonError.isDungeonError(new DungeonError("NOT_BUILT", "x"))).toBe(true);
    expect(DungeonError.isDungeonError(new Error("x"))).toBe(false);
    expect(DungeonError.isDungeonError("NOT_BUILT")).toBe(false);
  });

  it("flags only attempt-level failures as retryable", () => {
    const fatal = ["NO_ROOMS_PLACED", "NO_REACHABLE_EXIT", "START_NOT_FOUND", "ITERATION_LIMIT_EXCEEDED"] as const;
    for (const code of fatal) {
      expect(DungeonError.isFatalAttemptError(new DungeonError(code, code))).toBe(true);
    }

    const other = ["CONFIG_INVALID", "STRATEGY_NOT_FOUND", "SOLVER_RETRIES_EXHAUSTED", "GENERATION_FAILED"] as const;
    for (const code of other) {
      expect(DungeonError.isFatalAttemptError(new DungeonError(code, code))).toBe(false);
    }
    expect(DungeonError.isFatalAttemptError(new RangeError("x"))).toBe(false);
  });
});
