import { describe, expect, it } from "vitest";
import { buildMazeConfig } from "../src";

describe("buildMazeConfig", () => {
  it("applies defaults for goal, minValidPaths and algorithm", () => {
    const res = buildMazeConfig({ size: 10, seed: 7, start: [1, 1] });
    if (!res.success) throw new Error("unexpected error");
    expect(res.value.goal).toEqual([8, 8]);
    expect(res.value.minValidPaths).toBe(3);
    expect(res.value.algorithm).toBe("bfs");
  });

  it("keeps an explicit goal", () => {
    const res = buildMazeConfig({ size: 6, seed: 1, start: [0, 0], goal: [5, 5] });
    expect(res.getOrThrow().goal).toEqual([5, 5]);
  });

  it("wraps schema failures in a CONFIG_INVALID error", () => {
    const res = buildMazeConfig({ size: 3, seed: 1, start: [0, 0] });
    expect(res.isErr()).toBe(true);
    expect(res.error.code).toBe("CONFIG_INVALID");
    expect(res.error.details).toEqual({
      issues: [{ path: "size", message: "size must be at least 4" }],
    });
  });

  it("reports out-of-bounds endpoints by field", () => {
    const res = buildMazeConfig({ size: 4, seed: 1, start: [0, 0], goal: [4, 4] });
    expect(res.isErr()).toBe(true);
    expect(res.error.details).toEqual({
      issues: [{ path: "goal", message: "goal (4, 4) is outside a 4x4 maze" }],
    });
  });
});
