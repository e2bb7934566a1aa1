import { describe, expect, it } from "vitest";
import { inferCategory } from "../category.js";
import { ErrorCode } from "../codes.js";

describe("inferCategory", () => {
  it("should treat a missing repository as expected absence", () => {
    expect(inferCategory(ErrorCode.REPO_NOT_FOUND)).toBe("absence");
  });

  it("should treat unusable storage as an environment error", () => {
    expect(inferCategory(ErrorCode.WORKDIR_UNAVAILABLE)).toBe("environment");
    expect(inferCategory(ErrorCode.REPO_OPEN_FAILED)).toBe("environment");
  });

  it("should reserve fatal-sync for a rejected forced push", () => {
    expect(inferCategory(ErrorCode.PUSH_FAILED)).toBe("fatal-sync");
  });

  it("should default repository actions to operation failures", () => {
    expect(inferCategory(ErrorCode.STAGE_FAILED)).toBe("operation");
    expect(inferCategory(ErrorCode.RESET_FAILED)).toBe("operation");
    expect(inferCategory(ErrorCode.CHECKPOINT_NOT_FOUND)).toBe("operation");
  });
});
