import { describe, expect, it } from "vitest";
import { ErrorCode, isRewindError, RewindError, toError } from "../types.js";

describe("RewindError", () => {
  it("should carry code, context and cause", () => {
    const cause = new Error("fatal: bad object");
    const error = new RewindError("Failed to reset", ErrorCode.RESET_FAILED, {
      cause,
      context: { identifier: "abc1234" },
    });

    expect(error.name).toBe("RewindError");
    expect(error.code).toBe(ErrorCode.RESET_FAILED);
    expect(error.context).toEqual({ identifier: "abc1234" });
    expect(error.cause).toBe(cause);
  });

  it("should infer its category from the code", () => {
    expect(new RewindError("x", ErrorCode.REPO_NOT_FOUND).category).toBe("absence");
    expect(new RewindError("x", ErrorCode.PUSH_FAILED).category).toBe("fatal-sync");
    expect(new RewindError("x", ErrorCode.COMMIT_FAILED).category).toBe("operation");
  });

  it("should serialize the cause message", () => {
    const error = new RewindError("Failed to stage changes", ErrorCode.STAGE_FAILED, {
      cause: new Error("index.lock exists"),
    });

    expect(error.toJSON()).toEqual({
      name: "RewindError",
      message: "Failed to stage changes",
      code: ErrorCode.STAGE_FAILED,
      category: "operation",
      context: undefined,
      cause: "index.lock exists",
    });
  });
});

describe("isRewindError", () => {
  it("should distinguish RewindError from plain errors", () => {
    expect(isRewindError(new RewindError("x", ErrorCode.UNKNOWN))).toBe(true);
    expect(isRewindError(new Error("x"))).toBe(false);
  });
});

describe("toError", () => {
  it("should keep Error instances and wrap anything else", () => {
    const error = new Error("kept");
    expect(toError(error)).toBe(error);
    expect(toError(42).message).toBe("42");
  });
});
