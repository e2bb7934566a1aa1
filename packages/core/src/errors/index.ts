export { ErrorCode, isRewindError, RewindError, type RewindErrorOptions, toError } from "./types.js";
