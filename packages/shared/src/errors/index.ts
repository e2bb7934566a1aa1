export { type ErrorCategory, inferCategory } from "./category.js";
export { ErrorCode } from "./codes.js";
