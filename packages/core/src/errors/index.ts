export * from "./errors.js";
export { isTransientError, isAbortError, errorMessage } from "./classify.js";
