export { validateAssertion } from "./engine.js";
export type { ValidateContext, ValidationResult } from "./types.js";
export { NO_MANIFEST, failInfo, errorInfo, renderValue } from "./common.js";
export { BOTH_ATTRIBUTES_SET, NO_FAILED_DOCUMENT } from "./failed-template.js";
export { NO_SNAPSHOT_STORE } from "./snapshot.js";
export { errorMessage } from "./utils.js";
