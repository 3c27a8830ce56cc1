/**
 * Shared Utility Functions
 */

// Base62 codec
export { encodeBase62, decodeBase62, isBase62 } from "./base62.js";

// Code generation
export {
  SnowflakeCodeGenerator,
  RecentCodes,
  deriveMachineId,
  composeSnowflake,
  parseSnowflakeCode,
} from "./snowflake.js";
export type { CodeGenerator, SnowflakeOptions, SnowflakeParts } from "./snowflake.js";

// Validation
export {
  validateCustomAlias,
  validateOriginalUrl,
  validateExpiry,
  validateMetadata,
  isPrivateHost,
} from "./validation.js";
export type { ValidationResult } from "./validation.js";

// Timeouts
export { withTimeout, TimeoutError } from "./timeout.js";
