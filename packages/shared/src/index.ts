/**
 * @snaplink/shared - Shared Package Exports
 *
 * Types, constants and utilities used by every other workspace:
 * the Base62 codec, the Snowflake code generator, input validation and
 * the timeout helper.
 *
 * ```ts
 * import { SnowflakeCodeGenerator, validateCustomAlias } from "@snaplink/shared";
 * ```
 */

// Types (AccessContext, ApiError, etc.)
export * from "./types/index.js";

// Utilities (code generation, validation, Base62 encoding)
export * from "./utils/index.js";

// Constants
export * from "./constants/index.js";
