/**
 * @snaplink/core - Short URL domain
 *
 * Event-sourced ShortUrl aggregate, the write-side service, the redirect
 * resolver and the background access recorder.
 *
 * ```ts
 * import { ShortUrlService, ShortUrlResolver, AccessRecorder } from "@snaplink/core";
 * ```
 */

export * from "./events.js";
export * from "./state.js";
export * from "./aggregate.js";
export * from "./errors.js";
export * from "./ports.js";
export * from "./access-recorder.js";
export * from "./service.js";
export * from "./resolver.js";
export * from "./expiry-sweeper.js";
export * from "./adapters/memory.js";
