/**
 * Bot Detection
 *
 * User-Agent pattern matching. Bot accesses are still counted on the short
 * URL; the flag lets the worker skip or mark them in `access_log`.
 *
 * False positives are accepted: curl, wget and HTTP libraries are bots here.
 */

import patterns from "./bot-patterns.json";
import type { BotDetectionResult } from "./types.js";

const BOT_USER_AGENT_PATTERNS: readonly RegExp[] = patterns.known.map((source) => new RegExp(source, "i"));

const SUSPICIOUS_USER_AGENT_PATTERNS: readonly RegExp[] = patterns.suspicious.map(
  (source) => new RegExp(source, "i")
);

/**
 * Detect if a request is from a bot
 *
 * Detection priority:
 * 1. Missing User-Agent → likely bot (confidence: 0.9)
 * 2. Known bot pattern → bot (confidence: 0.95)
 * 3. Suspicious User-Agent → maybe bot (confidence: 0.6)
 */
export function detectBot(userAgent: string | undefined): BotDetectionResult {
  if (!userAgent || userAgent.trim() === "") {
    return { isBot: true, reason: "missing_user_agent", confidence: 0.9 };
  }

  if (BOT_USER_AGENT_PATTERNS.some((pattern) => pattern.test(userAgent))) {
    return { isBot: true, reason: "user_agent_pattern", confidence: 0.95 };
  }

  if (SUSPICIOUS_USER_AGENT_PATTERNS.some((pattern) => pattern.test(userAgent))) {
    return { isBot: true, reason: "suspicious_headers", confidence: 0.6 };
  }

  return { isBot: false, confidence: 0 };
}

/**
 * Quick check if User-Agent matches a known bot pattern
 */
export function isKnownBot(userAgent: string | undefined): boolean {
  if (!userAgent) return true;
  return BOT_USER_AGENT_PATTERNS.some((pattern) => pattern.test(userAgent));
}
