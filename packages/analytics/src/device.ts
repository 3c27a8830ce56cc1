/**
 * Device parsing from the User-Agent header.
 *
 * Coarse on purpose: device class, browser family and OS family. Order of the
 * checks matters, since Edge and Opera also claim Chrome and Safari.
 */

import type { DeviceInfo, DeviceType } from "@snaplink/shared";
import { isKnownBot } from "./bot-detection.js";

const BROWSERS: ReadonlyArray<[RegExp, string]> = [
  [/edg(e|a|ios)?\//i, "Edge"],
  [/opr\/|opera/i, "Opera"],
  [/samsungbrowser/i, "Samsung Internet"],
  [/firefox|fxios/i, "Firefox"],
  [/chrome|crios/i, "Chrome"],
  [/version\/[\d.]+.*safari/i, "Safari"],
];

const OPERATING_SYSTEMS: ReadonlyArray<[RegExp, string]> = [
  [/windows/i, "Windows"],
  [/iphone|ipad|ipod/i, "iOS"],
  [/android/i, "Android"],
  [/\bCrOS\b/, "ChromeOS"],
  [/mac os x|macintosh/i, "macOS"],
  [/linux/i, "Linux"],
];

function firstMatch(table: ReadonlyArray<[RegExp, string]>, userAgent: string): string | undefined {
  return table.find(([pattern]) => pattern.test(userAgent))?.[1];
}

function deviceType(userAgent: string): DeviceType {
  if (isKnownBot(userAgent)) return "bot";
  if (/ipad|tablet|kindle|silk/i.test(userAgent) || (/android/i.test(userAgent) && !/mobile/i.test(userAgent))) {
    return "tablet";
  }
  if (/mobi|iphone|ipod|android|windows phone/i.test(userAgent)) return "mobile";
  if (/windows|macintosh|mac os x|linux/i.test(userAgent) || /\bCrOS\b/.test(userAgent)) return "desktop";
  return "unknown";
}

export function parseDevice(userAgent: string | undefined): DeviceInfo {
  if (!userAgent || userAgent.trim() === "") {
    return { type: "unknown" };
  }

  const info: DeviceInfo = { type: deviceType(userAgent) };
  const browser = firstMatch(BROWSERS, userAgent);
  const os = firstMatch(OPERATING_SYSTEMS, userAgent);
  if (browser) info.browser = browser;
  if (os) info.os = os;
  return info;
}
