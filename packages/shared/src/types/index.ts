/**
 * Shared Type Definitions
 */

// =============================================================================
// Access Types
// =============================================================================

/**
 * Coarse location of a visitor, as far as the edge tells us.
 */
export interface GeoLocation {
  /** ISO 3166-1 alpha-2 country code */
  country?: string;
  region?: string;
  city?: string;
}

export type DeviceType = "desktop" | "mobile" | "tablet" | "bot" | "unknown";

/**
 * Device information parsed from a User-Agent header
 */
export interface DeviceInfo {
  type: DeviceType;
  browser?: string;
  os?: string;
}

/**
 * Everything we know about one visit to a short URL.
 * All fields are optional: a redirect must work without any of them.
 */
export interface AccessContext {
  ipAddress?: string;
  userAgent?: string;
  referrer?: string;
  geo?: GeoLocation;
  device?: DeviceInfo;
}

// =============================================================================
// API Response Types
// =============================================================================

/**
 * Standard API error response
 */
export interface ApiError {
  success: false;
  error: string;
  errorCode: string;
  details?: Record<string, string[]>;
}

// =============================================================================
// Service Health Types
// =============================================================================

export type DependencyStatus = "ok" | "error";

/**
 * Readiness probe response
 */
export interface ReadinessResponse {
  status: "ok" | "degraded" | "unhealthy";
  checks: {
    store: DependencyStatus;
    cache: DependencyStatus;
  };
}
