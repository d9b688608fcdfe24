/**
 * Check if a required scope is covered by a single granted scope pattern.
 * Patterns:
 *   "*"          -> matches any scope
 *   "tags.*"     -> matches any scope starting with "tags."
 *   "tags.create" -> exact match only
 */
export function scopeMatchesPattern(requestedScope: string, grantPattern: string): boolean {
  if (grantPattern === '*') return true

  if (grantPattern.endsWith('.*')) {
    const prefix = grantPattern.slice(0, -1) // "tags." from "tags.*"
    return requestedScope.startsWith(prefix)
  }

  return requestedScope === grantPattern
}

/**
 * Check if a required scope is covered by ANY of the granted scope patterns.
 */
export function scopeCoveredByGrant(
  requestedScope: string,
  grantedScopes: readonly string[],
): boolean {
  return grantedScopes.some((pattern) => scopeMatchesPattern(requestedScope, pattern))
}

/**
 * True when no scope is required, or when at least one of the required
 * scopes is covered by the grant.
 */
export function anyScopeGranted(
  requiredScopes: readonly string[] | null,
  grantedScopes: readonly string[],
): boolean {
  if (requiredScopes === null || requiredScopes.length === 0) return true
  return requiredScopes.some((scope) => scopeCoveredByGrant(scope, grantedScopes))
}
