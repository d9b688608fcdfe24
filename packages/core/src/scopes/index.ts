export { anyScopeGranted, scopeCoveredByGrant, scopeMatchesPattern } from './match.js'
export {
  ScopePatternSchema,
  ScopeSchema,
  formatScope,
  parseScope,
  type ParsedScope,
  type Scope,
} from './parse.js'
