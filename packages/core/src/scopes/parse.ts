import { z } from 'zod'

const SEGMENT_RE = /^[a-z][a-z0-9_]*$/

/** An API scope: `{module}.{subject}`, e.g. `tags.create`. */
export const ScopeSchema = z.string().refine(
  (s) => {
    const parts = s.split('.')
    return parts.length === 2 && parts.every((p) => SEGMENT_RE.test(p))
  },
  {
    message: 'Scope must be {module}.{subject} with lowercase alphanumeric segments',
  },
)

/** A scope or a grant pattern: `*`, `{module}.*` or a concrete scope. */
export const ScopePatternSchema = z.string().refine(
  (s) => {
    if (s === '*') return true
    const [module, subject, ...rest] = s.split('.')
    return (
      rest.length === 0 &&
      SEGMENT_RE.test(module) &&
      subject !== undefined &&
      (subject === '*' || SEGMENT_RE.test(subject))
    )
  },
  { message: 'Scope pattern must be *, {module}.* or {module}.{subject}' },
)

export type Scope = z.infer<typeof ScopeSchema>

export interface ParsedScope {
  module: string
  subject: string
  raw: string
}

export function parseScope(scope: string): ParsedScope {
  const validated = ScopeSchema.parse(scope)
  const [module, subject] = validated.split('.')
  return { module, subject, raw: validated }
}

export function formatScope(module: string, subject: string): string {
  return `${module}.${subject}`
}
