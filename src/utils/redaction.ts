import { escapeRegExp } from './logger'

// Secrets shorter than this are not masked; they would match ordinary output text
export const MIN_SECRET_LENGTH = 4

/** Patterns for a secret value: the literal and its base64 form (registries echo auth headers). */
export function secretPatterns(val: string): RegExp[] {
  const patterns: RegExp[] = []
  if (val.length < MIN_SECRET_LENGTH) return patterns
  patterns.push(new RegExp(escapeRegExp(val), 'g'))
  const b64 = Buffer.from(val, 'utf8').toString('base64')
  if (b64.length >= 8) patterns.push(new RegExp(escapeRegExp(b64), 'g'))
  return patterns
}

/**
 * Redactors for every secret the run holds. `user:secret` pairs are also
 * covered in base64, which is how basic-auth headers carry them.
 */
export function computeRedactors(args: { readonly secrets: readonly string[]; readonly basicAuth?: readonly (readonly [string, string])[] }): RegExp[] {
  const patterns: RegExp[] = []
  for (const s of args.secrets) patterns.push(...secretPatterns(s))
  for (const [user, secret] of args.basicAuth ?? []) {
    if (secret.length < MIN_SECRET_LENGTH) continue
    const b64 = Buffer.from(`${user}:${secret}`, 'utf8').toString('base64')
    patterns.push(new RegExp(escapeRegExp(b64), 'g'))
  }
  return patterns
}

export function redact(s: string, patterns?: readonly RegExp[]): string {
  if (!patterns || patterns.length === 0) return s
  let out = s
  for (const re of patterns) out = out.replace(re, '***')
  return out
}
