const SENSITIVE_PATTERNS: Array<{ pattern: RegExp; replacement: string }> = [
  { pattern: /Bearer\s+[A-Za-z0-9._~+/=-]{20,}/gi, replacement: 'Bearer ***' },
  { pattern: /Authorization:\s*[^\s]+(\s+[^\s]+)?/gi, replacement: 'Authorization: ***' },

  // OAuth fields, both form encoded and JSON
  {
    pattern: /\b(access_token|refresh_token|id_token|client_secret|password)=[^&\s]+/gi,
    replacement: '$1=***'
  },
  {
    pattern: /"(access_token|refresh_token|id_token|client_secret|password)"\s*:\s*"[^"]*"/gi,
    replacement: '"$1":"***"'
  },

  // Preserve domain for debugging
  {
    pattern: /([A-Za-z0-9._%+-]+)@([A-Za-z0-9.-]+\.[A-Za-z]{2,})/gi,
    replacement: '***@$2'
  },

  // JWTs outside an Authorization header
  { pattern: /\beyJ[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+/g, replacement: '***' }
]

export function sanitizeMessage(message: string): string {
  if (!message || typeof message !== 'string') {
    return message
  }

  let sanitized = message

  for (const { pattern, replacement } of SENSITIVE_PATTERNS) {
    sanitized = sanitized.replace(pattern, replacement)
  }

  return sanitized
}

/**
 * Sanitize every string inside a log context, recursing through plain
 * objects and arrays. Other values are returned untouched.
 */
export function sanitizeContext(value: unknown): unknown {
  if (typeof value === 'string') {
    return sanitizeMessage(value)
  }
  if (Array.isArray(value)) {
    return value.map(sanitizeContext)
  }
  if (value !== null && typeof value === 'object' && !(value instanceof Date)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [key, sanitizeContext(entry)])
    )
  }
  return value
}

export function sanitizeRecord(record: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(record).map(([key, entry]) => [key, sanitizeContext(entry)])
  )
}
