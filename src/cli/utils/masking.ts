/**
 * Credential masking for CLI output and pino redaction.
 *
 * API keys must never reach logs, status output or error messages.
 */

/** Placeholder shown instead of a real credential */
export const MASKED_VALUE = '***'

/**
 * Patterns that look like provider API keys or bearer tokens.
 */
export const API_KEY_PATTERNS: RegExp[] = [
  // OpenAI-style: sk-...
  /sk-[A-Za-z0-9_-]{20,}/g,
  // Bearer headers echoed back in error bodies
  /Bearer\s+[A-Za-z0-9._-]{16,}/g,
  // Generic long base64-looking tokens (32+ chars, no spaces)
  /[A-Za-z0-9+/]{32,}={0,2}/g,
]

/**
 * Pino redaction paths for credential fields.
 * Pass this array to the `pino({ redact: ... })` option.
 */
export const PINO_REDACT_PATHS: string[] = [
  'apiKey',
  'api_key',
  '*.apiKey',
  '*.api_key',
  'headers.authorization',
  '*.headers.authorization',
]

/**
 * Replace any known API key patterns in a string with `***`.
 *
 * Best-effort scrub for log messages and error strings.
 */
export function maskSecrets(input: string): string {
  let result = input
  for (const pattern of API_KEY_PATTERNS) {
    // Global regexes keep lastIndex between calls
    pattern.lastIndex = 0
    result = result.replace(pattern, MASKED_VALUE)
  }
  return result
}
