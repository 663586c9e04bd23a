/**
 * Built-in controlled tag vocabulary: canonical tag → synonyms that collapse onto it.
 *
 * A canonical key must never appear as a synonym (of itself or another key).
 */
export const DEFAULT_TAG_SYNONYMS: Readonly<Record<string, readonly string[]>> = {
  auth: ['authentication', 'jwt', 'bearer-token'],
  kafka: ['kafka-client', 'message-queue', 'messaging'],
  error: ['error-handling', 'exception', 'fault-tolerance'],
  log: ['logging', 'audit', 'tracing'],
  test: ['testing', 'tests', 'unit-test', 'sdet'],
  db: ['database', 'sql', 'persistence'],
  api: ['rest', 'endpoint', 'http-api'],
  config: ['configuration', 'settings'],
}
