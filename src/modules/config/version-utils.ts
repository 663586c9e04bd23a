/**
 * Version helpers for the config format.
 */

/**
 * Check whether a version string is in a list of supported versions.
 */
export function isVersionSupported(version: string, supported: readonly string[]): boolean {
  return supported.includes(version)
}

/**
 * Format the standard "unsupported version" error message.
 */
export function formatUnsupportedVersionError(version: string, supported: readonly string[]): string {
  return (
    `Configuration format version "${version}" is not supported. ` +
    `This release supports: ${supported.join(', ')}. ` +
    `Upgrade threadsmith to read this file.`
  )
}
