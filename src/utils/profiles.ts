export const PROFILE_DELIMITER = '===PROFILE===';

/**
 * Split a concatenated document into trimmed, non-empty profile blocks.
 */
export function splitProfiles(document: string, delimiter: string = PROFILE_DELIMITER): string[] {
  return document
    .split(delimiter)
    .map((p) => p.trim())
    .filter(Boolean);
}
