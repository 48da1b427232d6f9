/**
 * Field-name policy for the JSON encoding.
 *
 * Every upper-case letter after the first character gets an underscore in
 * front of it, then the whole name is lower-cased:
 *
 *   buildNumber → build_number
 *   fullUrl     → full_url
 *   queueID     → queue_i_d
 *   Name        → name
 */
export function toLowerUnderscore(name: string): string {
  return name.replace(/[A-Z]/g, (ch: string, offset: number) =>
    offset === 0 ? ch.toLowerCase() : `_${ch.toLowerCase()}`,
  );
}
