/**
 * True when `name` can be used as a single directory or file name below the
 * download root without escaping it.
 */
export function isSafePathSegment(name: string): boolean {
  return name !== '' && name !== '.' && name !== '..' && !/[/\\\0]/.test(name);
}
