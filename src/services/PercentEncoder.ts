/**
 * Percent-encoding for values placed into a URI-style connection string.
 *
 * Only the reserved characters of the generic URI syntax are escaped; every other
 * character (including `%`, non-ASCII and control characters) is kept as-is.
 */
export const PERCENT_REPLACEMENTS: Readonly<Record<string, string>> = {
  '!': '%21',
  '#': '%23',
  $: '%24',
  '&': '%26',
  "'": '%27',
  '(': '%28',
  ')': '%29',
  '*': '%2A',
  '+': '%2B',
  ',': '%2C',
  '/': '%2F',
  ':': '%3A',
  ';': '%3B',
  '=': '%3D',
  '?': '%3F',
  '@': '%40',
  '[': '%5B',
  ']': '%5D',
};

const RESERVED_CHARACTERS = /[!#$&'()*+,/:;=?@[\]]/g;

export class PercentEncoder {
  /**
   * Replace reserved characters with their percent-escapes in a single pass
   * over the input.
   */
  static encode(value: string): string {
    return value.replace(RESERVED_CHARACTERS, (char) => PERCENT_REPLACEMENTS[char] ?? char);
  }
}
