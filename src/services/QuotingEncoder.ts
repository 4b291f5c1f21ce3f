/**
 * Value quoting for semicolon-delimited key/value connection strings.
 *
 * A value must be enclosed in quotation marks when it contains a semicolon or a
 * control character, or when it starts or ends with a space. The enclosing
 * character may not occur inside the value, so:
 *   - double quotes are used when the value has none,
 *   - single quotes when it only has double quotes,
 *   - otherwise double quotes, with every `"` inside doubled.
 * Values that need no quoting are returned unchanged.
 */
export class QuotingEncoder {
  static encode(value: string): string {
    if (!QuotingEncoder.needsQuotes(value)) {
      return value;
    }

    if (!value.includes('"')) {
      return `"${value}"`;
    }

    if (!value.includes("'")) {
      return `'${value}'`;
    }

    return `"${value.replaceAll('"', '""')}"`;
  }

  static needsQuotes(value: string): boolean {
    return (
      QuotingEncoder.includesControlCharacter(value) ||
      value.startsWith(' ') ||
      value.endsWith(' ') ||
      value.includes(';')
    );
  }

  // Unicode general category Cc
  static includesControlCharacter(value: string): boolean {
    return /\p{Cc}/u.test(value);
  }
}
