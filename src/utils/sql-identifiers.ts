const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_$]*$/;

export function assertIdentifier(value: string, label: string): string {
  if (!IDENTIFIER.test(value)) {
    throw new Error(`Invalid ${label} identifier: "${value}"`);
  }
  return value;
}

/** Double-quoted identifier; case is preserved on both PostgreSQL and Snowflake. */
export function quoteIdentifier(value: string, label = 'SQL'): string {
  return `"${assertIdentifier(value, label)}"`;
}

export function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}
