/**
 * Reduce a relay endpoint such as "wss://relay.example.com:443/path" to the
 * bare hostname used for resolution. Returns "" when nothing is left.
 */
export function normalizeEndpoint(raw: string): string {
  const withoutScheme = raw.replace(/^wss?:\/\//i, "");
  const withoutPath = withoutScheme.split("/")[0];
  return withoutPath.split(":")[0];
}
