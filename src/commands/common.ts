/**
 * Argument-parsing helpers shared by the CLI commands.
 */

/**
 * Commander collect helper: appends each flag value into an array.
 * Pass as the third argument to `.option()` with `[]` as the default.
 */
export function collect(value: string, previous: string[]): string[] {
  return previous.concat([value]);
}

/** Split repeatable `name=value` flags, rejecting empty halves. */
function parseNamedPairs(
  items: string[],
  flag: string,
  valueLabel: string,
): Array<{ name: string; value: string; }> {
  return items.map(item => {
    const eq = item.indexOf("=");
    if (eq === -1) {
      throw new Error(`Invalid ${flag} format: "${item}". Use name=${valueLabel}`);
    }
    const name = item.slice(0, eq).trim();
    const value = item.slice(eq + 1).trim();
    if (!name) {
      throw new Error(`Invalid ${flag} format: "${item}". Server name must not be empty`);
    }
    if (!value) {
      throw new Error(`Invalid ${flag} format: "${item}". The ${valueLabel} must not be empty`);
    }
    return { name, value };
  });
}

/** Parse `--server name=command` inline backend definitions. */
export function parseInlineServers(
  items: string[],
): Array<{ name: string; command: string; }> {
  return parseNamedPairs(items, "--server", "command").map(({ name, value }) => ({
    name,
    command: value,
  }));
}

/** Parse `--server-url name=url` inline backend definitions; the URL must be absolute. */
export function parseInlineUrls(
  items: string[],
): Array<{ name: string; url: string; }> {
  return parseNamedPairs(items, "--server-url", "url").map(({ name, value }) => {
    if (!URL.canParse(value)) {
      throw new Error(`Invalid --server-url "${name}=${value}": not an absolute URL`);
    }
    return { name, url: value };
  });
}

/** Parse a positive integer flag such as a port or a timeout. */
export function parsePositiveInt(
  value: string,
  flag: string,
  max = Number.MAX_SAFE_INTEGER,
): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid ${flag}: "${value}". Expected a positive integer`);
  }
  if (parsed > max) {
    throw new Error(`Invalid ${flag}: "${value}". Expected at most ${max}`);
  }
  return parsed;
}
