/**
 * ANSI pretty-printing for terminal output.
 */

const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";
const CYAN = "\x1b[36m";
const RED = "\x1b[31m";

export function bold(text: string): string {
  return `${BOLD}${text}${RESET}`;
}

export function dim(text: string): string {
  return `${DIM}${text}${RESET}`;
}

export function cyan(text: string): string {
  return `${CYAN}${text}${RESET}`;
}

export function red(text: string): string {
  return `${RED}${text}${RESET}`;
}

/** Name/description rows, names padded to one column. Only the first description line is shown. */
export function formatEntries(entries: Record<string, string>): string {
  const names = Object.keys(entries);
  if (names.length === 0) return dim("  (none)");

  const maxNameLen = Math.max(...names.map(n => n.length));
  return names
    .map(name => {
      const summary = (entries[name] ?? "").split("\n")[0] ?? "";
      return `  ${cyan(name.padEnd(maxNameLen + 2))}${dim(summary)}`;
    })
    .join("\n");
}

export function formatListing(
  path: string,
  listing: { categories: Record<string, string>; tools: Record<string, string>; },
): string {
  return [
    bold(path === "" ? "(root)" : path),
    "",
    bold("Categories:"),
    formatEntries(listing.categories),
    "",
    bold("Tools:"),
    formatEntries(listing.tools),
  ].join("\n");
}

export function formatError(message: string): string {
  return `${red("Error:")} ${message}`;
}
