/**
 * Simple stderr logger with verbosity control.
 * The gateway speaks JSON-RPC on stdout, so nothing else may write there.
 */

let verbose = false;

export function setVerbose(v: boolean): void {
  verbose = v;
}

export function isVerbose(): boolean {
  return verbose;
}

export function log(message: string, ...args: unknown[]): void {
  if (verbose) {
    console.error(`[toolpath] ${message}`, ...args);
  }
}

export function warn(message: string, ...args: unknown[]): void {
  console.error(`[toolpath WARN] ${message}`, ...args);
}

export function error(message: string, ...args: unknown[]): void {
  console.error(`[toolpath ERROR] ${message}`, ...args);
}

