import debugLib from "debug";

/**
 * Component logger for the congress importer.
 *
 * Diagnostics go through the debug library under "congress:<component>"
 * (enable with DEBUG=congress:*). info/warn/error lines always print,
 * prefixed with the component.
 *
 * Usage:
 *   const log = congressLogger("terms");
 *   log.debug("created %s", name);   // congress:terms created ... +2ms
 *   log.error("Duplicated term %s", name);  // [congress:terms] Duplicated term ...
 */

export type Logger = {
  debug(formatter: string, ...args: unknown[]): void;
  info(formatter: string, ...args: unknown[]): void;
  warn(formatter: string, ...args: unknown[]): void;
  error(formatter: string, ...args: unknown[]): void;
};

export function congressLogger(component: string): Logger {
  const dbg = debugLib(`congress:${component}`);
  const prefix = `[congress:${component}]`;

  return {
    debug: (formatter, ...args) => dbg(formatter, ...args),
    info: (formatter, ...args) => console.log(`${prefix} ${formatter}`, ...args),
    warn: (formatter, ...args) =>
      console.warn(`${prefix} ${formatter}`, ...args),
    error: (formatter, ...args) =>
      console.error(`${prefix} ${formatter}`, ...args),
  };
}
