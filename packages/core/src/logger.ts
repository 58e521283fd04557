/**
 * stderr logging. stdout belongs to the MCP stdio transport, so every
 * diagnostic line goes through console.error with a component prefix.
 */

export type Log = (message: string, ...details: unknown[]) => void;

export function createLogger(component: string): Log {
  return (message, ...details) => {
    console.error(`[${component}] ${message}`, ...details);
  };
}

/** Discards everything. Handy for tests. */
export const silentLog: Log = () => {};
