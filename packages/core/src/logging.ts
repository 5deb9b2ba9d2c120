export type Logger = Pick<Console, "log" | "warn" | "error">;

export const silentLogger: Logger = {
  log: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
