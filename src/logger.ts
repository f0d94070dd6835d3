export type Logger = Pick<Console, "info" | "warn" | "error">;

export const consoleLogger: Logger = console;
