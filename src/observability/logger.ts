import pino from "pino";

/**
 * Narrow logging surface handed to components. A pino logger satisfies it;
 * tests pass a capturing object instead.
 */
export type ComponentLogger = {
  debug: (obj: Record<string, unknown>, msg?: string) => void;
  info: (obj: Record<string, unknown>, msg?: string) => void;
  warn: (obj: Record<string, unknown>, msg?: string) => void;
  error: (obj: Record<string, unknown>, msg?: string) => void;
};

export const silentLogger: ComponentLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * `stderr` keeps stdout free for program output (the CLI prints results there).
 */
export function createLogger(args: { name: string; level?: string; stderr?: boolean }) {
  const isDev = process.env.NODE_ENV !== "production";
  const fd = args.stderr ? 2 : 1;

  const options: pino.LoggerOptions = {
    name: args.name,
    level: args.level ?? process.env.LOG_LEVEL ?? (isDev ? "debug" : "info"),
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (isDev && process.env.PINO_PRETTY === "1") {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          singleLine: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
          destination: fd,
        },
      },
    });
  }

  return pino(options, pino.destination(fd));
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
