import { bgBlack, bgBlue, bgGray, greenBright, red, yellow } from "ansis";
import { inspect as nodeInspect } from "util";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "silent";

const weights: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  silent: 100
};

const isLogLevel = (value: string | undefined): value is LogLevel => value !== undefined && value in weights;

export namespace log {
  let threshold: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : "info";

  /**
   * Messages below this level are dropped.
   */
  export const setLevel = (level: LogLevel) => {
    threshold = level;
  };

  export const level = (): LogLevel => threshold;

  const enabled = (level: LogLevel) => weights[level] >= weights[threshold];

  const write = (level: LogLevel, line: string, args?: unknown) => {
    if (!enabled(level)) {
      return;
    }
    console.log(`${new Date().toISOString()} ${line}`);
    if (args !== undefined) {
      console.log(nodeInspect(args, { depth: null, colors: true, sorted: true }));
    }
  };

  export namespace debugging {
    export const inspect = (label: string, args: unknown) => {
      write("debug", `🐛 ${bgGray(label)}`, args);
    };
  }

  export const info = (message: string, args?: unknown) => write("info", `ℹ️ ${bgBlue(message)}`, args);

  export const debug = (message: string, args?: unknown) => write("debug", `🐛 ${bgGray(message)}`, args);

  export const trace = (message: string, args?: unknown) => write("trace", `🔍 ${bgBlack(message)}`, args);

  export const success = (message: string, args?: unknown) => write("info", `✅ ${greenBright(message)}`, args);

  export const warning = (message: string, args?: unknown) => write("warn", `⚠️ ${yellow(message)}`, args);

  export const error = (message: string, args?: unknown) => write("error", `❌ ${red(message)}`, args);
}
