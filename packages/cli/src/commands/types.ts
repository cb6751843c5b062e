import type { AppOptions } from "../app.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

export interface CommandIo {
  /** One line of command output (stdout) */
  print(line: string): void;
}

export interface CommandEnv {
  io: CommandIo;
  app: AppOptions;
  signal?: AbortSignal;
}
