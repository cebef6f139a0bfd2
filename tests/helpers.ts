import type { Logger } from "../src/logger.js";
import type { YtDlpRunner } from "../src/ytdlp.js";

export interface RunnerCall {
  args: string[];
  cwd?: string;
}

export function fakeRunner(respond: (args: string[], cwd?: string) => string | Promise<string>) {
  const calls: RunnerCall[] = [];
  const runner: YtDlpRunner = async (args, cwd) => {
    calls.push({ args, cwd });
    return respond(args, cwd);
  };
  return { runner, calls };
}

export function recordingLogger() {
  const infos: string[] = [];
  const errors: string[] = [];
  const logger: Logger = {
    info(message) {
      infos.push(message);
    },
    error(message) {
      errors.push(message);
    },
  };
  return { logger, infos, errors };
}

export function outputStem(args: string[]): string {
  const flag = args.find((arg) => arg.startsWith("--output="));
  if (!flag) {
    throw new Error(`no --output flag in ${args.join(" ")}`);
  }
  return flag.slice("--output=".length);
}
