import { spawnPromise } from "spawn-rx";

import { describeError, ExternalToolMissingError, handleSpawnError } from "./errors.js";
import type { Logger } from "./logger.js";

export const DEFAULT_YT_DLP = "yt-dlp";

/**
 * Runs yt-dlp with `args` and resolves with its stdout. Rejects with
 * ExternalToolError or ExternalToolMissingError.
 */
export type YtDlpRunner = (args: string[], cwd?: string) => Promise<string>;

export function createYtDlpRunner(executable: string = DEFAULT_YT_DLP): YtDlpRunner {
  return async (args, cwd) => {
    try {
      const [stdout]: [string, string] = await spawnPromise(executable, args, { cwd, split: true });
      return stdout;
    } catch (err) {
      throw handleSpawnError(err);
    }
  };
}

/**
 * Looks `executable` up on PATH with `which` (`where` on Windows). Resolves
 * with undefined when it can't be found.
 */
export async function resolveExecutablePath(executable: string): Promise<string | undefined> {
  const command = process.platform === "win32" ? "where" : "which";
  try {
    const [stdout]: [string, string] = await spawnPromise(command, [executable], { split: true });
    return stdout.split(/\r?\n/)[0]?.trim() || undefined;
  } catch {
    return undefined;
  }
}

export async function probeYtDlp(
  runner: YtDlpRunner,
  executable: string,
  logger: Logger,
  resolvePath: (executable: string) => Promise<string | undefined> = resolveExecutablePath
): Promise<boolean> {
  try {
    const version = (await runner(["--version"])).trim();
    const resolved = await resolvePath(executable);
    logger.info(`Using yt-dlp ${version} at: ${resolved ?? executable}`);
    return true;
  } catch (err) {
    if (err instanceof ExternalToolMissingError) {
      logger.error("yt-dlp not found in PATH. Please install it: pip install yt-dlp");
    } else {
      logger.error(`yt-dlp at ${executable} is not usable`, err);
    }
    return false;
  }
}

/**
 * Starts `yt-dlp --update-to stable` and returns immediately. The outcome is
 * only ever logged.
 */
export function triggerSelfUpdate(runner: YtDlpRunner, logger: Logger): void {
  void runner(["--update-to", "stable"]).then(
    (output) => {
      const summary = output.trim().split("\n").pop() ?? "";
      logger.info(`yt-dlp update finished${summary ? `: ${summary}` : ""}`);
    },
    (err: unknown) => {
      logger.error(`yt-dlp update failed: ${describeError(err)}`);
    }
  );
}
