import { z } from "zod";

import { DEFAULT_YT_DLP } from "./ytdlp.js";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

export const configSchema = z.object({
  YT_DLP_PATH: z.string().min(1).default(DEFAULT_YT_DLP),
  YT_DLP_AUTO_UPDATE: booleanFlag.default("true"),
});

export interface ServerConfig {
  ytDlpPath: string;
  autoUpdate: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = configSchema.safeParse({
    YT_DLP_PATH: env.YT_DLP_PATH || undefined,
    YT_DLP_AUTO_UPDATE: env.YT_DLP_AUTO_UPDATE?.trim().toLowerCase() || undefined,
  });

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  return {
    ytDlpPath: parsed.data.YT_DLP_PATH,
    autoUpdate: parsed.data.YT_DLP_AUTO_UPDATE,
  };
}
