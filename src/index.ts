#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { loadConfig } from "./config.js";
import { stderrLogger } from "./logger.js";
import { createServer, SERVER_VERSION } from "./server.js";
import { createYtDlpRunner, probeYtDlp, triggerSelfUpdate } from "./ytdlp.js";

async function runServer() {
  console.error(`Starting YouTube Subtitles MCP Server v${SERVER_VERSION}...`);

  const config = loadConfig();
  const runner = createYtDlpRunner(config.ytDlpPath);
  const available = await probeYtDlp(runner, config.ytDlpPath, stderrLogger);

  if (available && config.autoUpdate) {
    triggerSelfUpdate(runner, stderrLogger);
  }

  const server = createServer({ available, runner, logger: stderrLogger });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("YouTube Subtitles MCP Server started");
}

runServer().catch((err) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
