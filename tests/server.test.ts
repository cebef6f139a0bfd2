import test from "node:test";
import assert from "node:assert/strict";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";

import { createServer } from "../src/server.js";
import { YT_DLP_MISSING_MESSAGE } from "../src/tools.js";
import type { YtDlpRunner } from "../src/ytdlp.js";
import { fakeRunner, recordingLogger } from "./helpers.js";

async function connect(available: boolean, runner: YtDlpRunner) {
  const server = createServer({ available, runner, logger: recordingLogger().logger });
  const client = new Client({ name: "test-client", version: "1.0.0" });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);

  return {
    client,
    async close() {
      await client.close();
      await server.close();
    },
  };
}

function toolResult(result: unknown) {
  const parsed = CallToolResultSchema.parse(result);
  const [first] = parsed.content;
  if (first?.type !== "text") {
    throw new Error("expected a text result");
  }
  return { text: first.text, isError: parsed.isError ?? false };
}

test("server lists the three tools and the workflow prompt", async () => {
  const { client, close } = await connect(true, fakeRunner(() => "").runner);
  try {
    const { tools } = await client.listTools();
    assert.deepEqual(
      tools.map((tool) => tool.name),
      ["list_subtitle_languages", "download_subtitles", "get_video_info"]
    );

    const { prompts } = await client.listPrompts();
    assert.deepEqual(
      prompts.map((prompt) => prompt.name),
      ["youtube_subtitles_workflow"]
    );
  } finally {
    await close();
  }
});

test("server returns the advisory text when yt-dlp is unavailable", async () => {
  const { runner, calls } = fakeRunner(() => "");
  const { client, close } = await connect(false, runner);
  try {
    const result = toolResult(
      await client.callTool({ name: "get_video_info", arguments: { url: "https://youtu.be/abc123" } })
    );
    assert.deepEqual(result, { text: YT_DLP_MISSING_MESSAGE, isError: false });
    assert.equal(calls.length, 0);
  } finally {
    await close();
  }
});

test("server routes tool calls to the operations", async () => {
  const { runner } = fakeRunner(() => "[info] Available subtitles for abc123:\nes       vtt, srt  Spanish\n");
  const { client, close } = await connect(true, runner);
  try {
    const result = toolResult(
      await client.callTool({
        name: "list_subtitle_languages",
        arguments: { url: "https://youtu.be/abc123" },
      })
    );
    assert.equal(result.text, "Available subtitle languages:\nes: Spanish");
  } finally {
    await close();
  }
});

test("server rejects bad arguments and unknown tools with error text", async () => {
  const { runner, calls } = fakeRunner(() => "");
  const { client, close } = await connect(true, runner);
  try {
    const badLang = toolResult(
      await client.callTool({
        name: "download_subtitles",
        arguments: { url: "https://youtu.be/abc123", lang: "../etc" },
      })
    );
    assert.deepEqual(badLang, {
      text: "Error: Invalid arguments: lang must not contain path separators or '..'",
      isError: true,
    });

    const missingUrl = toolResult(await client.callTool({ name: "get_video_info", arguments: {} }));
    assert.equal(missingUrl.isError, true);

    const unknown = toolResult(await client.callTool({ name: "nope", arguments: {} }));
    assert.deepEqual(unknown, { text: "Error: Unknown tool: nope", isError: true });
    assert.equal(calls.length, 0);
  } finally {
    await close();
  }
});

test("server passes yt-dlp language selectors through to the download", async () => {
  const { runner, calls } = fakeRunner(() => "");
  const { client, close } = await connect(true, runner);
  try {
    const result = toolResult(
      await client.callTool({
        name: "download_subtitles",
        arguments: { url: "https://youtu.be/abc123", lang: "en,fr" },
      })
    );
    assert.deepEqual(result, { text: "No subtitles found for language: en,fr", isError: false });
    assert.ok(calls[0].args.includes("--sub-lang=en,fr"));
  } finally {
    await close();
  }
});

test("server expands the workflow prompt", async () => {
  const { client, close } = await connect(false, fakeRunner(() => "").runner);
  try {
    const prompt = await client.getPrompt({
      name: "youtube_subtitles_workflow",
      arguments: { url: "https://youtu.be/abc123" },
    });
    assert.equal(prompt.messages.length, 4);
    const [first] = prompt.messages;
    assert.equal(
      first.content.type === "text" ? first.content.text : "",
      "I want to analyze the subtitles from this YouTube video: https://youtu.be/abc123"
    );

    await assert.rejects(client.getPrompt({ name: "nope" }), /Unknown prompt: nope/);
  } finally {
    await close();
  }
});
