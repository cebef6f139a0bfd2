import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  GetPromptRequestSchema,
  ListPromptsRequestSchema,
  ListToolsRequestSchema,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

import { describeError, InvalidArgumentsError } from "./errors.js";
import { createServerLogger, stderrLogger, type Logger } from "./logger.js";
import { SUBTITLES_WORKFLOW_PROMPT, youtubeSubtitlesWorkflow } from "./prompts.js";
import { createOperations, DEFAULT_SUBTITLE_LANGUAGE, type SubtitleOperations } from "./tools.js";
import type { YtDlpRunner } from "./ytdlp.js";

export const SERVER_NAME = "youtube-subtitles";
export const SERVER_VERSION = "1.0.0";

const UrlArgsSchema = z.object({
  url: z.string().min(1, "url is required"),
});

const DownloadSubtitlesArgsSchema = UrlArgsSchema.extend({
  // Passed to --sub-lang as is, but also names the file read back.
  lang: z
    .string()
    .min(1, "lang must not be empty")
    .refine((lang) => !/[\\/]/.test(lang) && !lang.includes(".."), "lang must not contain path separators or '..'")
    .default(DEFAULT_SUBTITLE_LANGUAGE),
});

function parseArgs<Output>(schema: z.ZodType<Output, z.ZodTypeDef, unknown>, args: unknown): Output {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => issue.message).join("; ");
    throw new InvalidArgumentsError(`Invalid arguments: ${issues}`, parsed.error);
  }
  return parsed.data;
}

async function callTool(
  operations: SubtitleOperations,
  name: string,
  args: unknown
): Promise<string> {
  switch (name) {
    case "list_subtitle_languages": {
      const { url } = parseArgs(UrlArgsSchema, args);
      return operations.listSubtitleLanguages(url);
    }
    case "download_subtitles": {
      const { url, lang } = parseArgs(DownloadSubtitlesArgsSchema, args);
      return operations.downloadSubtitles(url, lang);
    }
    case "get_video_info": {
      const { url } = parseArgs(UrlArgsSchema, args);
      return operations.getVideoInfo(url);
    }
    default:
      throw new InvalidArgumentsError(`Unknown tool: ${name}`);
  }
}

export interface CreateServerOptions {
  available: boolean;
  runner: YtDlpRunner;
  logger?: Logger;
}

export function createServer({ available, runner, logger = stderrLogger }: CreateServerOptions): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
        prompts: {},
        logging: {},
      },
    }
  );

  const operations = createOperations({
    available,
    runner,
    logger: createServerLogger(server, logger),
  });

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: [
        {
          name: "list_subtitle_languages",
          description: "List available subtitle languages for a YouTube video.",
          inputSchema: {
            type: "object",
            properties: {
              url: { type: "string", description: "URL of the YouTube video" },
            },
            required: ["url"],
          },
        },
        {
          name: "download_subtitles",
          description:
            "Download subtitles from a YouTube video and return them as plain text, without sequence numbers or timestamps.",
          inputSchema: {
            type: "object",
            properties: {
              url: { type: "string", description: "URL of the YouTube video" },
              lang: {
                type: "string",
                description:
                  "Language code for subtitles (default: 'en' for English). Passed to yt-dlp's --sub-lang; path separators and '..' are rejected.",
                default: DEFAULT_SUBTITLE_LANGUAGE,
              },
            },
            required: ["url"],
          },
        },
        {
          name: "get_video_info",
          description:
            "Get basic information about a YouTube video: title, duration, channel, upload date and view count.",
          inputSchema: {
            type: "object",
            properties: {
              url: { type: "string", description: "URL of the YouTube video" },
            },
            required: ["url"],
          },
        },
      ],
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name } = request.params;

    try {
      const text = await callTool(operations, name, request.params.arguments);
      return {
        content: [{ type: "text", text }],
      };
    } catch (err) {
      logger.error(`Error in tool ${name}:`, err);
      return {
        content: [{ type: "text", text: `Error: ${describeError(err)}` }],
        isError: true,
      };
    }
  });

  server.setRequestHandler(ListPromptsRequestSchema, async () => {
    return {
      prompts: [
        {
          name: SUBTITLES_WORKFLOW_PROMPT,
          description: "Create a workflow for analyzing YouTube video subtitles.",
          arguments: [
            { name: "url", description: "URL of the YouTube video", required: true },
          ],
        },
      ],
    };
  });

  server.setRequestHandler(GetPromptRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    if (name !== SUBTITLES_WORKFLOW_PROMPT) {
      throw new McpError(ErrorCode.InvalidParams, `Unknown prompt: ${name}`);
    }
    const url = args?.url;
    if (!url) {
      throw new McpError(ErrorCode.InvalidParams, "Missing required argument: url");
    }

    return {
      description: "A conversation to help analyze the video's subtitles",
      messages: youtubeSubtitlesWorkflow(url),
    };
  });

  return server;
}
