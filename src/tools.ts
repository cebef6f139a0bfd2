import { describeError } from "./errors.js";
import type { Logger } from "./logger.js";
import {
  downloadSubtitles,
  formatSubtitleLanguages,
  listSubtitleLanguages,
} from "./subtitles.js";
import { fetchVideoInfo, formatVideoInfo } from "./videoInfo.js";
import type { YtDlpRunner } from "./ytdlp.js";

export const YT_DLP_MISSING_MESSAGE =
  "Error: yt-dlp is not installed. Please install it with: pip install yt-dlp";
export const NO_SUBTITLES_MESSAGE = "No subtitles found for this video.";
export const DEFAULT_SUBTITLE_LANGUAGE = "en";

/**
 * Everything an operation needs, resolved once at startup.
 */
export interface ServerContext {
  available: boolean;
  runner: YtDlpRunner;
  logger: Logger;
}

export interface SubtitleOperations {
  listSubtitleLanguages(url: string): Promise<string>;
  downloadSubtitles(url: string, lang?: string): Promise<string>;
  getVideoInfo(url: string): Promise<string>;
}

export function createOperations(context: ServerContext): SubtitleOperations {
  const { runner, logger } = context;

  // Operations always resolve with text: a missing yt-dlp or any thrown error
  // becomes the message returned to the client.
  const asText = async (label: string, operation: () => Promise<string>): Promise<string> => {
    if (!context.available) {
      return YT_DLP_MISSING_MESSAGE;
    }
    try {
      return await operation();
    } catch (err) {
      logger.error(`${label}: ${describeError(err)}`);
      return `${label}: ${describeError(err)}`;
    }
  };

  return {
    listSubtitleLanguages: (url) =>
      asText("Error listing subtitle languages", async () => {
        logger.info(`Fetching available subtitle languages for ${url}`);
        const languages = await listSubtitleLanguages(runner, url);
        return languages.length === 0 ? NO_SUBTITLES_MESSAGE : formatSubtitleLanguages(languages);
      }),

    downloadSubtitles: (url, lang = DEFAULT_SUBTITLE_LANGUAGE) =>
      asText("Error downloading subtitles", async () => {
        logger.info(`Downloading ${lang} subtitles for ${url}`);
        const result = await downloadSubtitles(runner, url, lang);
        if (result.kind === "not_found") {
          logger.error(`No subtitle file found: ${result.file}`);
          return `No subtitles found for language: ${lang}`;
        }
        return result.text;
      }),

    getVideoInfo: (url) =>
      asText("Error getting video info", async () => {
        logger.info(`Fetching video information for ${url}`);
        const result = await fetchVideoInfo(runner, url);
        if (result.kind === "unparsed") {
          return `Couldn't parse video information: ${result.output}`;
        }
        return formatVideoInfo(result.info);
      }),
  };
}
