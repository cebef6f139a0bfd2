import fs from "node:fs";
import path from "node:path";

import { withScratchDir } from "./scratch.js";
import type { YtDlpRunner } from "./ytdlp.js";

export interface SubtitleLanguage {
  code: string;
  displayName: string;
}

export type SubtitleDownloadResult =
  | { kind: "found"; text: string }
  | { kind: "not_found"; file: string };

const SUBTITLES_MARKER = "Available subtitles";

// A language line: a code, then the name and the format list in either order.
const LANGUAGE_LINE = /^\s*([\w-]+)(?:\s+(.*))?$/;
const FORMAT_TOKEN = /\b(?:vtt|srt|ttml|srv[1-3]|json3|ass|ssa|lrc|dfxp|sbv)\b,?/g;
const HEADER_CODE = "Language";

const SRT_CUE_HEADER = /\d+\n\d{2}:\d{2}:\d{2},\d{3} --> \d{2}:\d{2}:\d{2},\d{3}\n/g;

/**
 * Parses `yt-dlp --list-subs` output. Only lines after the "Available
 * subtitles" marker are considered; anything that does not start with a
 * language code is skipped.
 */
export function parseSubtitleLanguages(output: string): SubtitleLanguage[] {
  const languages: SubtitleLanguage[] = [];
  let inSubtitlesSection = false;

  for (const line of output.split(/\r?\n/)) {
    if (line.includes(SUBTITLES_MARKER)) {
      inSubtitlesSection = true;
      continue;
    }

    if (!inSubtitlesSection || line.trim() === "") continue;

    const match = LANGUAGE_LINE.exec(line);
    if (!match || match[1] === HEADER_CODE) continue;

    const code = match[1];
    const displayName = (match[2] ?? "").replace(FORMAT_TOKEN, "").replace(/\s+/g, " ").trim();
    languages.push({ code, displayName: displayName || code });
  }

  return languages;
}

export function formatSubtitleLanguages(languages: SubtitleLanguage[]): string {
  return (
    "Available subtitle languages:\n" +
    languages.map(({ code, displayName }) => `${code}: ${displayName}`).join("\n")
  );
}

/**
 * Drops SRT sequence numbers and timing lines, leaving one caption line per
 * line of output.
 */
export function stripSrtNonContent(srtContent: string): string {
  return srtContent
    .replace(/\r\n/g, "\n")
    .replace(SRT_CUE_HEADER, "")
    .replace(/\n\s*\n/g, "\n");
}

export async function listSubtitleLanguages(
  runner: YtDlpRunner,
  url: string
): Promise<SubtitleLanguage[]> {
  const output = await runner(["--skip-download", "--list-subs", url]);
  return parseSubtitleLanguages(output);
}

export async function downloadSubtitles(
  runner: YtDlpRunner,
  url: string,
  lang: string
): Promise<SubtitleDownloadResult> {
  return withScratchDir(async (tempDir) => {
    const outputStem = path.join(tempDir, "subtitles");

    await runner(
      [
        "--skip-download",
        "--write-auto-sub",
        `--sub-lang=${lang}`,
        "--convert-subs=srt",
        `--output=${outputStem}`,
        url,
      ],
      tempDir
    );

    const subtitleFile = `${outputStem}.${lang}.srt`;
    if (!fs.existsSync(subtitleFile)) {
      return { kind: "not_found", file: subtitleFile };
    }

    const content = await fs.promises.readFile(subtitleFile, "utf8");
    return { kind: "found", text: stripSrtNonContent(content) };
  });
}
