import type { YtDlpRunner } from "./ytdlp.js";

export interface VideoInfo {
  title: string;
  duration: string;
  channel: string;
  uploadDate: string;
  viewCount: string;
}

export type VideoInfoResult =
  | { kind: "parsed"; info: VideoInfo }
  | { kind: "unparsed"; output: string };

// One field per line, in the order parseVideoInfo reads them.
export const VIDEO_INFO_TEMPLATE =
  "%(title)s\n%(duration_string)s\n%(channel)s\n%(upload_date)s\n%(view_count)s";

/**
 * YYYYMMDD -> YYYY-MM-DD. Anything that isn't exactly eight characters is
 * returned as is.
 */
export function formatUploadDate(uploadDate: string): string {
  if (uploadDate.length !== 8) {
    return uploadDate;
  }
  return `${uploadDate.slice(0, 4)}-${uploadDate.slice(4, 6)}-${uploadDate.slice(6, 8)}`;
}

export function parseVideoInfo(output: string): VideoInfoResult {
  const lines = output.trim().split("\n");
  if (lines.length < 5) {
    return { kind: "unparsed", output };
  }

  const [title, duration, channel, uploadDate, viewCount] = lines;
  return {
    kind: "parsed",
    info: {
      title,
      duration,
      channel,
      uploadDate: formatUploadDate(uploadDate),
      viewCount,
    },
  };
}

export function formatVideoInfo(info: VideoInfo): string {
  return (
    `Title: ${info.title}\n` +
    `Duration: ${info.duration}\n` +
    `Channel: ${info.channel}\n` +
    `Upload Date: ${info.uploadDate}\n` +
    `Views: ${info.viewCount}`
  );
}

export async function fetchVideoInfo(runner: YtDlpRunner, url: string): Promise<VideoInfoResult> {
  const output = await runner(["--skip-download", "--print", VIDEO_INFO_TEMPLATE, url]);
  return parseVideoInfo(output);
}
