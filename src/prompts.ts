import type { PromptMessage } from "@modelcontextprotocol/sdk/types.js";

export const SUBTITLES_WORKFLOW_PROMPT = "youtube_subtitles_workflow";

function userText(text: string): PromptMessage {
  return { role: "user", content: { type: "text", text } };
}

/**
 * Scripted conversation walking a model through info → languages → download.
 */
export function youtubeSubtitlesWorkflow(url: string): PromptMessage[] {
  return [
    userText(`I want to analyze the subtitles from this YouTube video: ${url}`),
    userText("First, get basic information about the video."),
    userText("Then, list available subtitle languages."),
    userText("Finally, download the subtitles in my preferred language and analyze their content."),
  ];
}
