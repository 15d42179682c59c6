/**
 * User-facing texts for the Telegram binding.
 * Plain text only: filenames and names contain underscores that break Markdown.
 */

import type { IngestResult } from "../ingest/orchestrator";
import type { AudioKind } from "../ingest/filename";
import { formatCandidate } from "../dialog/prompts";

export function startMessage(firstName: string): string {
  return [
    `Hi ${firstName}! 👋`,
    "",
    "I'm your voice memo assistant.",
    "",
    "Send me a voice message and I'll process it for you:",
    "• Transcribe it",
    "• Extract key information",
    "• Link the people you mention to your contacts",
    "",
    "Just hold the microphone button and speak!",
  ].join("\n");
}

export const HELP_MESSAGE = [
  "🎙️ How to use this bot:",
  "",
  "1. Send a voice message (hold mic button) or an audio file",
  "2. I'll transcribe and summarize it",
  "3. If I'm unsure who you meant, I'll ask. Reply with a number, 0 to skip, or type the full name",
  "",
  "Tips:",
  "• Speak clearly",
  "• Start with context: 'Meeting with John...'",
  "• Mention names and dates clearly",
  "",
  "/cancel stops an open contact question list.",
].join("\n");

export const UNAUTHORIZED_MESSAGE = "❌ You are not authorized to use this bot.";

export function downloadingMessage(kind: AudioKind): string {
  return kind === "voice" ? "⏳ Downloading voice message..." : "⏳ Downloading audio file...";
}

export const PROCESSING_MESSAGE = "☁️ Processing...";

export function renderIngestResult(result: IngestResult): string {
  if (result.status === "deferred") {
    return [
      "✅ Audio file uploaded!",
      "",
      `📁 File: ${result.filename}`,
      "",
      "Processing will begin automatically. Check your knowledge base in a few minutes.",
    ].join("\n");
  }

  const { analysis } = result;
  const lines = ["✅ Voice message processed!"];
  if (analysis.summary) {
    lines.push("", `📝 ${analysis.summary}`);
  }
  lines.push("", `📏 Transcript: ${analysis.transcriptLength} characters`);

  if (analysis.linked.length > 0) {
    lines.push("", "🔗 Linked contacts:");
    for (const contact of analysis.linked) {
      lines.push(`• ${formatCandidate(contact)}`);
    }
  }

  if (result.superseded && analysis.references.length > 0) {
    lines.push("", "A newer voice message arrived, so I won't ask about the contacts in this one.");
  } else if (analysis.references.length > 0) {
    const count = analysis.references.length;
    lines.push("", `❓ ${count} contact${count === 1 ? "" : "s"} need${count === 1 ? "s" : ""} your input.`);
  }

  return lines.join("\n");
}
