import fs from "fs-extra";
import path from "path";
import type { SubtitleFile, Transcript, TranscriptSegment } from "./types";

const UNSAFE = /[\\/:*?"<>|\u0000-\u001f]/g;

export function sanitizePathSegment(value: string): string {
  const cleaned = value.replace(UNSAFE, "_").trim();
  return cleaned && cleaned !== "." && cleaned !== ".." ? cleaned : "_";
}

export function toSubtitleFile(t: Transcript): SubtitleFile {
  return {
    channel_id: t.channelTitle,
    video_title: t.title,
    transcript: t.segments.map((s) => ({ text: s.text, start: s.start, duration: s.duration })),
  };
}

/** `<outputDir>/<channel>/<YYYYMMDD>_<videoId>.json` */
export function subtitlePath(outputDir: string, t: Pick<Transcript, "channelTitle" | "uploadDate" | "videoId">): string {
  const date = t.uploadDate && /^\d{8}$/.test(t.uploadDate) ? t.uploadDate : "00000000";
  return path.join(outputDir, sanitizePathSegment(t.channelTitle), `${date}_${t.videoId}.json`);
}

export async function saveTranscript(t: Transcript, outputDir: string): Promise<string> {
  const outPath = subtitlePath(outputDir, t);
  await fs.ensureDir(path.dirname(outPath));
  await fs.writeJson(outPath, toSubtitleFile(t), { spaces: 2, encoding: "utf8" });
  return outPath;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function isSegment(v: unknown): v is TranscriptSegment {
  return (
    typeof v === "object" &&
    v !== null &&
    "text" in v &&
    typeof v.text === "string" &&
    "start" in v &&
    typeof v.start === "number" &&
    "duration" in v &&
    typeof v.duration === "number"
  );
}

export async function readSubtitleFile(filePath: string): Promise<SubtitleFile> {
  const raw: unknown = await fs.readJson(filePath);
  if (!isRecord(raw)) {
    throw new Error(`Not a subtitle file: ${filePath}`);
  }
  const { channel_id, video_title, transcript } = raw;
  if (typeof channel_id !== "string" || typeof video_title !== "string" || !Array.isArray(transcript)) {
    throw new Error(`Not a subtitle file: ${filePath}`);
  }
  const segments: TranscriptSegment[] = [];
  for (const seg of transcript) {
    if (!isSegment(seg)) throw new Error(`Malformed transcript segment in ${filePath}`);
    segments.push({ text: seg.text, start: seg.start, duration: seg.duration });
  }
  return { channel_id, video_title, transcript: segments };
}
