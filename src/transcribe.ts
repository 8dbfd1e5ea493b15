/**
 * Transcription client: ElevenLabs speech-to-text.
 *
 * Sends the stored audio file as multipart form data. A provider rejection
 * for audio that is too short comes back as a placeholder result rather
 * than an error, so the record completes instead of failing.
 */

import { readFile } from "fs/promises";
import { basename } from "path";
import { log } from "./logger.ts";
import { RemoteHttpError, errorMessage } from "./resilience.ts";
import type { FetchLike } from "./placetel.ts";
import { PLACEHOLDER_AUDIO_TOO_SHORT, type TranscriptionResult } from "./types.ts";

const logger = log.child("transcribe");

const TRANSCRIBE_TIMEOUT_MS = 120_000;

export class TranscriptionError extends Error {
  constructor(
    message: string,
    public status?: number,
  ) {
    super(message);
    this.name = "TranscriptionError";
  }
}

export interface Transcriber {
  transcribe(filePath: string): Promise<TranscriptionResult>;
}

export interface ElevenLabsOpts {
  apiKey: string;
  baseUrl: string;
  model: string;
  fetch?: FetchLike;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isAudioTooShort(body: string): boolean {
  try {
    const parsed: unknown = JSON.parse(body);
    return isRecord(parsed) && isRecord(parsed.detail) && parsed.detail.status === "audio_too_short";
  } catch {
    return false;
  }
}

export class ElevenLabsTranscriber implements Transcriber {
  private fetchFn: FetchLike;

  constructor(private opts: ElevenLabsOpts) {
    this.fetchFn = opts.fetch ?? ((url, init) => fetch(url, init));
  }

  async transcribe(filePath: string): Promise<TranscriptionResult> {
    if (!this.opts.apiKey) throw new TranscriptionError("ELEVENLABS_API_KEY not set");

    let audio: Buffer;
    try {
      audio = await readFile(filePath);
    } catch (err) {
      throw new TranscriptionError(`Cannot read audio file ${filePath}: ${errorMessage(err)}`);
    }

    const form = new FormData();
    form.append("file", new Blob([audio], { type: "audio/mpeg" }), basename(filePath));
    form.append("model_id", this.opts.model);

    const res = await this.fetchFn(`${this.opts.baseUrl}/speech-to-text`, {
      method: "POST",
      headers: { "xi-api-key": this.opts.apiKey },
      body: form,
      signal: AbortSignal.timeout(TRANSCRIBE_TIMEOUT_MS),
    });

    if (!res.ok) {
      const body = await res.text();
      if (isAudioTooShort(body)) {
        logger.info("Provider rejected short audio", { file: basename(filePath) });
        return { text: PLACEHOLDER_AUDIO_TOO_SHORT, language: "unknown", confidence: 0, model: this.opts.model };
      }
      throw new RemoteHttpError("elevenlabs", res.status, body);
    }

    const result: unknown = await res.json();
    if (!isRecord(result)) throw new TranscriptionError("Unexpected transcription response", res.status);

    return {
      text: typeof result.text === "string" ? result.text.trim() : "",
      language: typeof result.language_code === "string" ? result.language_code : "unknown",
      confidence: typeof result.language_probability === "number" ? result.language_probability : 0,
      model: this.opts.model,
    };
  }
}
