import path from "node:path";
import fs from "node:fs/promises";
import { runCommand } from "../utils/process.js";
import { decodeWav, type DecodedAudio } from "../utils/wav.js";
import { CollaboratorError, ValidationError, errorMessage } from "../errors.js";

export interface PreprocessedAudio {
  processedPath: string;
  durationSeconds: number;
}

export interface AudioDecoder {
  // Validates duration, then writes a normalized 16 kHz mono WAV
  preprocess(filePath: string): Promise<PreprocessedAudio>;
  loadSamples(processedPath: string): Promise<DecodedAudio>;
  // Where preprocess() writes its output; cleanup relies on it even when preprocess failed midway
  intermediatePathFor(filePath: string): string;
}

export interface FfmpegDecoderOptions {
  ffmpegCmd: string;
  ffprobeCmd: string;
  sampleRate: number;
  maxAudioDurationSeconds: number;
  timeoutMs: number;
}

export class FfmpegAudioDecoder implements AudioDecoder {
  constructor(private readonly opts: FfmpegDecoderOptions) {}

  intermediatePathFor(filePath: string): string {
    const parsed = path.parse(filePath);
    return path.join(parsed.dir, `processed_${parsed.name}.wav`);
  }

  async probeDurationSeconds(filePath: string): Promise<number> {
    const { stdout } = await runCommand(this.opts.ffprobeCmd, [
      "-v", "error",
      "-show_entries", "format=duration",
      "-of", "default=noprint_wrappers=1:nokey=1",
      filePath,
    ], { timeoutMs: this.opts.timeoutMs });

    const duration = parseFloat(stdout.trim());
    if (!Number.isFinite(duration)) {
      throw new Error(`Could not determine audio duration from ffprobe output "${stdout.trim()}"`);
    }
    return duration;
  }

  async preprocess(filePath: string): Promise<PreprocessedAudio> {
    let durationSeconds: number;
    try {
      durationSeconds = await this.probeDurationSeconds(filePath);
    } catch (err) {
      throw new CollaboratorError("decoder", `Audio preprocessing failed: ${errorMessage(err)}`, { cause: err });
    }

    // Fail fast before the expensive conversion
    if (durationSeconds > this.opts.maxAudioDurationSeconds) {
      throw new ValidationError(
        `Audio duration ${durationSeconds}s exceeds maximum ${this.opts.maxAudioDurationSeconds}s`
      );
    }

    const processedPath = this.intermediatePathFor(filePath);
    try {
      await runCommand(this.opts.ffmpegCmd, [
        "-y",
        "-i", filePath,
        "-af", "loudnorm",
        "-ac", "1",
        "-ar", String(this.opts.sampleRate),
        "-c:a", "pcm_s16le",
        "-f", "wav",
        processedPath,
      ], { timeoutMs: this.opts.timeoutMs });
    } catch (err) {
      throw new CollaboratorError("decoder", `FFmpeg processing failed: ${errorMessage(err)}`, { cause: err });
    }

    return { processedPath, durationSeconds };
  }

  async loadSamples(processedPath: string): Promise<DecodedAudio> {
    try {
      const decoded = decodeWav(await fs.readFile(processedPath));
      if (decoded.sampleRate !== this.opts.sampleRate) {
        throw new Error(`expected ${this.opts.sampleRate} Hz, got ${decoded.sampleRate} Hz`);
      }
      return decoded;
    } catch (err) {
      throw new CollaboratorError("decoder", `Failed to load audio: ${errorMessage(err)}`, { cause: err });
    }
  }
}
