import type { ServiceConfig } from "../config.js";
import { SAMPLE_RATE } from "../constants.js";
import type { Logger } from "../utils/logger.js";
import { HttpDiarizer, StubDiarizer, type Diarizer } from "./diarize.js";
import { DisabledEnhancer, OllamaEnhancer, type Enhancer } from "./enhance.js";
import { FfmpegAudioDecoder, type AudioDecoder } from "./preprocess.js";
import { HttpTranscriber, StubTranscriber, type Transcriber } from "./transcribe.js";

export interface Collaborators {
  decoder: AudioDecoder;
  diarizer: Diarizer;
  transcriber: Transcriber;
  enhancer: Enhancer;
}

export function createEnhancer(cfg: ServiceConfig, logger: Logger): Enhancer {
  if (!cfg.ollamaEnabled) {
    logger.info("Ollama integration disabled");
    return new DisabledEnhancer();
  }
  logger.info(`Ollama client initialized: ${cfg.ollamaHost} with model ${cfg.ollamaModel}`);
  return new OllamaEnhancer({
    host: cfg.ollamaHost,
    model: cfg.ollamaModel,
    timeoutMs: cfg.ollamaTimeoutMs,
    logger,
  });
}

// Variants are picked once here; nothing downstream checks which one it got
export function createCollaborators(cfg: ServiceConfig, logger: Logger): Collaborators {
  const decoder = new FfmpegAudioDecoder({
    ffmpegCmd: cfg.ffmpegCmd,
    ffprobeCmd: cfg.ffprobeCmd,
    sampleRate: SAMPLE_RATE,
    maxAudioDurationSeconds: cfg.maxAudioDurationSeconds,
    timeoutMs: cfg.preprocessTimeoutMs,
  });

  let diarizer: Diarizer;
  if (cfg.diarizationBaseUrl) {
    diarizer = new HttpDiarizer({ baseUrl: cfg.diarizationBaseUrl, timeoutMs: cfg.diarizationTimeoutMs });
  } else {
    logger.warn("DIARIZATION_BASE_URL not set; using deterministic stub diarization");
    diarizer = new StubDiarizer();
  }

  let transcriber: Transcriber;
  if (cfg.asrBaseUrl) {
    transcriber = new HttpTranscriber({
      baseUrl: cfg.asrBaseUrl,
      model: cfg.asrModel,
      language: cfg.asrLanguage,
      timeoutMs: cfg.asrTimeoutMs,
    });
  } else {
    logger.warn("ASR_BASE_URL not set; using deterministic stub transcription");
    transcriber = new StubTranscriber();
  }

  return { decoder, diarizer, transcriber, enhancer: createEnhancer(cfg, logger) };
}
