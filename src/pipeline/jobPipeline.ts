import { PROGRESS } from "../constants.js";
import { CollaboratorError, StageFailure, errorMessage, type PipelineStage } from "../errors.js";
import type { JobStore } from "../store/jobStore.js";
import type {
  JobRecordUpdate,
  LLMEnhancements,
  TranscribedSegment,
  TranscriptionJobData,
} from "../types.js";
import { removeFileQuietly } from "../utils/files.js";
import type { Logger } from "../utils/logger.js";
import { canonicalizeTurns, countSpeakers, type Diarizer } from "./diarize.js";
import type { Enhancer } from "./enhance.js";
import { formatResult } from "./format.js";
import { JobStateTracker, type StatusUpdate } from "./jobState.js";
import { mergeConsecutiveSegments } from "./merge.js";
import type { AudioDecoder } from "./preprocess.js";
import { segmentAudio } from "./segment.js";
import { transcribeClips, type Transcriber } from "./transcribe.js";

export interface PipelineSettings {
  segmentPaddingSeconds: number;
  mergeGapSeconds: number;
}

export interface JobPipelineDeps {
  store: JobStore;
  decoder: AudioDecoder;
  diarizer: Diarizer;
  transcriber: Transcriber;
  enhancer: Enhancer;
  logger: Logger;
  settings: PipelineSettings;
  now?: () => Date;
}

export interface JobOutcome {
  jobId: string;
  status: "completed" | "failed";
  error: string | null;
}

/**
 * Runs one job from "processing" to a terminal state.
 *
 * Straight-line and sequential: every stage persists its progress before
 * starting work. Any stage failure records "failed" with the stage name;
 * per-clip transcription failures and LLM analysis failures never do.
 * The upload and the intermediate file are removed after the terminal
 * state has been written, whatever the outcome.
 */
export class JobPipeline {
  private readonly now: () => Date;

  constructor(private readonly deps: JobPipelineDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async run(job: TranscriptionJobData): Promise<JobOutcome> {
    const { decoder, diarizer, transcriber, settings } = this.deps;
    const log = this.deps.logger.child({ jobId: job.jobId });
    const tracker = new JobStateTracker("pending");
    const record = (update: JobRecordUpdate) => this.persist(job.jobId, update, log);

    let stage: PipelineStage = "initialize";
    let processedPath: string | null = null;

    try {
      log.info(`Starting job for file ${job.filePath}`);
      await record(tracker.advance("processing", "Initializing", PROGRESS.init));

      stage = "preprocess";
      log.info("Preprocessing audio...");
      await record(tracker.advance("preprocessing", "Preprocessing audio", PROGRESS.preprocessing));
      const preprocessed = await decoder.preprocess(job.filePath);
      processedPath = preprocessed.processedPath;

      await record(tracker.advance("preprocessing", "Loading audio", PROGRESS.loading));
      const { samples, sampleRate } = await decoder.loadSamples(preprocessed.processedPath);

      stage = "diarize";
      log.info("Running speaker diarization...");
      await record(tracker.advance("diarizing", "Identifying speakers", PROGRESS.diarizing));
      const turns = canonicalizeTurns(
        await diarizer.diarize({
          audioPath: preprocessed.processedPath,
          durationSeconds: preprocessed.durationSeconds,
          expectedSpeakers: job.expectedSpeakers,
        })
      );
      if (turns.length === 0) {
        throw new CollaboratorError("diarizer", "No speakers detected in audio");
      }
      const speakersDetected = countSpeakers(turns);
      log.info(`Detected ${speakersDetected} speakers in ${turns.length} turns`);
      await record(tracker.advance("diarizing", `Detected ${speakersDetected} speakers`, PROGRESS.diarized));

      stage = "segment";
      const clips = segmentAudio(samples, turns, sampleRate, settings.segmentPaddingSeconds);

      stage = "transcribe";
      log.info(`Transcribing ${clips.length} segments...`);
      await record(tracker.advance("transcribing", `Transcribing ${clips.length} segments`, PROGRESS.transcribingStart));
      const band = PROGRESS.transcribingEnd - PROGRESS.transcribingStart;
      const transcribed = await transcribeClips(clips, transcriber, {
        sampleRate,
        logger: log,
        onClipDone: (done, total) =>
          record(
            tracker.advance(
              "transcribing",
              `Transcribing segment ${done}/${total}`,
              PROGRESS.transcribingStart + (band * done) / total
            )
          ),
      });

      stage = "merge";
      const utterances = mergeConsecutiveSegments(transcribed, settings.mergeGapSeconds);
      log.info(`Merged ${transcribed.length} segments into ${utterances.length} utterances`);

      let llmEnhancements: LLMEnhancements | null = null;
      if (job.enableLlmAnalysis) {
        stage = "llm_analysis";
        llmEnhancements = await this.enhance(utterances, tracker, record, log);
      }

      stage = "format";
      log.info(`Formatting response as ${job.responseFormat}...`);
      await record(tracker.advance("formatting", "Formatting response", PROGRESS.formatting));
      const result = formatResult(job.responseFormat, utterances, {
        audioDuration: preprocessed.durationSeconds,
        speakersDetected,
        llmEnhancements,
      });

      stage = "finalize";
      await record({
        ...tracker.advance("completed", "Completed", PROGRESS.completed),
        completedAt: this.now().toISOString(),
        result,
        error: null,
      });
      log.info("Job completed successfully");
      return { jobId: job.jobId, status: "completed", error: null };
    } catch (err) {
      const failure = new StageFailure(job.jobId, stage, err);
      log.error({ err }, failure.message);
      await record({
        ...tracker.advance("failed"),
        error: failure.message,
        completedAt: this.now().toISOString(),
      });
      return { jobId: job.jobId, status: "failed", error: failure.message };
    } finally {
      await removeFileQuietly(job.filePath, log);
      await removeFileQuietly(processedPath ?? decoder.intermediatePathFor(job.filePath), log);
    }
  }

  // Never throws: unavailability and errors end up as progress text only
  private async enhance(
    utterances: TranscribedSegment[],
    tracker: JobStateTracker,
    record: (update: StatusUpdate) => Promise<void>,
    log: Logger
  ): Promise<LLMEnhancements | null> {
    const { enhancer } = this.deps;
    await record(tracker.advance("llm_analysis", "Checking AI analysis availability", PROGRESS.llmStart));
    try {
      if (!(await enhancer.isAvailable())) {
        log.warn("LLM analysis requested but the enhancement service is unavailable");
        await record(tracker.advance("llm_analysis", "AI analysis unavailable, skipped", PROGRESS.llmEnd));
        return null;
      }

      log.info("Generating LLM analysis...");
      await record(tracker.advance("llm_analysis", "Generating AI analysis", PROGRESS.llmGenerating));
      const enhancements = await enhancer.enhance(utterances.map(({ speaker, text }) => ({ speaker, text })));
      await record(
        tracker.advance(
          "llm_analysis",
          enhancements ? "AI analysis completed" : "AI analysis returned no output",
          PROGRESS.llmEnd
        )
      );
      return enhancements;
    } catch (err) {
      log.warn({ err }, `LLM analysis error: ${errorMessage(err)}`);
      await record(tracker.advance("llm_analysis", `AI analysis failed: ${errorMessage(err)}`, PROGRESS.llmEnd));
      return null;
    }
  }

  // Store writes during a run are best effort: a failed write is logged, never retried
  private async persist(jobId: string, update: JobRecordUpdate, log: Logger): Promise<void> {
    try {
      await this.deps.store.update(jobId, update);
    } catch (err) {
      log.warn({ err }, `Could not record ${update.status ?? "progress"} for job ${jobId}`);
    }
  }
}
