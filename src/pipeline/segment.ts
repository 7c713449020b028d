import { DEFAULT_SEGMENT_PADDING_SECONDS } from "../constants.js";
import type { AudioClip, DiarizationTurn } from "../types.js";

/**
 * Cuts one padded clip per diarization turn, in turn order.
 *
 * Padding widens only the audio handed to transcription; the clip keeps
 * the turn's own start/end. Overlapping padded windows are left as they are.
 */
export function segmentAudio(
  audio: Float32Array,
  turns: DiarizationTurn[],
  sampleRate: number,
  paddingSeconds: number = DEFAULT_SEGMENT_PADDING_SECONDS
): AudioClip[] {
  const paddingSamples = Math.floor(paddingSeconds * sampleRate);

  return turns.map((turn) => {
    const startSample = Math.max(0, Math.floor(turn.start * sampleRate) - paddingSamples);
    const endSample = Math.min(audio.length, Math.floor(turn.end * sampleRate) + paddingSamples);

    return {
      audio: audio.subarray(startSample, endSample),
      start: turn.start,
      end: turn.end,
      speaker: turn.speaker,
      startSample,
      endSample,
    };
  });
}
