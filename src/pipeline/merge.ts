import { DEFAULT_MERGE_GAP_SECONDS } from "../constants.js";
import type { TranscribedSegment } from "../types.js";

/**
 * Collapses consecutive same-speaker segments into utterances.
 *
 * Single left-to-right pass: a segment joins the running utterance when it
 * has the same speaker and starts no more than `maxGapSeconds` after the
 * utterance ends. Confidence is averaged pairwise as segments join, so later
 * segments weigh more than a true mean would give them. Input is not mutated.
 */
export function mergeConsecutiveSegments(
  segments: TranscribedSegment[],
  maxGapSeconds: number = DEFAULT_MERGE_GAP_SECONDS
): TranscribedSegment[] {
  if (segments.length === 0) return [];

  const merged: TranscribedSegment[] = [];
  let current = cloneSegment(segments[0]);

  for (const segment of segments.slice(1)) {
    if (segment.speaker === current.speaker && segment.start - current.end <= maxGapSeconds) {
      current.end = segment.end;
      current.text = `${current.text} ${segment.text}`;
      current.words.push(...segment.words);
      if (current.confidence !== null && segment.confidence !== null) {
        current.confidence = (current.confidence + segment.confidence) / 2;
      }
    } else {
      merged.push(current);
      current = cloneSegment(segment);
    }
  }

  merged.push(current);
  return merged;
}

function cloneSegment(segment: TranscribedSegment): TranscribedSegment {
  return { ...segment, words: [...segment.words] };
}
