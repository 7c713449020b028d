import { describe, it, expect } from "vitest";
import { segmentAudio } from "../segment.js";
import type { DiarizationTurn } from "../../types.js";

function ramp(length: number): Float32Array {
  const audio = new Float32Array(length);
  for (let i = 0; i < length; i++) audio[i] = i;
  return audio;
}

describe("segmentAudio", () => {
  const turns: DiarizationTurn[] = [
    { start: 0.2, end: 1.0, speaker: "Speaker A" },
    { start: 1.5, end: 3.0, speaker: "Speaker B" },
    { start: 8.0, end: 10.0, speaker: "Speaker A" },
  ];

  it("produces one clip per turn, in turn order, keeping unpadded bounds", () => {
    const clips = segmentAudio(ramp(100), turns, 10, 0.5);

    expect(clips).toHaveLength(3);
    expect(clips.map((c) => [c.start, c.end, c.speaker])).toEqual([
      [0.2, 1.0, "Speaker A"],
      [1.5, 3.0, "Speaker B"],
      [8.0, 10.0, "Speaker A"],
    ]);
  });

  it("pads the sample window and clamps it to the buffer", () => {
    const clips = segmentAudio(ramp(100), turns, 10, 0.5);

    // 0.2s * 10Hz = 2, minus 5 padding clamps to 0; 1.0s -> 10 + 5
    expect([clips[0].startSample, clips[0].endSample]).toEqual([0, 15]);
    expect([clips[1].startSample, clips[1].endSample]).toEqual([10, 35]);
    // 10.0s -> 100 + 5 clamps to the buffer length
    expect([clips[2].startSample, clips[2].endSample]).toEqual([75, 100]);
  });

  it("slices the audio that belongs to the padded window", () => {
    const clips = segmentAudio(ramp(100), turns, 10, 0.5);

    expect(clips[1].audio.length).toBe(25);
    expect(clips[1].audio[0]).toBe(10);
    expect(clips[1].audio[24]).toBe(34);
  });

  it("keeps overlapping padded windows as they are", () => {
    const clips = segmentAudio(ramp(100), turns, 10, 0.5);

    expect(clips[0].endSample).toBeGreaterThan(clips[1].startSample);
  });

  it("uses the default padding of 0.15s", () => {
    const clips = segmentAudio(ramp(1000), [{ start: 1, end: 2, speaker: "Speaker A" }], 100);

    expect([clips[0].startSample, clips[0].endSample]).toEqual([85, 215]);
  });

  it("returns no clips for no turns", () => {
    expect(segmentAudio(ramp(10), [], 10)).toEqual([]);
  });
});
