import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { MockAgent, getGlobalDispatcher, setGlobalDispatcher, type Dispatcher } from "undici";
import { ClipTranscriptionError } from "../../errors.js";
import {
  HttpTranscriber,
  StubTranscriber,
  buildTranscriptionForm,
  normalizeVerboseJson,
  transcribeClips,
  type ClipTranscript,
  type Transcriber,
} from "../transcribe.js";
import { segmentAudio } from "../segment.js";
import type { AudioClip } from "../../types.js";
import { silentLogger } from "../../utils/logger.js";

function clip(speaker: string, start: number, end: number, startSample: number, endSample: number): AudioClip {
  return { audio: new Float32Array(endSample - startSample), speaker, start, end, startSample, endSample };
}

const clips = [clip("Speaker A", 1.0, 2.0, 5, 25), clip("Speaker B", 3.0, 4.0, 25, 45)];

describe("transcribeClips", () => {
  it("offsets word timings by the turn start", async () => {
    const transcriber: Transcriber = {
      transcribe: async (): Promise<ClipTranscript> => ({
        text: "  hello  ",
        confidence: 0.75,
        words: [{ word: "hello", start: 0.5, end: 1.0, probability: 0.75 }],
      }),
    };

    const segments = await transcribeClips(clips.slice(0, 1), transcriber, { sampleRate: 10, logger: silentLogger() });

    expect(segments).toEqual([
      {
        speaker: "Speaker A",
        start: 1.0,
        end: 2.0,
        text: "hello",
        confidence: 0.75,
        words: [{ word: "hello", start: 1.5, end: 2.0, probability: 0.75 }],
      },
    ]);
  });

  it("ignores padding when placing words on the recording timeline", async () => {
    const [padded] = segmentAudio(new Float32Array(100), [{ start: 2, end: 4, speaker: "Speaker A" }], 10, 0.15);
    const transcriber: Transcriber = {
      transcribe: async () => ({
        text: "late",
        confidence: 1,
        words: [{ word: "late", start: 0.5, end: 0.75, probability: 1 }],
      }),
    };

    const [segment] = await transcribeClips([padded], transcriber, { sampleRate: 10, logger: silentLogger() });

    expect(padded.startSample).toBe(19);
    expect(segment.words).toEqual([{ word: "late", start: 2.5, end: 2.75, probability: 1 }]);
  });

  it("degrades a failing clip to a placeholder and carries on", async () => {
    const transcribe = vi
      .fn<Transcriber["transcribe"]>()
      .mockRejectedValueOnce(new Error("timeout"))
      .mockResolvedValueOnce({ text: "fine", confidence: null, words: [] });

    const segments = await transcribeClips(clips, { transcribe }, { sampleRate: 10, logger: silentLogger() });

    expect(segments).toEqual([
      { speaker: "Speaker A", start: 1.0, end: 2.0, text: "[Transcription failed]", confidence: 0, words: [] },
      { speaker: "Speaker B", start: 3.0, end: 4.0, text: "fine", confidence: null, words: [] },
    ]);
  });

  it("keeps clip order and reports progress after each clip", async () => {
    const seen: string[] = [];
    const progress: string[] = [];
    const transcriber: Transcriber = {
      transcribe: async (samples) => {
        seen.push(String(samples.length));
        return { text: `len ${samples.length}`, confidence: null, words: [] };
      },
    };

    const segments = await transcribeClips(
      [clip("Speaker A", 0, 1, 0, 10), clip("Speaker B", 1, 3, 10, 30)],
      transcriber,
      {
        sampleRate: 10,
        logger: silentLogger(),
        onClipDone: async (done, total) => {
          progress.push(`${done}/${total}`);
        },
      }
    );

    expect(seen).toEqual(["10", "20"]);
    expect(segments.map((s) => s.text)).toEqual(["len 10", "len 20"]);
    expect(progress).toEqual(["1/2", "2/2"]);
  });
});

describe("normalizeVerboseJson", () => {
  it("reads top-level words and averages their probabilities", () => {
    const transcript = normalizeVerboseJson({
      text: " Hi there ",
      words: [
        { word: "Hi", start: 0, end: 0.4, probability: 0.8 },
        { word: "there", start: 0.4, end: 0.9, probability: 0.6 },
      ],
    });

    expect(transcript.text).toBe("Hi there");
    expect(transcript.confidence).toBeCloseTo(0.7, 10);
    expect(transcript.words).toEqual([
      { word: "Hi", start: 0, end: 0.4, probability: 0.8 },
      { word: "there", start: 0.4, end: 0.9, probability: 0.6 },
    ]);
  });

  it("falls back to words nested in segments", () => {
    const transcript = normalizeVerboseJson({
      text: "a b",
      segments: [
        { text: "a", words: [{ word: "a", start: 0, end: 1, probability: 1 }] },
        { text: "b", words: [{ word: "b", start: 1, end: 2, probability: 0.5 }] },
      ],
    });

    expect(transcript.words.map((w) => w.word)).toEqual(["a", "b"]);
    expect(transcript.confidence).toBe(0.75);
  });

  it("looks inside segments when the top-level word list is empty", () => {
    const transcript = normalizeVerboseJson({
      text: "a",
      words: [],
      segments: [{ words: [{ word: "a", start: 0, end: 1, probability: 0.9 }] }],
    });

    expect(transcript.words).toEqual([{ word: "a", start: 0, end: 1, probability: 0.9 }]);
    expect(transcript.confidence).toBe(0.9);
  });

  it("has null confidence when no probability is reported", () => {
    const transcript = normalizeVerboseJson({ text: "x", words: [{ word: "x", start: 0, end: 1 }] });

    expect(transcript.confidence).toBeNull();
    expect(transcript.words[0].probability).toBe(0);
  });
});

describe("StubTranscriber", () => {
  it("returns one word spanning the clip", async () => {
    const result = await new StubTranscriber().transcribe(new Float32Array(25), 10);

    expect(result).toEqual({
      text: "[stub transcript 2.50s]",
      confidence: 1,
      words: [{ word: "[stub transcript 2.50s]", start: 0, end: 2.5, probability: 1 }],
    });
  });
});

describe("buildTranscriptionForm", () => {
  it("asks for verbose json with word timestamps", async () => {
    const form = buildTranscriptionForm(new Float32Array(16), 16000, { model: "large-v3" });

    expect(form.get("model")).toBe("large-v3");
    expect(form.get("response_format")).toBe("verbose_json");
    expect(form.get("timestamp_granularities[]")).toBe("word");
    expect(form.has("language")).toBe(false);
    const file = form.get("file");
    expect(file).toBeInstanceOf(Blob);
    if (file instanceof Blob) {
      expect(file.size).toBe(44 + 32);
      expect(file.type).toBe("audio/wav");
    }
  });

  it("passes the language when one is configured", () => {
    const form = buildTranscriptionForm(new Float32Array(1), 16000, { model: "medium", language: "de" });

    expect(form.get("language")).toBe("de");
  });
});

describe("HttpTranscriber", () => {
  const BASE = "http://asr.test";
  let original: Dispatcher;
  let agent: MockAgent;

  beforeEach(() => {
    original = getGlobalDispatcher();
    agent = new MockAgent();
    agent.disableNetConnect();
    setGlobalDispatcher(agent);
  });

  afterEach(async () => {
    setGlobalDispatcher(original);
    await agent.close();
  });

  const transcriber = () => new HttpTranscriber({ baseUrl: BASE, model: "medium", timeoutMs: 1000 });
  const route = { path: "/openai/v1/audio/transcriptions", method: "POST" };

  it("normalizes a verbose json reply", async () => {
    agent
      .get(BASE)
      .intercept(route)
      .reply(200, { text: " ok ", words: [{ word: "ok", start: 0.1, end: 0.3, probability: 0.5 }] });

    expect(await transcriber().transcribe(new Float32Array(10), 10)).toEqual({
      text: "ok",
      confidence: 0.5,
      words: [{ word: "ok", start: 0.1, end: 0.3, probability: 0.5 }],
    });
  });

  it("raises a clip error on a non-OK reply", async () => {
    agent.get(BASE).intercept(route).reply(503, "busy");

    const attempt = transcriber().transcribe(new Float32Array(10), 10);

    await expect(attempt).rejects.toBeInstanceOf(ClipTranscriptionError);
    await expect(attempt).rejects.toThrow("ASR transcription failed: 503 busy");
  });

  it("rejects a reply without text", async () => {
    agent.get(BASE).intercept(route).reply(200, { words: [] });

    await expect(transcriber().transcribe(new Float32Array(10), 10)).rejects.toThrow(
      /^ASR service returned an unexpected payload/
    );
  });
});
