import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { MockAgent, getGlobalDispatcher, setGlobalDispatcher, type Dispatcher } from "undici";
import { CollaboratorError } from "../../errors.js";
import {
  HttpDiarizer,
  StubDiarizer,
  buildDiarizeForm,
  canonicalizeTurns,
  countSpeakers,
  speakerLabel,
} from "../diarize.js";

describe("canonicalizeTurns", () => {
  it("sorts by start and relabels speakers in first-seen order", () => {
    const turns = canonicalizeTurns([
      { start: 5, end: 7, speaker: "SPEAKER_01" },
      { start: 0, end: 2, speaker: "SPEAKER_03" },
      { start: 2, end: 4, speaker: "SPEAKER_01" },
      { start: 8, end: 9, speaker: "SPEAKER_00" },
    ]);

    expect(turns).toEqual([
      { start: 0, end: 2, speaker: "Speaker A" },
      { start: 2, end: 4, speaker: "Speaker B" },
      { start: 5, end: 7, speaker: "Speaker B" },
      { start: 8, end: 9, speaker: "Speaker C" },
    ]);
  });

  it("drops turns that do not end after they start", () => {
    const turns = canonicalizeTurns([
      { start: 3, end: 3, speaker: "x" },
      { start: 4, end: 2, speaker: "y" },
      { start: 1, end: 2, speaker: "z" },
    ]);

    expect(turns).toEqual([{ start: 1, end: 2, speaker: "Speaker A" }]);
  });

  it("keeps input order for turns with the same start", () => {
    const turns = canonicalizeTurns([
      { start: 1, end: 2, speaker: "second" },
      { start: 1, end: 3, speaker: "first" },
    ]);

    expect(turns.map((t) => t.end)).toEqual([2, 3]);
  });
});

describe("countSpeakers", () => {
  it("counts distinct labels", () => {
    expect(
      countSpeakers([
        { start: 0, end: 1, speaker: "Speaker A" },
        { start: 1, end: 2, speaker: "Speaker B" },
        { start: 2, end: 3, speaker: "Speaker A" },
      ])
    ).toBe(2);
  });
});

describe("speakerLabel", () => {
  it("maps indices to letters", () => {
    expect(speakerLabel(0)).toBe("Speaker A");
    expect(speakerLabel(2)).toBe("Speaker C");
    expect(speakerLabel(25)).toBe("Speaker Z");
  });

  it("continues with two letters after Z", () => {
    expect(speakerLabel(26)).toBe("Speaker AA");
    expect(speakerLabel(27)).toBe("Speaker AB");
    expect(speakerLabel(51)).toBe("Speaker AZ");
    expect(speakerLabel(52)).toBe("Speaker BA");
  });
});

describe("StubDiarizer", () => {
  it("alternates two speakers over turns of at least two seconds", async () => {
    const turns = await new StubDiarizer().diarize({ audioPath: "unused.wav", durationSeconds: 5 });

    expect(turns).toEqual([
      { start: 0, end: 2, speaker: "Speaker A" },
      { start: 2, end: 4, speaker: "Speaker B" },
      { start: 4, end: 5, speaker: "Speaker A" },
    ]);
  });

  it("splits longer audio into eight turns across the hinted speakers", async () => {
    const turns = await new StubDiarizer().diarize({
      audioPath: "unused.wav",
      durationSeconds: 80,
      expectedSpeakers: 3,
    });

    expect(turns).toHaveLength(8);
    expect(turns[7]).toEqual({ start: 70, end: 80, speaker: "Speaker B" });
  });

  it("returns no turns for empty audio", async () => {
    expect(await new StubDiarizer().diarize({ audioPath: "unused.wav", durationSeconds: 0 })).toEqual([]);
  });
});

describe("buildDiarizeForm", () => {
  it("sends the speaker hint only when one is given", () => {
    const audio = Buffer.from("wav-bytes");

    const hinted = buildDiarizeForm(audio, { audioPath: "/tmp/processed_j1.wav", durationSeconds: 3, expectedSpeakers: 3 });
    const open = buildDiarizeForm(audio, { audioPath: "/tmp/processed_j1.wav", durationSeconds: 3, expectedSpeakers: null });

    expect(hinted.get("num_speakers")).toBe("3");
    expect(open.has("num_speakers")).toBe(false);
    const file = open.get("file");
    expect(file).toBeInstanceOf(Blob);
    if (file instanceof Blob) expect(file.size).toBe(9);
  });
});

describe("HttpDiarizer", () => {
  const BASE = "http://diarizer.test";
  let original: Dispatcher;
  let agent: MockAgent;
  let dir: string;
  let audioPath: string;

  beforeEach(async () => {
    original = getGlobalDispatcher();
    agent = new MockAgent();
    agent.disableNetConnect();
    setGlobalDispatcher(agent);
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "diarize-"));
    audioPath = path.join(dir, "processed_j1.wav");
    await fs.writeFile(audioPath, "wav");
  });

  afterEach(async () => {
    setGlobalDispatcher(original);
    await agent.close();
    await fs.rm(dir, { recursive: true, force: true });
  });

  const diarizer = () => new HttpDiarizer({ baseUrl: BASE, timeoutMs: 1000 });
  const route = { path: "/diarize", method: "POST" };

  it("returns the service's segments", async () => {
    agent
      .get(BASE)
      .intercept(route)
      .reply(200, { segments: [{ start: 0, end: 1.5, speaker: "SPEAKER_00" }] });

    expect(await diarizer().diarize({ audioPath, durationSeconds: 2 })).toEqual([
      { start: 0, end: 1.5, speaker: "SPEAKER_00" },
    ]);
  });

  it("raises a collaborator error on a non-OK reply", async () => {
    agent.get(BASE).intercept(route).reply(500, "out of memory");

    const attempt = diarizer().diarize({ audioPath, durationSeconds: 2 });

    await expect(attempt).rejects.toBeInstanceOf(CollaboratorError);
    await expect(attempt).rejects.toThrow("Diarization failed: 500 out of memory");
  });

  it("rejects segments that do not match the expected shape", async () => {
    agent
      .get(BASE)
      .intercept(route)
      .reply(200, { segments: [{ start: "0", end: 1, speaker: "SPEAKER_00" }] });

    const attempt = diarizer().diarize({ audioPath, durationSeconds: 2 });

    await expect(attempt).rejects.toBeInstanceOf(CollaboratorError);
    await expect(attempt).rejects.toThrow(/^Diarization service returned an unexpected payload/);
  });

  it("fails when the audio file is missing", async () => {
    await expect(
      diarizer().diarize({ audioPath: path.join(dir, "gone.wav"), durationSeconds: 2 })
    ).rejects.toThrow(/^Diarization failed: ENOENT/);
  });
});
