export interface DecodedAudio {
  samples: Float32Array;
  sampleRate: number;
}

const PCM = 1;
const IEEE_FLOAT = 3;

/**
 * Encodes mono float samples as a 16-bit PCM RIFF/WAVE buffer.
 * Samples outside [-1, 1] are clipped.
 */
export function encodeWav(samples: Float32Array, sampleRate: number): Buffer {
  const dataBytes = samples.length * 2;
  const buf = Buffer.alloc(44 + dataBytes);

  buf.write("RIFF", 0, "ascii");
  buf.writeUInt32LE(36 + dataBytes, 4);
  buf.write("WAVE", 8, "ascii");
  buf.write("fmt ", 12, "ascii");
  buf.writeUInt32LE(16, 16);
  buf.writeUInt16LE(PCM, 20);
  buf.writeUInt16LE(1, 22); // mono
  buf.writeUInt32LE(sampleRate, 24);
  buf.writeUInt32LE(sampleRate * 2, 28); // byte rate
  buf.writeUInt16LE(2, 32); // block align
  buf.writeUInt16LE(16, 34);
  buf.write("data", 36, "ascii");
  buf.writeUInt32LE(dataBytes, 40);

  for (let i = 0; i < samples.length; i++) {
    const clipped = Math.max(-1, Math.min(1, samples[i]));
    const value = clipped < 0 ? Math.round(clipped * 0x8000) : Math.round(clipped * 0x7fff);
    buf.writeInt16LE(value, 44 + i * 2);
  }
  return buf;
}

/**
 * Decodes a RIFF/WAVE buffer (PCM16 or float32) into mono float samples.
 * Multi-channel input is down-mixed by averaging.
 */
export function decodeWav(buf: Buffer): DecodedAudio {
  if (buf.length < 12 || buf.toString("ascii", 0, 4) !== "RIFF" || buf.toString("ascii", 8, 12) !== "WAVE") {
    throw new Error("Not a RIFF/WAVE file");
  }

  let format: { audioFormat: number; channels: number; sampleRate: number; bitsPerSample: number } | null = null;
  let offset = 12;

  // Walk chunks; ffmpeg may emit LIST before data
  while (offset + 8 <= buf.length) {
    const id = buf.toString("ascii", offset, offset + 4);
    const size = buf.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (id === "fmt ") {
      format = {
        audioFormat: buf.readUInt16LE(body),
        channels: buf.readUInt16LE(body + 2),
        sampleRate: buf.readUInt32LE(body + 4),
        bitsPerSample: buf.readUInt16LE(body + 14),
      };
    } else if (id === "data") {
      if (!format) throw new Error("WAVE data chunk precedes fmt chunk");
      const end = Math.min(buf.length, body + size);
      return { samples: readSamples(buf, body, end, format), sampleRate: format.sampleRate };
    }
    offset = body + size + (size % 2);
  }
  throw new Error("WAVE file has no data chunk");
}

function readSamples(
  buf: Buffer,
  start: number,
  end: number,
  format: { audioFormat: number; channels: number; bitsPerSample: number }
): Float32Array {
  const { audioFormat, channels, bitsPerSample } = format;
  const bytesPerSample = bitsPerSample / 8;
  let read: (pos: number) => number;

  if (audioFormat === PCM && bitsPerSample === 16) {
    read = (pos) => buf.readInt16LE(pos) / 0x8000;
  } else if (audioFormat === IEEE_FLOAT && bitsPerSample === 32) {
    read = (pos) => buf.readFloatLE(pos);
  } else {
    throw new Error(`Unsupported WAVE encoding (format=${audioFormat}, bits=${bitsPerSample})`);
  }

  const frameBytes = bytesPerSample * channels;
  const frames = Math.floor((end - start) / frameBytes);
  const out = new Float32Array(frames);
  for (let f = 0; f < frames; f++) {
    let sum = 0;
    for (let c = 0; c < channels; c++) {
      sum += read(start + f * frameBytes + c * bytesPerSample);
    }
    out[f] = sum / channels;
  }
  return out;
}
