/**
 * Voice-note metadata for outgoing audio: duration read from Ogg/Opus
 * granule positions and a placeholder waveform for clients that draw one.
 */

export const DEFAULT_VOICE_SECONDS = 30;
const MAX_VOICE_SECONDS = 300;
const OPUS_RATE = 48_000;
const WAVEFORM_POINTS = 64;

const CAPTURE = 'OggS';
const PAGE_HEADER = 27;
const NO_GRANULE = 0xffffffffffffffffn;

export function isOggOpus(mimetype: string): boolean {
  const m = mimetype.toLowerCase();
  return m.includes('ogg') || m.includes('opus');
}

/**
 * Whole seconds of an Ogg/Opus stream, clamped to 1..300, or null when the
 * bytes are not Ogg or carry no granule position.
 */
export function oggOpusSeconds(bytes: Buffer): number | null {
  if (bytes.length < 4 || bytes.toString('latin1', 0, 4) !== CAPTURE) return null;

  let lastGranule = 0n;
  let preSkip = 0;
  let i = 0;
  while (i + PAGE_HEADER <= bytes.length) {
    if (bytes.toString('latin1', i, i + 4) !== CAPTURE) {
      i++;
      continue;
    }
    const segments = bytes.readUInt8(i + 26);
    const bodyStart = i + PAGE_HEADER + segments;
    if (bodyStart > bytes.length) break;
    let bodySize = 0;
    for (let s = i + PAGE_HEADER; s < bodyStart; s++) bodySize += bytes.readUInt8(s);

    // OpusHead: magic(8) version(1) channels(1) pre-skip(2, LE)
    if (bodyStart + 12 <= bytes.length && bytes.toString('latin1', bodyStart, bodyStart + 8) === 'OpusHead') {
      preSkip = bytes.readUInt16LE(bodyStart + 10);
    }
    const granule = bytes.readBigUInt64LE(i + 6);
    if (granule !== 0n && granule !== NO_GRANULE) lastGranule = granule;

    i = bodyStart + bodySize;
  }

  if (lastGranule === 0n) return null;
  const samples = lastGranule > BigInt(preSkip) ? lastGranule - BigInt(preSkip) : 0n;
  const seconds = Number(samples) / OPUS_RATE;
  return Math.ceil(Math.min(Math.max(seconds, 1), MAX_VOICE_SECONDS));
}

// mulberry32
function seededRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** 64 amplitude points in 0..100, deterministic for a given duration. */
export function placeholderWaveform(seconds: number): Buffer {
  const random = seededRandom(seconds);
  const baseAmp = 35;
  const freq = Math.min(seconds, 120) / 30;
  const points = Buffer.alloc(WAVEFORM_POINTS);
  for (let i = 0; i < WAVEFORM_POINTS; i++) {
    const pos = i / WAVEFORM_POINTS;
    let val = baseAmp * Math.sin(pos * Math.PI * freq * 8) + (baseAmp / 2) * Math.sin(pos * Math.PI * freq * 16);
    val += (random() - 0.5) * 15;
    val = val * (0.7 + 0.3 * Math.sin(pos * Math.PI)) + 50;
    points[i] = Math.floor(Math.min(Math.max(val, 0), 100));
  }
  return points;
}
