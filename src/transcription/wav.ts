/**
 * Raw PCM helpers for engines that want a WAV container.
 *
 * Capture hands us mono float32 little-endian samples. Samples are scaled
 * into [-1, 1] when the peak exceeds it, then written as 16-bit PCM.
 */

const WAV_HEADER_BYTES = 44;

export function readFloat32Samples(pcm: Buffer): Float32Array {
  const count = Math.floor(pcm.length / 4);
  const samples = new Float32Array(count);
  for (let i = 0; i < count; i++) {
    samples[i] = pcm.readFloatLE(i * 4);
  }
  return samples;
}

export function normalizeSamples(samples: Float32Array): Float32Array {
  let peak = 0;
  for (const sample of samples) {
    const magnitude = Math.abs(sample);
    if (Number.isFinite(magnitude) && magnitude > peak) peak = magnitude;
  }
  if (peak <= 1) return samples;

  const scaled = new Float32Array(samples.length);
  for (let i = 0; i < samples.length; i++) {
    scaled[i] = samples[i] / peak;
  }
  return scaled;
}

export function encodeWav16(samples: Float32Array, sampleRate: number): Buffer {
  const dataBytes = samples.length * 2;
  const out = Buffer.alloc(WAV_HEADER_BYTES + dataBytes);

  out.write('RIFF', 0, 'ascii');
  out.writeUInt32LE(36 + dataBytes, 4);
  out.write('WAVE', 8, 'ascii');
  out.write('fmt ', 12, 'ascii');
  out.writeUInt32LE(16, 16); // fmt chunk size
  out.writeUInt16LE(1, 20); // PCM
  out.writeUInt16LE(1, 22); // mono
  out.writeUInt32LE(sampleRate, 24);
  out.writeUInt32LE(sampleRate * 2, 28); // byte rate
  out.writeUInt16LE(2, 32); // block align
  out.writeUInt16LE(16, 34);
  out.write('data', 36, 'ascii');
  out.writeUInt32LE(dataBytes, 40);

  for (let i = 0; i < samples.length; i++) {
    const clamped = Number.isFinite(samples[i]) ? Math.max(-1, Math.min(1, samples[i])) : 0;
    out.writeInt16LE(Math.round(clamped * 0x7fff), WAV_HEADER_BYTES + i * 2);
  }
  return out;
}

export function pcmFloat32ToWav(pcm: Buffer, sampleRate: number): Buffer {
  return encodeWav16(normalizeSamples(readFloat32Samples(pcm)), sampleRate);
}
