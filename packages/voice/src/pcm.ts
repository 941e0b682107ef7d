/**
 * Byte-level helpers for raw linear16 PCM. The audio itself is never decoded.
 */

import { bytesPerSecond, OUTPUT_AUDIO_CONFIG, type AudioConfig } from "./types.js";

export function pcmDurationMs(bytes: number, config: AudioConfig = OUTPUT_AUDIO_CONFIG): number {
  return Math.round((bytes / bytesPerSecond(config)) * 1000);
}

/** Zero-filled PCM of the given length, rounded down to whole samples. */
export function silence(durationMs: number, config: AudioConfig): Buffer {
  const bytes = Math.floor((bytesPerSecond(config) * durationMs) / 1000);
  return Buffer.alloc(bytes - (bytes % (2 * config.channels)));
}

/** Split PCM into frames of at most `chunkBytes`; the last frame may be shorter. */
export function chunkPcm(pcm: Buffer, chunkBytes: number): Buffer[] {
  if (chunkBytes <= 0) throw new Error(`Invalid chunk size: ${chunkBytes}`);
  const chunks: Buffer[] = [];
  for (let offset = 0; offset < pcm.length; offset += chunkBytes) {
    chunks.push(pcm.subarray(offset, offset + chunkBytes));
  }
  return chunks;
}
