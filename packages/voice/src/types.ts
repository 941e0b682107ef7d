import { INPUT_SAMPLE_RATE, OUTPUT_SAMPLE_RATE } from "@agentprobe/shared";

export interface AudioConfig {
  encoding: "linear16";
  sampleRate: number;
  channels: number;
}

/** What we stream to the agent: 16kHz linear16 mono. */
export const INPUT_AUDIO_CONFIG: AudioConfig = {
  encoding: "linear16",
  sampleRate: INPUT_SAMPLE_RATE,
  channels: 1,
};

/** What the agent streams back: 24kHz linear16 mono, no container. */
export const OUTPUT_AUDIO_CONFIG: AudioConfig = {
  encoding: "linear16",
  sampleRate: OUTPUT_SAMPLE_RATE,
  channels: 1,
};

export function bytesPerSecond(config: AudioConfig): number {
  return config.sampleRate * 2 * config.channels;
}
