export * from "./types.js";
export { pcmDurationMs, silence, chunkPcm } from "./pcm.js";
export { AudioRecorder } from "./recorder.js";
