import { DEFAULT_AUDIO_DIR, DEFAULT_RESULTS_DIR } from "@agentprobe/shared";
import { LocalArtifactStore } from "./local.js";
import type { StorageConfig } from "./local.js";

export type { StorageConfig } from "./local.js";
export { LocalArtifactStore, ArtifactExistsError } from "./local.js";

export function createStorageClient(config?: Partial<StorageConfig>): LocalArtifactStore {
  return new LocalArtifactStore({
    resultsDir: config?.resultsDir ?? process.env["RESULTS_DIR"] ?? DEFAULT_RESULTS_DIR,
    audioDir: config?.audioDir ?? process.env["AUDIO_DIR"] ?? DEFAULT_AUDIO_DIR,
  });
}
