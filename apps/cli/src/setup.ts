import { createAgentChannel, type AgentChannelFactory } from "@agentprobe/adapters";
import { createStorageClient, type LocalArtifactStore } from "@agentprobe/artifacts";
import { loadConfig, loadCredentials } from "@agentprobe/config";
import type { Credentials, ProjectConfig } from "@agentprobe/shared";

export interface GlobalOptions {
  config?: string;
  verbose?: boolean;
}

export interface Harness {
  config: ProjectConfig;
  credentials: Credentials;
  store: LocalArtifactStore;
  createChannel: AgentChannelFactory;
}

/**
 * Everything a live run needs. Throws ConfigError before any connection
 * is attempted when credentials or agentprobe.json are wrong.
 */
export function createHarness(options: GlobalOptions, debug: (msg: string) => void): Harness {
  const config = loadConfig(process.cwd(), options.config);
  const credentials = loadCredentials();

  debug(`agent-url: ${config.agent_url}`);
  debug(`models: stt=${config.models.stt} llm=${config.models.llm} tts=${config.models.tts}`);
  debug(`results: ${config.results_dir}  audio: ${config.audio_dir}`);
  debug(`keepalive: ${config.keepalive_interval_ms}ms  turn timeout: ${config.turn_timeout_ms}ms`);

  return {
    config,
    credentials,
    store: createStorageClient({ resultsDir: config.results_dir, audioDir: config.audio_dir }),
    createChannel: () =>
      createAgentChannel({ agentUrl: config.agent_url, apiKey: credentials.deepgramApiKey }),
  };
}
