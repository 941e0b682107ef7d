import { DeepgramAgentChannel } from "./deepgram-agent-channel.js";
import type { AgentChannel } from "./agent-channel.js";

export type { AgentChannel, AgentChannelEvents, DisconnectInfo } from "./agent-channel.js";
export { BaseAgentChannel } from "./agent-channel.js";
export { DeepgramAgentChannel, type DeepgramAgentChannelConfig } from "./deepgram-agent-channel.js";
export { ChannelError } from "./errors.js";
export { buildSettings, type SettingsOptions } from "./settings.js";
export { KeepAliveTimer, type KeepAliveOptions } from "./keepalive.js";
export {
  parseServerEvent,
  KnownServerEventSchema,
  type AgentClientMessage,
  type AgentServerEvent,
  type AgentSettingsMessage,
  type InjectUserMessage,
  type KeepAliveMessage,
  type KnownServerEvent,
  type OtherServerEvent,
} from "./types.js";

export interface AgentChannelConfig {
  agentUrl: string;
  apiKey: string;
  connectTimeoutMs?: number;
}

export type AgentChannelFactory = () => AgentChannel;

export function createAgentChannel(config: AgentChannelConfig): AgentChannel {
  return new DeepgramAgentChannel({
    url: config.agentUrl,
    apiKey: config.apiKey,
    connectTimeoutMs: config.connectTimeoutMs,
  });
}
