import { describe, expect, it } from "vitest";
import { ChannelError } from "@agentprobe/adapters";
import type { Scenario } from "@agentprobe/shared";
import { runScenario, type RunScenarioDeps } from "../session/run-scenario.js";
import { FakeAgentChannel, TEST_CREDENTIALS, scriptAgent, testConfig, type AgentScript } from "./fake-agent.js";

const ENGLISH_REPLY = "Sure, I can help you with that today.";
const SPANISH_REPLY = "¡Claro! Puedo ayudarte con tu cuenta hoy.";

function scenario(policy: Scenario["config"]["language_policy"], extra: Partial<Scenario> = {}): Scenario {
  return {
    id: "probe",
    name: "Probe",
    description: "",
    config: { agent_language: "multi", language_policy: policy, prompt: "p" },
    turns: [
      { label: "English", input: { text: "Hello, can you help me?" }, input_language: "en" },
      { label: "Spanish", input: { text: "Hola, necesito ayuda con mi cuenta" }, input_language: "es" },
      { label: "English", input: { text: "Thanks, what about my order?" }, input_language: "en" },
    ],
    ...extra,
  };
}

/** An agent that answers in the language it was spoken to. */
const mirroring: AgentScript = {
  reply: (content) => (content.startsWith("Hola") ? SPANISH_REPLY : ENGLISH_REPLY),
};

function deps(script: AgentScript, setup?: (channel: FakeAgentChannel) => void) {
  const channels: FakeAgentChannel[] = [];
  const d: RunScenarioDeps = {
    createChannel: () => {
      const channel = scriptAgent(new FakeAgentChannel(), script);
      setup?.(channel);
      channels.push(channel);
      return channel;
    },
    credentials: TEST_CREDENTIALS,
    config: testConfig(),
    log: () => {},
    keepaliveTickMs: 5,
  };
  return { deps: d, channels };
}

describe("runScenario", () => {
  it("passes a mirror scenario answered in the user's language", async () => {
    const { deps: d, channels } = deps(mirroring);
    const run = await runScenario(scenario("mirror"), d);

    expect(run.status).toBe("pass");
    expect(run.error).toBeUndefined();
    expect(run.settingsApplied).toBe(true);
    expect(run.turns.map((t) => [t.index, t.status, t.detected_language])).toEqual([
      [1, "pass", "en"],
      [2, "pass", "es"],
      [3, "pass", "en"],
    ]);
    expect(run.turnAudio.map((a) => a.length)).toEqual([9600, 9600, 9600]);
    expect(channels[0]?.connected).toBe(false);
  });

  it("fails the Spanish turn of a strict English scenario that mirrors", async () => {
    const { deps: d } = deps(mirroring);
    const run = await runScenario(scenario("english_only"), d);

    expect(run.status).toBe("fail");
    expect(run.turns[1]).toMatchObject({
      status: "fail",
      failure_reason: "language_mismatch",
      expected_languages: ["en"],
      detected_language: "es",
      response_text: SPANISH_REPLY,
    });
    expect(run.turns[0]?.status).toBe("pass");
    expect(run.turns[2]?.status).toBe("pass");
  });

  it("checks keywords on top of language", async () => {
    const s = scenario("mirror");
    const turns = s.turns.map((t, i) => (i === 2 ? { ...t, expect: { keywords: ["42"] } } : t));
    const { deps: d } = deps(mirroring);
    const run = await runScenario({ ...s, turns }, d);

    expect(run.turns[2]).toMatchObject({
      status: "fail",
      failure_reason: "missing_keywords",
      missing_keywords: ["42"],
      expected_keywords: ["42"],
    });
  });

  it("records a dropped connection as a failed scenario with every turn accounted for", async () => {
    const { deps: d } = deps({
      ...mirroring,
      beforeReply: (channel, turn) => {
        if (turn === 2) channel.drop();
        return turn !== 2;
      },
    });
    const run = await runScenario(scenario("mirror"), d);

    expect(run.status).toBe("fail");
    expect(run.error).toBe("Connection closed (code 1011: agent crashed)");
    expect(run.turns).toHaveLength(3);
    expect(run.turns.map((t) => [t.status, t.failure_reason])).toEqual([
      ["pass", undefined],
      ["fail", "connection_lost"],
      ["fail", "not_sent"],
    ]);
    expect(run.turns[2]?.error).toBe("Connection closed (code 1011: agent crashed)");
    expect(run.turnAudio).toHaveLength(3);
  });

  it("marks every turn not sent when the connection cannot be opened", async () => {
    const { deps: d } = deps(mirroring, (channel) => {
      channel.connectError = new ChannelError("Voice agent connection failed: ECONNREFUSED");
    });
    const run = await runScenario(scenario("mirror"), d);

    expect(run.status).toBe("fail");
    expect(run.settingsApplied).toBe(false);
    expect(run.error).toBe("connect_failed: Voice agent connection failed: ECONNREFUSED");
    expect(run.turns.map((t) => t.failure_reason)).toEqual(["not_sent", "not_sent", "not_sent"]);
  });

  it("fails on rejected settings without sending a turn", async () => {
    const { deps: d, channels } = deps({
      onSettings: (channel) => channel.agent({ type: "Error", code: "INVALID_SETTINGS", description: "bad voice" }),
    });
    const run = await runScenario(scenario("mirror"), d);

    expect(run.error).toBe("settings_rejected: INVALID_SETTINGS: bad voice");
    expect(run.errors).toEqual([{ code: "INVALID_SETTINGS", description: "bad voice" }]);
    expect(channels[0]?.sentTypes()).not.toContain("InjectUserMessage");
    expect(run.turns).toHaveLength(3);
  });

  it("moves on after a turn timeout while the connection is open", async () => {
    const { deps: d } = deps({ reply: (_c, turn) => (turn === 1 ? null : ENGLISH_REPLY) });
    d.config = testConfig({ turn_timeout_ms: 50 });
    const s = scenario("english_only");
    const run = await runScenario(s, d);

    expect(run.turns.map((t) => t.failure_reason)).toEqual(["timeout", undefined, undefined]);
    expect(run.error).toBeUndefined();
    expect(run.status).toBe("fail");
  });

  it("scores each turn on its own reply when an earlier one arrives late", async () => {
    const { deps: d } = deps({ ...mirroring, replyDelayMs: (turn) => (turn === 1 ? 80 : 10) });
    d.config = testConfig({ turn_timeout_ms: 50 });
    const run = await runScenario(scenario("mirror"), d);

    expect(run.turns.map((t) => [t.label, t.status, t.failure_reason, t.response_text])).toEqual([
      ["English", "fail", "timeout", ""],
      ["Spanish", "pass", undefined, SPANISH_REPLY],
      ["English", "pass", undefined, ENGLISH_REPLY],
    ]);
    expect(run.turnAudio.map((a) => a.length)).toEqual([0, 9600, 9600]);
    expect(run.error).toBeUndefined();
  });

  it("fails only the turn whose audio file cannot be read", async () => {
    const s = scenario("mirror");
    const turns = s.turns.map((t, i) => (i === 1 ? { label: "Spoken", input: { audio_file: "/clips/missing.pcm" } } : t));
    const { deps: d, channels } = deps(mirroring);
    d.readAudioFile = async () => {
      throw new Error("ENOENT: no such file");
    };
    const run = await runScenario({ ...s, turns }, d);

    expect(run.error).toBeUndefined();
    expect(run.status).toBe("fail");
    expect(run.turns.map((t) => [t.status, t.failure_reason])).toEqual([
      ["pass", undefined],
      ["fail", "not_sent"],
      ["pass", undefined],
    ]);
    expect(run.turns[1]?.error).toBe("Could not prepare turn input: ENOENT: no such file");
    expect(channels[0]?.sentTypes().filter((t) => t === "InjectUserMessage")).toHaveLength(2);
  });

  it("keeps the greeting audio apart from the turns", async () => {
    const s = scenario("mirror");
    const { deps: d } = deps(mirroring);
    const run = await runScenario({ ...s, config: { ...s.config, greeting: "Hello! How can I help?" } }, d);

    expect(run.greetingAudio?.length).toBe(9600);
    expect(run.conversation[0]).toMatchObject({ role: "assistant", content: "Hello! How can I help?" });
    expect(run.status).toBe("pass");
  });
});
