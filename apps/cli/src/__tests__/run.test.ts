import { afterEach, describe, expect, it, vi } from "vitest";
import { ConfigError } from "@agentprobe/config";
import { promptForScenarios } from "../prompt.js";
import { runCommand } from "../commands/run.js";

vi.mock("../prompt.js", () => ({
  promptForScenarios: vi.fn(async () => []),
}));

describe("runCommand", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("stops on missing credentials before showing the scenario menu", async () => {
    vi.stubEnv("DEEPGRAM_API_KEY", "");
    vi.stubEnv("CARTESIA_API_KEY", "test-secret");
    vi.stubEnv("CARTESIA_VOICE_ID", "test-voice");
    vi.spyOn(console, "log").mockImplementation(() => {});

    const run = runCommand([], {});

    await expect(run).rejects.toBeInstanceOf(ConfigError);
    await expect(run).rejects.toThrow("Missing required environment variable: DEEPGRAM_API_KEY");
    expect(promptForScenarios).not.toHaveBeenCalled();
  });
});
