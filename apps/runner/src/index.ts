export { AgentSession, SessionError } from "./session/agent-session.js";
export type { AgentResponse, AgentSessionOptions, ResponseOutcome, SessionErrorKind } from "./session/agent-session.js";
export { runScenario, evaluateTurn } from "./session/run-scenario.js";
export type { RunScenarioDeps, ScenarioRun } from "./session/run-scenario.js";
export { ChatSession, CHAT_SCENARIO_ID } from "./session/chat.js";
export { executeScenarios } from "./executor.js";
export type { ExecuteScenariosOpts, ExecuteScenariosResult } from "./executor.js";
export { buildResultRecord, createRecordId, persistRun, summarize } from "./reporter.js";
export type { PersistedRun, PersistRunOptions, RunSummary } from "./reporter.js";
export * from "./assertions/index.js";
