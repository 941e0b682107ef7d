import { randomBytes } from "node:crypto";
import { ResultRecordSchema } from "@agentprobe/shared";
import type { AudioFileRecord, ResultRecord, RunStatus } from "@agentprobe/shared";
import { ArtifactExistsError, type LocalArtifactStore } from "@agentprobe/artifacts";
import { pcmDurationMs } from "@agentprobe/voice";
import type { ScenarioRun } from "./session/run-scenario.js";

const MAX_ID_ATTEMPTS = 5;

/**
 * `<scenario_id>_<YYYYMMDD_HHmmss_SSS>_<4 hex>`, timestamp in UTC.
 */
export function createRecordId(
  scenarioId: string,
  at: Date = new Date(),
  random: () => string = () => randomBytes(2).toString("hex"),
): string {
  const pad = (n: number, width = 2) => String(n).padStart(width, "0");
  const date = `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}`;
  const time = `${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`;
  return `${scenarioId}_${date}_${time}_${pad(at.getUTCMilliseconds(), 3)}_${random()}`;
}

export function buildResultRecord(id: string, run: ScenarioRun, audioFiles: AudioFileRecord[]): ResultRecord {
  const turns = run.turns.map((turn) => {
    const file = audioFiles.find((f) => f.turn === turn.index);
    return file ? { ...turn, audio_file: file.file } : turn;
  });

  const record: ResultRecord = {
    id,
    scenario_id: run.scenario.id,
    scenario_name: run.scenario.name,
    description: run.scenario.description,
    started_at: run.startedAt.toISOString(),
    finished_at: run.finishedAt.toISOString(),
    duration_ms: Math.max(0, run.finishedAt.getTime() - run.startedAt.getTime()),
    status: run.status,
    config: run.scenario.config,
    settings_applied: run.settingsApplied,
    turns,
    conversation: run.conversation,
    errors: run.errors,
    warnings: run.warnings,
    audio_files: audioFiles,
  };
  if (run.error !== undefined) record.error = run.error;

  return ResultRecordSchema.parse(record);
}

export interface PersistedRun {
  record: ResultRecord;
  resultPath: string;
}

export interface PersistRunOptions {
  createId?: (scenarioId: string, at: Date) => string;
  log?: (line: string) => void;
}

/**
 * Write the run's audio and then its record. A name collision anywhere
 * means another run took this id: the files already written under it are
 * removed and the run is written again under a fresh one.
 */
export async function persistRun(
  run: ScenarioRun,
  store: LocalArtifactStore,
  options: PersistRunOptions = {},
): Promise<PersistedRun> {
  const createId = options.createId ?? createRecordId;
  const log = options.log ?? console.log;

  for (let attempt = 1; ; attempt++) {
    const id = createId(run.scenario.id, run.startedAt);
    const written: string[] = [];
    try {
      const audioFiles = await writeAudio(id, run, store, written);
      const record = buildResultRecord(id, run, audioFiles);
      const resultPath = await store.writeResult(id, record);
      return { record, resultPath };
    } catch (err) {
      if (err instanceof ArtifactExistsError && attempt < MAX_ID_ATTEMPTS) {
        await Promise.all(written.map((path) => store.remove(path)));
        log(`    ${err.message}, retrying with a new id`);
        continue;
      }
      throw err;
    }
  }
}

async function writeAudio(
  id: string,
  run: ScenarioRun,
  store: LocalArtifactStore,
  written: string[],
): Promise<AudioFileRecord[]> {
  const files: AudioFileRecord[] = [];

  if (run.greetingAudio && run.greetingAudio.length > 0) {
    const path = await store.writeAudio(`${id}_greeting`, run.greetingAudio);
    written.push(path);
    files.push(audioRecord(path, run.greetingAudio, "greeting"));
  }

  for (const [i, audio] of run.turnAudio.entries()) {
    if (audio.length === 0) continue;
    const turn = i + 1;
    const path = await store.writeAudio(`${id}_turn${turn}`, audio);
    written.push(path);
    files.push(audioRecord(path, audio, turn));
  }

  return files;
}

function audioRecord(file: string, audio: Buffer, turn: AudioFileRecord["turn"]): AudioFileRecord {
  return { file, size_bytes: audio.length, duration_ms: pcmDurationMs(audio.length), turn };
}

export interface RunSummary {
  status: RunStatus;
  total: number;
  passed: number;
  failed: number;
  turns: { total: number; passed: number; failed: number };
  audio_files: number;
  audio_bytes: number;
  total_duration_ms: number;
}

export function summarize(records: readonly ResultRecord[]): RunSummary {
  const passed = records.filter((r) => r.status === "pass").length;
  const allTurns = records.flatMap((r) => r.turns);
  const turnsPassed = allTurns.filter((t) => t.status === "pass").length;
  const audio = records.flatMap((r) => r.audio_files);

  return {
    status: passed === records.length ? "pass" : "fail",
    total: records.length,
    passed,
    failed: records.length - passed,
    turns: { total: allTurns.length, passed: turnsPassed, failed: allTurns.length - turnsPassed },
    audio_files: audio.length,
    audio_bytes: audio.reduce((sum, f) => sum + f.size_bytes, 0),
    total_duration_ms: records.reduce((sum, r) => sum + r.duration_ms, 0),
  };
}
