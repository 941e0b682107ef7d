import { readFileSync, existsSync } from "node:fs";
import { dirname, isAbsolute, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { CatalogSchema, ScenarioConfigSchema } from "@agentprobe/shared";
import type { Scenario, ScenarioConfig, Turn } from "@agentprobe/shared";

export const BUILTIN_CATALOG_PATH = fileURLToPath(
  new URL("../catalog/scenarios.json", import.meta.url),
);

export const CHAT_CONFIG_PATH = fileURLToPath(
  new URL("../catalog/custom-conversation.json", import.meta.url),
);

export class UnknownScenarioError extends Error {
  readonly selector: string;
  readonly available: string[];

  constructor(selector: string, available: string[]) {
    super(`Unknown scenario: ${selector}. Available: ${available.join(", ")}`);
    this.name = "UnknownScenarioError";
    this.selector = selector;
    this.available = available;
  }
}

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}

/**
 * Read-only lookup from selector to Scenario.
 *
 * A selector is "all", a 1-based index, an exact id, a case-insensitive
 * name, or an id prefix that stops at "_" ("T3" → "T3_strict_english_only").
 */
export class ScenarioCatalog {
  readonly source: string;
  private readonly scenarios: readonly Scenario[];

  constructor(scenarios: Scenario[], source: string) {
    this.scenarios = Object.freeze(scenarios.map(deepFreeze));
    this.source = source;
  }

  get size(): number {
    return this.scenarios.length;
  }

  list(): readonly Scenario[] {
    return this.scenarios;
  }

  ids(): string[] {
    return this.scenarios.map((s) => s.id);
  }

  /** Resolve one selector to exactly one scenario. */
  get(selector: string): Scenario {
    const matches = this.match(selector);
    const [only] = matches;
    if (!only || matches.length > 1) {
      throw new UnknownScenarioError(
        matches.length > 1 ? `${selector} (ambiguous: ${matches.map((s) => s.id).join(", ")})` : selector,
        this.ids(),
      );
    }
    return only;
  }

  /**
   * Resolve several selectors. Results keep catalog order and each
   * scenario appears once however many selectors hit it.
   */
  select(selectors: string[]): Scenario[] {
    const wanted = new Set<Scenario>();
    for (const selector of selectors) {
      const matches = this.match(selector);
      if (matches.length === 0) throw new UnknownScenarioError(selector, this.ids());
      for (const s of matches) wanted.add(s);
    }
    return this.scenarios.filter((s) => wanted.has(s));
  }

  private match(selector: string): Scenario[] {
    const sel = selector.trim();
    if (sel.toLowerCase() === "all") return [...this.scenarios];

    if (/^\d+$/.test(sel)) {
      const scenario = this.scenarios[Number(sel) - 1];
      return scenario ? [scenario] : [];
    }

    const exact = this.scenarios.find((s) => s.id === sel);
    if (exact) return [exact];

    const lowered = sel.toLowerCase();
    const byName = this.scenarios.filter((s) => s.name.toLowerCase() === lowered);
    if (byName.length > 0) return byName;

    return this.scenarios.filter((s) => s.id.toLowerCase().startsWith(`${lowered}_`));
  }
}

/**
 * Load a catalog file. Relative audio_file paths resolve against the
 * file's directory.
 */
export function loadCatalog(catalogPath: string = BUILTIN_CATALOG_PATH): ScenarioCatalog {
  const fullPath = resolve(catalogPath);
  if (!existsSync(fullPath)) {
    throw new CatalogError(`Scenario catalog not found: ${fullPath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(fullPath, "utf-8"));
  } catch (err) {
    throw new CatalogError(
      `Invalid JSON in ${fullPath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  return new ScenarioCatalog(validateCatalog(raw, dirname(fullPath)), fullPath);
}

/** Agent config for the interactive chat, which has no scripted turns. */
export function loadChatConfig(configPath: string = CHAT_CONFIG_PATH): ScenarioConfig {
  const fullPath = resolve(configPath);
  if (!existsSync(fullPath)) {
    throw new CatalogError(`Chat config not found: ${fullPath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(fullPath, "utf-8"));
  } catch (err) {
    throw new CatalogError(
      `Invalid JSON in ${fullPath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const parsed = ScenarioConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new CatalogError(`Invalid chat config: ${issues}`);
  }
  return deepFreeze(parsed.data);
}

export function validateCatalog(data: unknown, baseDir: string = process.cwd()): Scenario[] {
  const parsed = CatalogSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new CatalogError(`Invalid scenario catalog: ${issues}`);
  }

  return parsed.data.scenarios.map((scenario) => ({
    ...scenario,
    turns: scenario.turns.map((turn) => resolveTurnPaths(turn, baseDir)),
  }));
}

function resolveTurnPaths(turn: Turn, baseDir: string): Turn {
  if ("audio_file" in turn.input && !isAbsolute(turn.input.audio_file)) {
    return { ...turn, input: { audio_file: resolve(baseDir, turn.input.audio_file) } };
  }
  return turn;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
