import { createInterface } from "node:readline/promises";
import type { Scenario } from "@agentprobe/shared";
import type { ScenarioCatalog } from "@agentprobe/scenarios";
import { printCatalog } from "./output.js";

/** Selectors typed at the prompt: "3", "T1 T4", "all", "1,2". */
export function parseSelection(answer: string): string[] {
  return answer
    .split(/[\s,]+/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * Numbered scenario menu. Resolves the chosen scenarios, or an empty list
 * when nothing was entered.
 */
export async function promptForScenarios(catalog: ScenarioCatalog): Promise<Scenario[]> {
  printCatalog(catalog.list());

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(`Select scenario (1-${catalog.size}, id or "all"): `);
    const selectors = parseSelection(answer);
    return selectors.length > 0 ? catalog.select(selectors) : [];
  } finally {
    rl.close();
  }
}
