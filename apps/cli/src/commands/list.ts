import { loadCatalog } from "@agentprobe/scenarios";
import { printCatalog } from "../output.js";

export function listCommand(options: { catalog?: string }): void {
  printCatalog(loadCatalog(options.catalog).list());
}
