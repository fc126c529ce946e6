import { readFileSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";

const __dirname = dirname(fileURLToPath(import.meta.url));
const DATA_DIR = join(__dirname, "../../data");

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Read a lookup table from data/. Tables are shared by every pipeline run,
 * so the parsed value is frozen before it is handed out.
 */
export function loadDataFile<T>(fileName: string): T {
  const parsed: T = JSON.parse(readFileSync(join(DATA_DIR, fileName), "utf-8"));
  return deepFreeze(parsed);
}
