import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";

type EnvEntry = { key: string; value: string };

const parseLine = (line: string): EnvEntry | null => {
  const trimmed = line.trim();
  if (trimmed.length === 0 || trimmed.startsWith("#")) return null;

  const withoutExport = trimmed.startsWith("export ") ? trimmed.slice(7).trim() : trimmed;
  const idx = withoutExport.indexOf("=");
  if (idx <= 0) return null;

  const key = withoutExport.slice(0, idx).trim();
  let value = withoutExport.slice(idx + 1).trim();
  const quoted = (value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"));
  if (quoted && value.length >= 2) {
    value = value.slice(1, -1);
  }

  return { key, value };
};

export const parseEnvText = (content: string): EnvEntry[] =>
  content.split(/\r?\n/).flatMap((line) => {
    const parsed = parseLine(line);
    return parsed ? [parsed] : [];
  });

/** Copies `.env` entries into `target` without overriding values already set in the shell. */
export const loadEnvFile = (filePath = ".env", target: NodeJS.ProcessEnv = process.env): string[] => {
  const absolute = resolve(process.cwd(), filePath);
  if (!existsSync(absolute)) return [];

  const applied: string[] = [];
  for (const entry of parseEnvText(readFileSync(absolute, "utf8"))) {
    if (target[entry.key] === undefined) {
      target[entry.key] = entry.value;
      applied.push(entry.key);
    }
  }
  return applied;
};
