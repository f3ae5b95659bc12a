import { readFileSync, writeFileSync } from "node:fs";

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Parse the body of a `.env` file. Blank lines and `#` comments are skipped,
 * inline ` # comments` are stripped and surrounding quotes are removed.
 */
export function parseEnv(raw: string): Record<string, string> {
  const vars: Record<string, string> = {};
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eqIdx = trimmed.indexOf("=");
    if (eqIdx === -1) continue;
    const key = trimmed.slice(0, eqIdx).trim();
    if (!key) continue;
    vars[key] = unquote(trimmed.slice(eqIdx + 1).trim());
  }
  return vars;
}

function unquote(rawValue: string): string {
  const quote = rawValue[0];
  if ((quote === '"' || quote === "'") && rawValue.indexOf(quote, 1) > 0) {
    return rawValue.slice(1, rawValue.indexOf(quote, 1));
  }
  return rawValue.replace(/\s+#.*$/, "").trim();
}

/**
 * Load `.env` into `target` without overriding keys that are already set.
 * A missing file is not an error; production injects real variables.
 */
export function loadDotenv(path = ".env", target: NodeJS.ProcessEnv = process.env): void {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch {
    return;
  }
  for (const [key, value] of Object.entries(parseEnv(raw))) {
    if (!(key in target)) target[key] = value;
  }
}

// ---------------------------------------------------------------------------
// Writing
// ---------------------------------------------------------------------------

function formatValue(value: string): string {
  return /[\s#"']/.test(value) ? `"${value.replace(/"/g, "")}"` : value;
}

/**
 * Merge `updates` into an existing `.env` body. Comments, blank lines and
 * unrelated keys are kept where they are; changed keys are rewritten in place
 * (keeping a trailing comment), new keys are appended in insertion order.
 */
export function mergeEnv(existing: string, updates: Record<string, string>): string {
  const lines = existing.length > 0 ? existing.replace(/\r?\n$/, "").split(/\r?\n/) : [];
  const written = new Set<string>();

  const merged = lines.map((line) => {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) return line;
    const eqIdx = trimmed.indexOf("=");
    if (eqIdx === -1) return line;
    const key = trimmed.slice(0, eqIdx).trim();
    if (!(key in updates) || written.has(key)) return line;
    written.add(key);
    const comment = trimmed.match(/\s+#.*$/)?.[0] ?? "";
    return `${key}=${formatValue(updates[key] ?? "")}${comment}`;
  });

  for (const [key, value] of Object.entries(updates)) {
    if (!written.has(key)) merged.push(`${key}=${formatValue(value)}`);
  }

  return merged.join("\n") + "\n";
}

export function writeEnvFile(path: string, updates: Record<string, string>): void {
  let existing = "";
  try {
    existing = readFileSync(path, "utf-8");
  } catch {
    // first run: start from an empty file
  }
  writeFileSync(path, mergeEnv(existing, updates), "utf-8");
}
