/**
 * Structured version updates used by the `bump` command.
 *
 * TOML: only the `version` key inside `[package]` changes; dependency tables are left alone.
 * JSON: the document is parsed and re-serialized with 2-space indent and a trailing newline.
 */

const PACKAGE_VERSION_LINE = /^\s*version\s*=\s*"[^"]+"/;
const PACKAGE_VERSION_VALUE = /(version\s*=\s*")[^"]+(")/;

export function updatePackageSectionVersion(text: string, newVersion: string): { text: string; updated: boolean } {
  const lines = text.split("\n");
  let inPackage = false;
  let updated = false;

  const out = lines.map((line) => {
    const trimmed = line.trim();
    if (trimmed === "[package]") {
      inPackage = true;
      return line;
    }
    if (inPackage && trimmed.startsWith("[")) {
      inPackage = false;
    }
    if (inPackage && PACKAGE_VERSION_LINE.test(line)) {
      const next = line.replace(PACKAGE_VERSION_VALUE, `$1${newVersion}$2`);
      if (next !== line) updated = true;
      return next;
    }
    return line;
  });

  return { text: updated ? out.join("\n") : text, updated };
}

export function updateJsonVersion(text: string, newVersion: string): { text: string; updated: boolean } {
  const data: unknown = JSON.parse(text);
  if (!data || typeof data !== "object" || Array.isArray(data)) {
    throw new Error("expected a JSON object at the top level");
  }
  const record: Record<string, unknown> = { ...data };
  if (record.version === newVersion) return { text, updated: false };
  record.version = newVersion;
  return { text: `${JSON.stringify(record, null, 2)}\n`, updated: true };
}
