import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";

/** cosmiconfig module name: `.bionicrc*` files and the `bionic` key of package.json */
export const MODULE_NAME = "bionic";

export function getBuiltinStubDir(): string {
  // src/ and dist/ both sit next to stubs/
  const here = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(here, "../stubs");
}

/** `--config strong` means the `strong.stub` preset; dotfiles and names with an extension are real paths. */
export function appendStubIfNoExt(input: string): string {
  const base = path.basename(input);
  if (base.startsWith(".")) return input;
  if (path.extname(base)) return input;
  return input + ".stub";
}

// stubs and extensionless rc files may hold YAML or JSON
export function parseUnknownConfig(content: string): unknown {
  return YAML.parse(content);
}

/** `outDir: ${BOOKS}/bionic` or `~/bionic`: env references and a leading `~` are resolved. */
export function envExpand(input: string | undefined): string {
  if (!input) return "";
  let s = String(input);

  s = s.replace(/\$\{([^}]+)\}/g, (_, name: string) => process.env[name] ?? "");
  s = s.replace(/(?<!\$)\$([A-Za-z_][A-Za-z0-9_]*)/g, (_, name: string) => process.env[name] ?? "");

  if (s.startsWith("~")) {
    s = path.join(os.homedir(), s.slice(1));
  }

  return s;
}

/** Keep the tail of long entry names for one-line progress output. */
export function truncateLeft(name: string, max = 30): string {
  const chars = Array.from(name);
  if (chars.length <= max) return name;
  return "…" + chars.slice(chars.length - (max - 1)).join("");
}

export function isPlainObject(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}
