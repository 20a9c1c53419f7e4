import { cosmiconfig } from "cosmiconfig";
import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import AjvModule from "ajv";
import pc from "picocolors";
import { DEFAULT_CONFIG } from "./defaults.js";
import type { BionicConfig } from "./types.js";
import { MODULE_NAME, appendStubIfNoExt, envExpand, getBuiltinStubDir, isPlainObject, parseUnknownConfig } from "./utils.js";

const Ajv = AjvModule.default;
const SCHEMA_PATH = new URL("../schema/bionicconfig.schema.json", import.meta.url);

export type LoadedConfig = { cfg: BionicConfig; filepath?: string };

function readStub(explicitPath: string): { config: unknown; filepath: string } {
   const abs = path.isAbsolute(explicitPath) ? explicitPath : path.resolve(process.cwd(), explicitPath);
   const candidates = [
      abs,
      path.join(process.cwd(), "stubs", path.basename(abs)),
      path.join(getBuiltinStubDir(), path.basename(abs)),
   ];
   for (const fp of candidates) {
      if (fs.existsSync(fp)) return { config: parseUnknownConfig(fs.readFileSync(fp, "utf8")), filepath: fp };
   }
   throw new Error(`Config not found: ${explicitPath} (.stub assumed). Looked in: ${abs}, ./stubs, and built-in stubs.`);
}

async function findRaw(explicitPath?: string): Promise<{ config: unknown; filepath?: string } | undefined> {
   const explorer = cosmiconfig(MODULE_NAME, {
      searchPlaces: [
         ".bionicrc",
         ".bionicrc.json",
         ".bionicrc.yaml",
         ".bionicrc.yml",
         "bionic.config.json",
         "package.json"
      ],
      loaders: {
         ".yaml": (_fp, content) => YAML.parse(content),
         ".yml": (_fp, content) => YAML.parse(content),
         noExt: (_fp, content) => parseUnknownConfig(content), // extensionless .bionicrc
      }
   });

   if (explicitPath) {
      const fp = appendStubIfNoExt(explicitPath);
      if (fp.endsWith(".stub")) return readStub(fp);
      const r = await explorer.load(fp);
      return r ? { config: r.config, filepath: r.filepath } : undefined;
   }
   const r = await explorer.search();
   return r ? { config: r.config, filepath: r.filepath } : undefined;
}

/** Schema check on the authored config; problems are reported, never fatal. */
export function validateConfig(raw: unknown): string[] {
   const schema = JSON.parse(fs.readFileSync(SCHEMA_PATH, "utf8"));
   const ajv = new Ajv({ allowUnionTypes: true, allErrors: true, strict: false });
   const validate = ajv.compile(schema);
   if (validate(raw)) return [];
   return (validate.errors ?? []).map(e => `${e.instancePath || "<root>"} ${e.message ?? "is invalid"}`);
}

const stringList = (v: unknown): string[] | undefined =>
   Array.isArray(v) && v.every((x): x is string => typeof x === "string") ? v : undefined;

/** Keep only well-typed keys of an authored config. */
export function pickConfig(raw: unknown): Partial<BionicConfig> {
   if (!isPlainObject(raw)) return {};
   const out: Partial<BionicConfig> = {};
   if (typeof raw.tag === "string") out.tag = raw.tag;
   if (typeof raw.suffix === "string") out.suffix = raw.suffix;
   if (typeof raw.outDir === "string") out.outDir = raw.outDir;
   if (typeof raw.compressionLevel === "number") out.compressionLevel = raw.compressionLevel;
   const skipTags = stringList(raw.skipTags);
   if (skipTags) out.skipTags = skipTags;
   const extensions = stringList(raw.extensions);
   if (extensions) out.extensions = extensions;
   const exclude = stringList(raw.exclude);
   if (exclude) out.exclude = exclude;
   return out;
}

export async function loadConfig(explicitPath?: string): Promise<LoadedConfig> {
   const result = await findRaw(explicitPath);

   // Stub and explicit files may still carry the package.json shape: { bionic: {...} }
   const found = result?.config;
   const nested = isPlainObject(found) ? found[MODULE_NAME] : undefined;
   const authored = isPlainObject(nested) ? nested : found;

   if (authored !== undefined && authored !== null) {
      try {
         const problems = validateConfig(authored);
         if (problems.length) {
            console.warn(pc.yellow(`[bionic] config validation warning: ${problems.join("; ")}`));
         }
      } catch (e) {
         console.warn(pc.yellow(`[bionic] config validation skipped: ${e instanceof Error ? e.message : String(e)}`));
      }
   }

   const cfg: BionicConfig = { ...DEFAULT_CONFIG, ...pickConfig(authored) };
   if (cfg.outDir) cfg.outDir = envExpand(cfg.outDir);
   return { cfg, filepath: result?.filepath };
}
