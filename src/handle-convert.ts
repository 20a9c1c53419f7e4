import fs from "node:fs";
import path from "node:path";
import pc from "picocolors";
import { loadConfig } from "./config.js";
import { convertEpub, defaultOutputPath, planConversion } from "./convert.js";
import { toConversionError } from "./errors.js";
import { debug, makePerf } from "./perf.js";
import { makeProgressBar } from "./progress.js";
import type { BionicConfig, ConversionStats } from "./types.js";
import { envExpand } from "./utils.js";

/** Flags shared by `convert` and `batch`. */
export type SharedArgs = {
   config?: string;
   outDir?: string;
   tag?: string;
   skipTag?: string[];
   exclude?: string[];
   extension?: string[];
   level?: number;
   suffix?: string;
   quiet?: boolean;
};

export type ConvertArgs = SharedArgs & {
   input: string;
   output?: string;
   list?: boolean;
};

// CLI → cfg overrides; arrays given on the command line replace the configured ones
export function applyOverrides(cfg: BionicConfig, args: SharedArgs): BionicConfig {
   const out: BionicConfig = { ...cfg };
   if (args.tag) out.tag = args.tag;
   if (args.skipTag?.length) out.skipTags = args.skipTag.map(String);
   if (args.exclude?.length) out.exclude = args.exclude.map(String);
   if (args.extension?.length) {
      out.extensions = args.extension.map(e => (String(e).startsWith(".") ? String(e) : `.${e}`));
   }
   if (typeof args.level === "number" && Number.isFinite(args.level)) {
      out.compressionLevel = Math.min(9, Math.max(0, Math.trunc(args.level)));
   }
   if (args.suffix) out.suffix = args.suffix;
   if (args.outDir) out.outDir = envExpand(args.outDir);
   return out;
}

export function formatStats(s: ConversionStats): string {
   const parts = [
      `${s.transformed} rewritten`,
      `${s.unchanged} without words`,
      `${s.passedThrough} copied`,
      `${s.words} words`,
   ];
   return `${s.entries} entries: ${parts.join(", ")}`;
}

/** Returns the process exit code: 0 ok, 1 conversion failed, 2 usage error. */
export async function handleConvert(args: ConvertArgs): Promise<number> {
   const perf = makePerf();
   const { cfg: loaded, filepath } = await loadConfig(args.config);
   const cfg = applyOverrides(loaded, args);
   debug(`config: ${filepath ?? "(defaults)"}`);
   perf.measure("config");

   if (!args.input) {
      console.error(pc.red("An input EPUB path is required."));
      return 2;
   }

   if (args.list) {
      try {
         const plan = await planConversion(args.input, { config: cfg });
         console.log(pc.dim(`# Config: ${filepath ?? "(defaults)"}  Input: ${args.input}`));
         for (const e of plan) console.log(`${e.action === "transform" ? pc.cyan("transform") : pc.dim("copy     ")}  ${e.path}`);
         const n = plan.filter(e => e.action === "transform").length;
         console.log(pc.green(`\n${n} of ${plan.length} entries would be rewritten.`));
         return 0;
      } catch (err) {
         console.error(pc.red(toConversionError(err).message));
         return 1;
      }
   }

   const output = args.output ?? defaultOutputPath(args.input, cfg.suffix, cfg.outDir);
   if (fs.existsSync(output)) {
      console.warn(pc.yellow(`Warning: Output file '${output}' will be overwritten.`));
   }

   const progress = makeProgressBar("Converting", !args.quiet);
   const result = await convertEpub(args.input, output, { config: cfg, onProgress: progress.onProgress });
   progress.stop();
   perf.done();

   if (!result.ok) {
      console.error(pc.red(result.message));
      return 1;
   }

   console.log(pc.green(`✔ ${result.message}`));
   console.log(pc.dim(formatStats(result.stats)));
   for (const name of result.stats.reencoded) {
      console.warn(pc.yellow(`unknown declared encoding, read as UTF-8: ${name}`));
   }
   debug(`output: ${path.resolve(output)}`);
   return 0;
}
