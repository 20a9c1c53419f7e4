import path from "node:path";
import { globby } from "globby";
import pc from "picocolors";
import { loadConfig } from "./config.js";
import { convertEpub, defaultOutputPath } from "./convert.js";
import { applyOverrides, formatStats, type SharedArgs } from "./handle-convert.js";
import { makePerf } from "./perf.js";
import { makeProgressBar } from "./progress.js";

export type BatchArgs = SharedArgs & {
   patterns: string[];
};

export type BatchSummary = { converted: string[]; failed: { input: string; message: string }[]; skipped: string[] };

/** Expand globs to .epub files, leaving out earlier outputs (stem already ends in the suffix). */
export async function findInputs(patterns: string[], suffix: string, cwd = process.cwd()): Promise<{ inputs: string[]; skipped: string[] }> {
   const matches = await globby(patterns, { cwd, absolute: true, onlyFiles: true, caseSensitiveMatch: false });
   const epubs = matches.filter(f => f.toLowerCase().endsWith(".epub")).sort((a, b) => a.localeCompare(b));
   const inputs: string[] = [];
   const skipped: string[] = [];
   for (const f of epubs) {
      if (path.parse(f).name.endsWith(suffix)) skipped.push(f);
      else inputs.push(f);
   }
   return { inputs, skipped };
}

export async function runBatch(args: BatchArgs): Promise<BatchSummary> {
   const { cfg: loaded } = await loadConfig(args.config);
   const cfg = applyOverrides(loaded, args);
   const { inputs, skipped } = await findInputs(args.patterns.map(String), cfg.suffix);

   const summary: BatchSummary = { converted: [], failed: [], skipped };
   for (const input of inputs) {
      const output = defaultOutputPath(input, cfg.suffix, cfg.outDir);
      const progress = makeProgressBar(path.basename(input), !args.quiet);
      const result = await convertEpub(input, output, { config: cfg, onProgress: progress.onProgress });
      progress.stop();

      if (result.ok) {
         summary.converted.push(result.outputPath);
         if (!args.quiet) console.log(pc.dim(`  ${formatStats(result.stats)}`));
      } else {
         summary.failed.push({ input, message: result.message });
         console.error(pc.red(`✖ ${input}: ${result.message}`));
      }
   }
   return summary;
}

export async function handleBatch(args: BatchArgs): Promise<number> {
   const perf = makePerf();
   const summary = await runBatch(args);
   perf.done();

   const total = summary.converted.length + summary.failed.length;
   if (summary.skipped.length) console.log(pc.dim(`skipped ${summary.skipped.length} already converted file(s)`));
   if (!total) {
      if (summary.skipped.length) return 0;
      console.error(pc.red("No EPUB files matched. Nothing to convert."));
      return 2;
   }
   const line = `${summary.converted.length}/${total} converted`;
   console.log(summary.failed.length ? pc.yellow(line) : pc.green(`✔ ${line}`));
   return summary.failed.length ? 1 : 0;
}
