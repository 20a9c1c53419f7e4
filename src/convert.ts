import fs from "node:fs";
import path from "node:path";
import picomatch from "picomatch";
import { openArchive, shouldStore, writeArchive } from "./archive.js";
import { DEFAULT_CONFIG } from "./defaults.js";
import { ConversionError, errnoCode, messages, toConversionError } from "./errors.js";
import { transformDocument } from "./markup.js";
import { makePerf } from "./perf.js";
import type {
   ArchiveEntry,
   BionicConfig,
   ConversionResult,
   ConversionStats,
   ConvertOptions,
   OutputEntry,
   PlannedEntry,
} from "./types.js";

/** `book.epub` → `book_bionic.epub`, next to the input or under `outDir`. */
export function defaultOutputPath(input: string, suffix = DEFAULT_CONFIG.suffix, outDir?: string): string {
   const { dir, name, ext } = path.parse(input);
   return path.join(outDir ?? dir, `${name}${suffix}${ext}`);
}

export function buildEntryMatcher(cfg: Pick<BionicConfig, "extensions" | "exclude">) {
   const exts = cfg.extensions.map(e => e.toLowerCase());
   const excluded = cfg.exclude.length ? picomatch(cfg.exclude, { dot: true }) : () => false;
   return (entry: Pick<ArchiveEntry, "path" | "isDirectory">): boolean => {
      if (entry.isDirectory) return false;
      const lower = entry.path.toLowerCase();
      return exts.some(e => lower.endsWith(e)) && !excluded(entry.path);
   };
}

function resolveConfig(partial: Partial<BionicConfig> | undefined): BionicConfig {
   return { ...DEFAULT_CONFIG, ...(partial ?? {}) };
}

async function assertInput(input: string): Promise<void> {
   try {
      const st = await fs.promises.stat(input);
      if (!st.isFile()) throw new ConversionError("input-not-found", messages.inputNotFound(input));
   } catch (err) {
      if (errnoCode(err) === "ENOENT" || errnoCode(err) === "ENOTDIR") {
         throw new ConversionError("input-not-found", messages.inputNotFound(input), { cause: err });
      }
      throw toConversionError(err);
   }
}

export async function planConversion(input: string, options: Pick<ConvertOptions, "config"> = {}): Promise<PlannedEntry[]> {
   await assertInput(input);
   const cfg = resolveConfig(options.config);
   const isMarkup = buildEntryMatcher(cfg);
   const entries = await openArchive(input);
   return entries.map((e): PlannedEntry => ({ path: e.path, action: isMarkup(e) ? "transform" : "copy" }));
}

/**
 * Convert one EPUB. Expected failures (missing input, bad archive, permissions)
 * come back as `{ ok: false }` results rather than rejections.
 */
export async function convertEpub(input: string, output: string, options: ConvertOptions = {}): Promise<ConversionResult> {
   try {
      const stats = await runConversion(input, output, options);
      return { ok: true, message: messages.success(output), outputPath: path.resolve(output), stats };
   } catch (err) {
      const e = toConversionError(err);
      return { ok: false, message: e.message, code: e.code };
   }
}

async function runConversion(input: string, output: string, options: ConvertOptions): Promise<ConversionStats> {
   await assertInput(input);
   if (path.resolve(input) === path.resolve(output)) {
      throw new ConversionError("same-path", messages.samePath(output));
   }

   const cfg = resolveConfig(options.config);
   const isMarkup = buildEntryMatcher(cfg);
   const perf = makePerf();
   const entries = await openArchive(input);
   perf.measure("open");

   const stats: ConversionStats = {
      entries: entries.length,
      transformed: 0,
      unchanged: 0,
      passedThrough: 0,
      words: 0,
      reencoded: [],
   };

   const out: OutputEntry[] = [];
   for (let i = 0; i < entries.length; i++) {
      const entry = entries[i];
      let content = entry.isDirectory ? Buffer.alloc(0) : await entry.read();

      if (isMarkup(entry)) {
         const res = transformDocument(content, { tag: cfg.tag, skipTags: cfg.skipTags, name: entry.path });
         if (res.encoding.fallback) stats.reencoded.push(entry.path);
         if (res.changed) {
            content = res.content;
            stats.transformed++;
            stats.words += res.words;
         } else {
            stats.unchanged++;
         }
      } else {
         stats.passedThrough++;
      }

      out.push({
         path: entry.path,
         isDirectory: entry.isDirectory,
         content,
         store: shouldStore(entry),
         date: entry.lastModified,
      });

      options.onProgress?.({
         percent: Math.floor(((i + 1) / entries.length) * 100),
         entry: entry.path,
         index: i,
         total: entries.length,
      });
   }

   perf.measure(`transform ${stats.transformed} of ${entries.length} entries`);

   await writeArchive(output, out, { level: cfg.compressionLevel });
   perf.measure("write");
   return stats;
}
