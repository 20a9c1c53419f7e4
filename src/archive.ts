import fs from "node:fs";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import archiver from "archiver";
import * as unzipper from "unzipper";
import pc from "picocolors";
import { ConversionError, errnoCode, messages, toConversionError } from "./errors.js";
import type { ArchiveEntry, OutputEntry } from "./types.js";

export type WriteOptions = {
   /** zlib level for deflated entries (default 9) */
   level?: number;
};

const STORED = 0;
const MIMETYPE = "mimetype";

/** Entries in central-directory order; content is read lazily. */
export async function openArchive(file: string): Promise<ArchiveEntry[]> {
   let dir: unzipper.CentralDirectory;
   try {
      dir = await unzipper.Open.file(file);
   } catch (err) {
      // I/O errors (EACCES, EISDIR...) carry an errno code; parse failures do not
      if (errnoCode(err)) throw toConversionError(err);
      throw new ConversionError("invalid-archive", messages.invalidArchive(), { cause: err });
   }
   return dir.files.map(f => ({
      path: f.path,
      isDirectory: f.type === "Directory",
      compressionMethod: f.compressionMethod,
      lastModified: f.lastModifiedDateTime,
      read: () => f.buffer(),
   }));
}

/** The EPUB mimetype entry must stay uncompressed, whatever the source did. */
export function shouldStore(entry: Pick<ArchiveEntry, "path" | "compressionMethod">): boolean {
   return entry.compressionMethod === STORED || entry.path === MIMETYPE;
}

/**
 * Write entries in the given order. Output goes to a sibling temp file that is
 * renamed over `outPath` once the archive is closed, and removed on failure.
 */
export async function writeArchive(outPath: string, entries: OutputEntry[], opts: WriteOptions = {}): Promise<string> {
   const abs = path.resolve(process.cwd(), outPath);
   fs.mkdirSync(path.dirname(abs), { recursive: true });
   const tmp = `${abs}.${process.pid}.tmp`;

   const output = fs.createWriteStream(tmp);
   let created = false;
   output.once("open", () => { created = true; });

   const archive = archiver("zip", { zlib: { level: opts.level ?? 9 } });
   archive.on("warning", (err) => console.warn(pc.yellow("archiver:"), err.message));

   const written = pipeline(archive, output);
   const appended = (async () => {
      for (const e of entries) {
         if (e.isDirectory) {
            archive.append(Buffer.alloc(0), { name: e.path.endsWith("/") ? e.path : `${e.path}/`, date: e.date });
            continue;
         }
         archive.append(e.content, { name: e.path, date: e.date, store: e.store });
      }
      await archive.finalize();
   })();

   try {
      await Promise.all([written, appended]);
      await fs.promises.rename(tmp, abs);
   } catch (err) {
      if (!archive.destroyed) archive.abort();
      output.destroy();
      if (created) await fs.promises.rm(tmp, { force: true });
      throw err;
   }

   return abs;
}
