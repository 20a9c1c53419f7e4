import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { finished } from "node:stream/promises";
import archiver from "archiver";
import * as unzipper from "unzipper";

export type FixtureEntry = { name: string; content?: string | Buffer; store?: boolean };

export async function makeTempDir(): Promise<string> {
   return fs.promises.mkdtemp(path.join(os.tmpdir(), "epub-bionic-"));
}

/** Build a zip on disk with entries in the given order. */
export async function writeZip(file: string, entries: FixtureEntry[]): Promise<string> {
   const output = fs.createWriteStream(file);
   const archive = archiver("zip", { zlib: { level: 6 } });
   archive.pipe(output);
   for (const e of entries) {
      archive.append(e.content ?? "", { name: e.name, store: e.store });
   }
   await archive.finalize();
   await finished(output);
   return file;
}

export type ReadBackEntry = { path: string; method: number; isDirectory: boolean; content: Buffer };

export async function readZip(file: string): Promise<ReadBackEntry[]> {
   const dir = await unzipper.Open.file(file);
   const out: ReadBackEntry[] = [];
   for (const f of dir.files) {
      out.push({
         path: f.path,
         method: f.compressionMethod,
         isDirectory: f.type === "Directory",
         content: f.type === "Directory" ? Buffer.alloc(0) : await f.buffer(),
      });
   }
   return out;
}

export function entryText(entries: ReadBackEntry[], name: string): string {
   const e = entries.find(x => x.path === name);
   if (!e) throw new Error(`missing entry ${name}`);
   return e.content.toString("utf8");
}

export const CHAPTER_XHTML = [
   `<?xml version="1.0" encoding="utf-8"?>`,
   `<!DOCTYPE html>`,
   `<html xmlns="http://www.w3.org/1999/xhtml" xmlns:epub="http://www.idpf.org/2007/ops">`,
   `<head>`,
   `  <title>Chapter One</title>`,
   `  <link rel="stylesheet" type="text/css" href="style.css"/>`,
   `</head>`,
   `<body>`,
   `  <h1 id="c1">Chapter One</h1>`,
   `  <p class="first">It was a bright cold day in April.</p>`,
   `</body>`,
   `</html>`,
   ``,
].join("\n");

export const CHAPTER_XHTML_BIONIC = [
   `<?xml version="1.0" encoding="utf-8"?>`,
   `<!DOCTYPE html>`,
   `<html xmlns="http://www.w3.org/1999/xhtml" xmlns:epub="http://www.idpf.org/2007/ops">`,
   `<head>`,
   `  <title>Chapter One</title>`,
   `  <link rel="stylesheet" type="text/css" href="style.css"/>`,
   `</head>`,
   `<body>`,
   `  <h1 id="c1"><b>Cha</b>pter <b>O</b>ne</h1>`,
   `  <p class="first"><b>I</b>t <b>w</b>as a <b>br</b>ight <b>co</b>ld <b>d</b>ay <b>i</b>n <b>Ap</b>ril.</p>`,
   `</body>`,
   `</html>`,
   ``,
].join("\n");

export const NOTES_HTML =
   `<html><head><title>Notes</title></head><body><p>See <em>page</em> ten &amp; more.</p></body></html>`;

export const NOTES_HTML_BIONIC =
   `<html><head><title>Notes</title></head><body><p><b>S</b>ee <em><b>pa</b>ge</em> <b>t</b>en &amp; <b>mo</b>re.</p></body></html>`;

export const NAV_XHTML =
   `<?xml version="1.0" encoding="utf-8"?>\n<html xmlns="http://www.w3.org/1999/xhtml"><body><nav><ol><li><a href="chapter1.xhtml">Chapter One</a></li></ol></nav></body></html>`;

export const BLANK_XHTML =
   `<?xml version="1.0" encoding="utf-8"?>\n<html xmlns="http://www.w3.org/1999/xhtml"><body><p>1984</p></body></html>`;

export const COVER_PNG = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x01, 0x02, 0x03]);

export const BOOK_ENTRIES: FixtureEntry[] = [
   { name: "mimetype", content: "application/epub+zip", store: true },
   {
      name: "META-INF/container.xml",
      content: `<?xml version="1.0"?><container version="1.0"><rootfiles><rootfile full-path="OEBPS/content.opf"/></rootfiles></container>`,
   },
   { name: "OEBPS/" },
   { name: "OEBPS/chapter1.xhtml", content: CHAPTER_XHTML },
   { name: "OEBPS/notes.html", content: NOTES_HTML },
   { name: "OEBPS/nav.xhtml", content: NAV_XHTML },
   { name: "OEBPS/blank.xhtml", content: BLANK_XHTML },
   { name: "OEBPS/style.css", content: "p { margin: 0; }\n" },
   { name: "OEBPS/images/cover.png", content: COVER_PNG },
];

export async function writeBook(dir: string, name = "book.epub"): Promise<string> {
   return writeZip(path.join(dir, name), BOOK_ENTRIES);
}
