export interface BionicConfig {
   /** Element wrapped around each emphasized word head (default "b") */
   tag: string;

   /** Elements whose text is never rewritten; matched on lower-cased local name */
   skipTags: string[];

   /** Entry name endings treated as HTML/XHTML documents (case-insensitive) */
   extensions: string[];

   /** Globs of entry paths always copied through, even when HTML-like */
   exclude: string[];

   /** zlib level for recompressed entries, 0-9 (default 9) */
   compressionLevel: number;

   /** Appended to the input stem when no output path is given */
   suffix: string;

   /** Directory for derived output paths (can include ${ENV_VARS} and ~) */
   outDir?: string;
}

export type EntryAction = "transform" | "copy";

export type ArchiveEntry = {
   /** Path inside the archive, as stored */
   path: string;
   isDirectory: boolean;
   /** ZIP method from the central directory: 0 = stored, 8 = deflated */
   compressionMethod: number;
   lastModified: Date;
   read(): Promise<Buffer>;
};

export type OutputEntry = {
   path: string;
   isDirectory: boolean;
   content: Buffer;
   store: boolean;
   date: Date;
};

export type ProgressEvent = {
   /** 0-100, truncated */
   percent: number;
   entry: string;
   index: number;
   total: number;
};

export type ProgressCallback = (event: ProgressEvent) => void;

export type ConvertOptions = {
   config?: Partial<BionicConfig>;
   onProgress?: ProgressCallback;
};

export type ConversionStats = {
   entries: number;
   transformed: number;
   /** HTML-like entries with no word to emphasize */
   unchanged: number;
   passedThrough: number;
   words: number;
   /** HTML-like entries whose declared encoding was unknown and read as UTF-8 */
   reencoded: string[];
};

export type ConversionErrorCode =
   | "input-not-found"
   | "invalid-archive"
   | "permission-denied"
   | "same-path"
   | "failed";

export type ConversionResult =
   | { ok: true; message: string; outputPath: string; stats: ConversionStats }
   | { ok: false; message: string; code: ConversionErrorCode };

export type PlannedEntry = { path: string; action: EntryAction };

export type MarkupMode = "xml" | "html";
