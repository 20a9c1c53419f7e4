#!/usr/bin/env node
import { hideBin } from "yargs/helpers";
import yargs, { type Argv } from "yargs";
import pc from "picocolors";
import { handleBatch } from "./handle-batch.js";
import { handleConvert } from "./handle-convert.js";
import { handleInit, listStubs } from "./handle-init.js";

function sharedOptions<T>(y: Argv<T>) {
   return y
      .option("config", { type: "string", desc: "Path to config file (no extension assumes .stub)" })
      .option("out-dir", { type: "string", desc: "Directory for derived output paths (overrides config)" })
      .option("tag", { type: "string", desc: "Element wrapped around emphasized word heads (default b)" })
      .option("skip-tag", { type: "string", array: true, desc: "Elements whose text is left alone (replaces config list)" })
      .option("exclude", { type: "string", array: true, desc: "Entry globs copied through unchanged" })
      .option("extension", { type: "string", array: true, desc: "Entry extensions treated as HTML (default .html .xhtml .htm)" })
      .option("level", { type: "number", desc: "Deflate level for rewritten entries, 0-9" })
      .option("suffix", { type: "string", desc: "Suffix for derived output names (default _bionic)" })
      .option("quiet", { type: "boolean", default: false, desc: "No progress bar" });
}

await yargs(hideBin(process.argv))
   .scriptName("epub-bionic")
   /* ------------------------------- convert ------------------------------- */
   .command(
      ["convert <input> [output]", "$0 <input> [output]"],
      "Convert one EPUB to bionic reading format",
      y => sharedOptions(y)
         .positional("input", { type: "string", demandOption: true, desc: "Input EPUB file" })
         .positional("output", { type: "string", desc: "Output EPUB (default: <input>_bionic.epub)" })
         .option("list", { type: "boolean", default: false, desc: "Print which entries would be rewritten and exit" }),
      async args => {
         process.exitCode = await handleConvert({
            input: args.input,
            output: args.output,
            list: args.list,
            config: args.config,
            outDir: args.outDir,
            tag: args.tag,
            skipTag: args.skipTag,
            exclude: args.exclude,
            extension: args.extension,
            level: args.level,
            suffix: args.suffix,
            quiet: args.quiet,
         });
      }
   )
   /* -------------------------------- batch -------------------------------- */
   .command(
      "batch <patterns..>",
      "Convert every EPUB matching the given globs",
      y => sharedOptions(y)
         .positional("patterns", { type: "string", array: true, demandOption: true, desc: "Files or globs (e.g. \"books/**/*.epub\")" }),
      async args => {
         process.exitCode = await handleBatch({
            patterns: args.patterns,
            config: args.config,
            outDir: args.outDir,
            tag: args.tag,
            skipTag: args.skipTag,
            exclude: args.exclude,
            extension: args.extension,
            level: args.level,
            suffix: args.suffix,
            quiet: args.quiet,
         });
      }
   )
   /* -------------------------------- init --------------------------------- */
   .command(
      "init [stub]",
      "Create .bionicrc.yml from a stub",
      y => y
         .positional("stub", { type: "string", desc: "Stub name (default: default)" })
         .option("out", { type: "string", default: ".bionicrc.yml", desc: "Destination file" })
         .option("force", { type: "boolean", default: false, desc: "Overwrite an existing file" })
         .option("ls", { type: "boolean", default: false, desc: "List built-in stubs and exit" }),
      async args => {
         if (args.ls) {
            for (const name of await listStubs()) console.log(name);
            return;
         }
         process.exitCode = await handleInit({ stub: args.stub, out: args.out, force: args.force });
      }
   )
   .strict()
   .fail((msg, err, y) => {
      if (err) {
         console.error(pc.red(err.message));
         process.exit(1);
      }
      console.error(pc.red(msg));
      y.showHelp();
      process.exit(2);
   })
   .help()
   .parseAsync();
