import fs from "node:fs/promises";
import path from "node:path";
import pc from "picocolors";
import { appendStubIfNoExt, getBuiltinStubDir } from "./utils.js";

export type InitArgs = {
   stub?: string;
   out?: string;
   force?: boolean;
};

async function fileExists(p: string) {
   try { await fs.access(p); return true; } catch { return false; }
}

/** Try ./stubs/<name>.stub first, then the stubs shipped with the package. */
export async function resolveStubPath(name: string, localDir = path.join(process.cwd(), "stubs")): Promise<string | null> {
   const file = appendStubIfNoExt(name);
   const tryPaths = [
      path.resolve(process.cwd(), file),
      path.join(localDir, file),
      path.join(getBuiltinStubDir(), file),
   ];
   for (const p of tryPaths) {
      if (await fileExists(p)) return p;
   }
   return null;
}

export async function listStubs(): Promise<string[]> {
   const entries = await fs.readdir(getBuiltinStubDir(), { withFileTypes: true });
   return entries
      .filter(e => e.isFile() && e.name.endsWith(".stub"))
      .map(e => e.name.replace(/\.stub$/, ""))
      .sort((a, b) => a.localeCompare(b));
}

export async function handleInit(args: InitArgs): Promise<number> {
   const stub = args.stub ?? "default";
   const resolved = await resolveStubPath(stub);
   if (!resolved) {
      const known = await listStubs();
      console.error(pc.red(`Could not find stub "${stub}". Built-in stubs: ${known.join(", ") || "(none)"}`));
      return 2;
   }

   const outPath = path.resolve(process.cwd(), args.out ?? ".bionicrc.yml");
   if (!args.force && await fileExists(outPath)) {
      console.error(pc.red(`${outPath} already exists (use --force to overwrite).`));
      return 2;
   }

   await fs.writeFile(outPath, await fs.readFile(resolved, "utf8"), "utf8");
   console.log(pc.green(`✔ Wrote ${outPath} from ${resolved}`));
   return 0;
}
