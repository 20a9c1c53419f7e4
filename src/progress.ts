import cliProgress from "cli-progress";
import type { ProgressCallback } from "./types.js";
import { truncateLeft } from "./utils.js";

export type ProgressReporter = { onProgress: ProgressCallback; stop(): void };

/** A percent bar with the current entry name; silent when `enabled` is false. */
export function makeProgressBar(label: string, enabled = true): ProgressReporter {
   if (!enabled) return { onProgress: () => undefined, stop: () => undefined };

   const bar = new cliProgress.SingleBar(
      { hideCursor: true, format: `${label} [{bar}] {percentage}% | {file}` },
      cliProgress.Presets.shades_classic
   );

   return {
      onProgress(e) {
         const file = truncateLeft(e.entry);
         if (!bar.isActive) bar.start(100, e.percent, { file });
         else bar.update(e.percent, { file });
      },
      stop() {
         if (bar.isActive) bar.stop();
      },
   };
}
