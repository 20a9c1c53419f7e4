import pc from "picocolors";

/** Phase timer. Prints `[timing]` lines only when enabled (BIONIC_TIMING=1). */
export type Perf = {
   /** Time since the previous phase ended */
   measure(phase: string): void;
   done(label?: string): void;
};

export function makePerf(enabled = process.env.BIONIC_TIMING === "1"): Perf {
   const start = performance.now();
   let phaseStart = start;
   const print = (label: string, ms: number) => console.log(pc.dim(`[timing] ${label}: ${ms.toFixed(1)}ms`));

   return {
      measure(phase) {
         if (!enabled) return;
         const now = performance.now();
         print(phase, now - phaseStart);
         phaseStart = now;
      },
      done(label = "total") {
         if (enabled) print(label, performance.now() - start);
      },
   };
}

export function debug(message: string) {
   if (process.env.BIONIC_DEBUG === "1") console.log(pc.dim(`[debug] ${message}`));
}
