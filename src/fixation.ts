/**
 * How many leading characters of a word get emphasized.
 * Lengths are in code points, so astral letters count once.
 */
export function emphasisLength(length: number): number {
   if (length <= 1) return 0;
   if (length <= 3) return 1;
   if (length <= 6) return 2;
   if (length <= 9) return 3;
   return Math.floor(length / 2);
}

export function splitWord(word: string): { head: string; tail: string } {
   const chars = Array.from(word);
   const n = emphasisLength(chars.length);
   return { head: chars.slice(0, n).join(""), tail: chars.slice(n).join("") };
}
