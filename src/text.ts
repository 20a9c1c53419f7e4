import { splitWord } from "./fixation.js";

export type Segment = { text: string; emphasis: boolean };

// A word is a run of letters/marks with no word character (letter, mark, digit,
// connector) touching either end: "abc123" and "snake_case" hold no words.
const WORD_CHAR = String.raw`[\p{Alphabetic}\p{M}\p{Nd}\p{Pc}]`;
const WORD_RE = new RegExp(String.raw`(?<!${WORD_CHAR})[\p{L}\p{M}]+(?!${WORD_CHAR})`, "gu");

export function bionicSegments(text: string): Segment[] {
   const out: Segment[] = [];
   let plain = "";
   let last = 0;

   for (const m of text.matchAll(WORD_RE)) {
      const start = m.index ?? 0;
      plain += text.slice(last, start);
      last = start + m[0].length;

      const { head, tail } = splitWord(m[0]);
      if (!head) {
         plain += m[0];
         continue;
      }
      if (plain) out.push({ text: plain, emphasis: false });
      out.push({ text: head, emphasis: true });
      plain = tail;
   }

   plain += text.slice(last);
   if (plain) out.push({ text: plain, emphasis: false });
   return out;
}

/** Markup form, unescaped: `reading` → `<b>rea</b>ding`. */
export function bionicText(text: string, tag = "b"): string {
   if (!text.trim()) return text;
   return bionicSegments(text)
      .map(s => (s.emphasis ? `<${tag}>${s.text}</${tag}>` : s.text))
      .join("");
}

export function countWords(text: string): number {
   return bionicSegments(text).filter(s => s.emphasis).length;
}
