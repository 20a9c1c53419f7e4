import { describe, it, expect } from "vitest";
import { bionicSegments, bionicText, countWords } from "../text.js";

describe("bionicText", () => {
   it("emphasizes the head of each word", () => {
      expect(bionicText("Hello world")).toBe("<b>He</b>llo <b>wo</b>rld");
      expect(bionicText("the word reading")).toBe("<b>t</b>he <b>wo</b>rd <b>rea</b>ding");
   });

   it("skips one-letter words", () => {
      expect(bionicText("a cat")).toBe("a <b>c</b>at");
      expect(bionicText("a")).toBe("a");
   });

   it("treats an apostrophe as a word break", () => {
      expect(bionicText("don't")).toBe("<b>d</b>on't");
   });

   it("ignores runs glued to digits or underscores", () => {
      expect(bionicText("abc123 snake_case")).toBe("abc123 snake_case");
   });

   it("returns whitespace unchanged", () => {
      expect(bionicText("  \n\t ")).toBe("  \n\t ");
      expect(bionicText("")).toBe("");
   });

   it("uses the given tag", () => {
      expect(bionicText("café", "strong")).toBe("<strong>ca</strong>fé");
   });

   it("keeps combining marks with their word", () => {
      // "cafe" + U+0301 is five code points
      expect(bionicText("cafe\u0301")).toBe("<b>ca</b>fe\u0301");
   });

   it("handles non-Latin scripts", () => {
      expect(bionicText("Привет мир")).toBe("<b>Пр</b>ивет <b>м</b>ир");
   });
});

describe("bionicSegments", () => {
   it("concatenates back to the input", () => {
      const input = "It's 2024, internationalization!";
      const segments = bionicSegments(input);
      expect(segments.map(s => s.text).join("")).toBe(input);
      expect(segments.filter(s => s.emphasis).map(s => s.text)).toEqual(["I", "internatio"]);
   });

   it("merges unemphasized words into the surrounding text", () => {
      expect(bionicSegments("a cat")).toEqual([
         { text: "a ", emphasis: false },
         { text: "c", emphasis: true },
         { text: "at", emphasis: false },
      ]);
   });

   it("yields one plain segment when nothing is emphasized", () => {
      expect(bionicSegments("1, 2 & 3")).toEqual([{ text: "1, 2 & 3", emphasis: false }]);
   });
});

describe("countWords", () => {
   it("counts emphasized words only", () => {
      expect(countWords("a big elephant")).toBe(2);
      expect(countWords("42")).toBe(0);
   });
});
