import { DEFAULT_SKIP_TAGS } from "./markup.js";
import type { BionicConfig } from "./types.js";

export const DEFAULT_CONFIG: BionicConfig = {
   tag: "b",
   skipTags: [...DEFAULT_SKIP_TAGS],
   extensions: [".html", ".xhtml", ".htm"],
   exclude: [],
   compressionLevel: 9,
   suffix: "_bionic",
};
