export { emphasisLength, splitWord } from "./fixation.js";
export { bionicSegments, bionicText, countWords, type Segment } from "./text.js";
export { detectEncoding, decodeDocument, encodeDocument, escapeUnencodable, type EncodingInfo } from "./encoding.js";
export { DEFAULT_SKIP_TAGS, detectMode, transformDocument, type MarkupOptions, type MarkupResult } from "./markup.js";
export { openArchive, writeArchive, shouldStore } from "./archive.js";
export { convertEpub, planConversion, defaultOutputPath, buildEntryMatcher } from "./convert.js";
export { ConversionError, messages, toConversionError } from "./errors.js";
export { loadConfig, pickConfig, validateConfig } from "./config.js";
export { DEFAULT_CONFIG } from "./defaults.js";
export type * from "./types.js";
