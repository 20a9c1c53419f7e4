import * as cheerio from "cheerio";
import { hasChildren, isCDATA, isTag, isText, type AnyNode, type Text } from "domhandler";
import { decodeHTML, escapeText } from "entities";
import { decodeDocument, encodeDocument, escapeUnencodable, type EncodingInfo } from "./encoding.js";
import { bionicSegments } from "./text.js";
import type { MarkupMode } from "./types.js";

export const DEFAULT_SKIP_TAGS = ["script", "style", "pre", "code", "svg", "math", "head", "textarea"];

export type MarkupOptions = {
   /** Emphasis element name (default "b") */
   tag?: string;
   skipTags?: string[];
   /** Force a parser mode instead of sniffing it */
   mode?: MarkupMode;
   /** Entry name; an .xhtml name selects xml mode */
   name?: string;
};

export type MarkupResult = {
   content: Buffer;
   changed: boolean;
   words: number;
   mode: MarkupMode;
   encoding: EncodingInfo;
};

const TAG_NAME_RE = /^[A-Za-z][\w.:-]*$/;
const XML_DECL_RE = /^\s*<\?xml\b/;
const XHTML_NS_RE = /\bxmlns\s*=\s*["']http:\/\/www\.w3\.org\/1999\/xhtml["']/;

export function detectMode(text: string, name?: string): MarkupMode {
   if (name?.toLowerCase().endsWith(".xhtml")) return "xml";
   if (XML_DECL_RE.test(text) || XHTML_NS_RE.test(text)) return "xml";
   return "html";
}

function localName(tag: string): string {
   const lower = tag.toLowerCase();
   const i = lower.indexOf(":");
   return i >= 0 ? lower.slice(i + 1) : lower;
}

function collectTextNodes(node: AnyNode, skip: Set<string>, out: Text[]): void {
   if (isText(node)) {
      out.push(node);
      return;
   }
   if (isCDATA(node)) return;
   if (isTag(node) && skip.has(localName(node.name))) return;
   if (hasChildren(node)) {
      for (const child of node.children) collectTextNodes(child, skip, out);
   }
}

/**
 * Emphasize word heads in every visible text node of an HTML/XHTML document.
 * Entities stay raw through parse and serialize, so markup outside the
 * rewritten text nodes is emitted as it was read. Rewritten text escapes only
 * `&`, `<` and `>`, plus whatever the document charset cannot hold. A document with nothing to
 * emphasize comes back as the very same buffer.
 */
export function transformDocument(buf: Buffer, opts: MarkupOptions = {}): MarkupResult {
   const tag = opts.tag ?? "b";
   if (!TAG_NAME_RE.test(tag)) throw new Error(`Invalid emphasis tag: "${tag}"`);
   const skip = new Set((opts.skipTags ?? DEFAULT_SKIP_TAGS).map(localName));

   const decoded = decodeDocument(buf);
   const { text, ...encoding } = decoded;
   const mode = opts.mode ?? detectMode(text, opts.name);

   const parserOptions = {
      xml: { xmlMode: mode === "xml", decodeEntities: false, recognizeSelfClosing: true },
   };
   const $ = cheerio.load(text, parserOptions);

   // XML has no &nbsp;, so a no-break space stays a character there
   const escape = (s: string): string => {
      const escaped = mode === "xml" ? escapeText(s).replace(/&nbsp;/g, "\u00a0") : escapeText(s);
      return escapeUnencodable(escaped, encoding.encoding);
   };

   const nodes: Text[] = [];
   for (const child of $.root().contents().toArray()) collectTextNodes(child, skip, nodes);

   let words = 0;
   let changed = 0;
   for (const node of nodes) {
      const plain = decodeHTML(node.data);
      if (!plain.trim()) continue;

      const segments = bionicSegments(plain);
      const heads = segments.filter(s => s.emphasis).length;
      if (!heads) continue;

      const markup = segments
         .map(s => (s.emphasis ? `<${tag}>${escape(s.text)}</${tag}>` : escape(s.text)))
         .join("");
      $(node).replaceWith(markup);
      words += heads;
      changed++;
   }

   if (!changed) return { content: buf, changed: false, words: 0, mode, encoding };

   const content = encodeDocument($.html(parserOptions), encoding);
   return { content, changed: true, words, mode, encoding };
}
