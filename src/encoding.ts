import iconv from "iconv-lite";

export type EncodingInfo = {
   /** Lower-cased label, e.g. "utf-8", "utf-16le", "windows-1252" */
   encoding: string;
   bom: boolean;
   /** True when the declared label was unknown and UTF-8 was used instead */
   fallback: boolean;
};

export type DecodedDocument = EncodingInfo & { text: string };

const XML_DECL_RE = /^\s*<\?xml[^>]*?\bencoding\s*=\s*["']([^"']+)["']/i;
const META_CHARSET_RE = /<meta\b[^>]*?\bcharset\s*=\s*["']?\s*([\w.:-]+)/i;
const SNIFF_BYTES = 1024;
const UNICODE_RE = /^(utf-?(8|16|32)|ucs-?2)/;
const NON_ASCII_RE = /[^\x00-\x7f]/gu;

export function detectEncoding(buf: Buffer): EncodingInfo {
   if (buf.length >= 3 && buf[0] === 0xef && buf[1] === 0xbb && buf[2] === 0xbf) {
      return { encoding: "utf-8", bom: true, fallback: false };
   }
   if (buf.length >= 2 && buf[0] === 0xff && buf[1] === 0xfe) {
      return { encoding: "utf-16le", bom: true, fallback: false };
   }
   if (buf.length >= 2 && buf[0] === 0xfe && buf[1] === 0xff) {
      return { encoding: "utf-16be", bom: true, fallback: false };
   }

   const head = buf.subarray(0, SNIFF_BYTES).toString("latin1");
   const declared = XML_DECL_RE.exec(head)?.[1] ?? META_CHARSET_RE.exec(head)?.[1];
   if (!declared) return { encoding: "utf-8", bom: false, fallback: false };

   const label = normalizeLabel(declared);
   if (!iconv.encodingExists(label)) return { encoding: "utf-8", bom: false, fallback: true };
   return { encoding: label, bom: false, fallback: false };
}

export function decodeDocument(buf: Buffer): DecodedDocument {
   const info = detectEncoding(buf);
   return { ...info, text: iconv.decode(buf, info.encoding, { stripBOM: true }) };
}

export function encodeDocument(text: string, info: EncodingInfo): Buffer {
   return iconv.encode(text, info.encoding, { addBOM: info.bom });
}

function normalizeLabel(label: string): string {
   const l = label.trim().toLowerCase();
   return l === "utf8" ? "utf-8" : l;
}

const fitCache = new Map<string, boolean>();

function fits(ch: string, encoding: string): boolean {
   const key = `${encoding}:${ch}`;
   let ok = fitCache.get(key);
   if (ok === undefined) {
      ok = iconv.decode(iconv.encode(ch, encoding), encoding) === ch;
      fitCache.set(key, ok);
   }
   return ok;
}

/**
 * Replace characters the target charset cannot hold with numeric character
 * references, so `encodeDocument` never substitutes `?` for them.
 */
export function escapeUnencodable(text: string, encoding: string): string {
   if (UNICODE_RE.test(encoding)) return text;
   return text.replace(NON_ASCII_RE, ch => (fits(ch, encoding) ? ch : `&#x${(ch.codePointAt(0) ?? 0).toString(16)};`));
}
