import type { ConversionErrorCode } from "./types.js";

export class ConversionError extends Error {
   readonly code: ConversionErrorCode;

   constructor(code: ConversionErrorCode, message: string, options?: { cause?: unknown }) {
      super(message, options);
      this.name = "ConversionError";
      this.code = code;
   }
}

export const messages = {
   success: (out: string) => `Successfully converted to: ${out}`,
   inputNotFound: (input: string) => `Input file not found: ${input}`,
   invalidArchive: () => "Invalid EPUB file (not a valid ZIP archive)",
   permissionDenied: () => "Permission denied. Check file permissions.",
   samePath: (out: string) => `Output path must differ from input path: ${out}`,
   failed: (detail: string) => `Error during conversion: ${detail}`,
};

export function errnoCode(err: unknown): string | undefined {
   if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
   return typeof err.code === "string" ? err.code : undefined;
}

/** Map anything thrown during a conversion onto a ConversionError. */
export function toConversionError(err: unknown): ConversionError {
   if (err instanceof ConversionError) return err;
   const code = errnoCode(err);
   if (code === "EACCES" || code === "EPERM") {
      return new ConversionError("permission-denied", messages.permissionDenied(), { cause: err });
   }
   const detail = err instanceof Error ? err.message : String(err);
   return new ConversionError("failed", messages.failed(detail), { cause: err });
}
