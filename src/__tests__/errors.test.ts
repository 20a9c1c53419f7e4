import { describe, it, expect } from "vitest";
import { ConversionError, errnoCode, toConversionError } from "../errors.js";

const errno = (code: string) => Object.assign(new Error(`${code}: operation failed`), { code });

describe("errnoCode", () => {
   it("reads string codes only", () => {
      expect(errnoCode(errno("ENOENT"))).toBe("ENOENT");
      expect(errnoCode({ code: 5 })).toBeUndefined();
      expect(errnoCode(new Error("plain"))).toBeUndefined();
      expect(errnoCode(null)).toBeUndefined();
   });
});

describe("toConversionError", () => {
   it("classifies EACCES and EPERM as permission-denied", () => {
      for (const code of ["EACCES", "EPERM"]) {
         const err = toConversionError(errno(code));
         expect(err.code).toBe("permission-denied");
         expect(err.message).toBe("Permission denied. Check file permissions.");
      }
   });

   it("passes a ConversionError through", () => {
      const original = new ConversionError("same-path", "same");
      expect(toConversionError(original)).toBe(original);
   });

   it("wraps everything else as failed", () => {
      expect(toConversionError(errno("ENOSPC")).message).toBe("Error during conversion: ENOSPC: operation failed");
      const odd = toConversionError("odd");
      expect(odd.code).toBe("failed");
      expect(odd.message).toBe("Error during conversion: odd");
   });
});
