import { describe, expect, test } from "vitest";
import { z, ZodError } from "zod";
import { XkbFileError, XkbFormatError } from "#/errors";
import { createErrnoError } from "#/test-utils/mocks";
import { safeParseYaml, toFriendlyError } from "./friendly-errors";

const Schema = z.object({ locale: z.string(), variant: z.string() });

describe("friendly-errors", () => {
  describe("safeParseYaml", () => {
    test("returns parsed data", () => {
      const result = safeParseYaml("locale: fr\nvariant: ergol\n", Schema);

      expect(result).toEqual({ success: true, data: { locale: "fr", variant: "ergol" } });
    });

    test("reports invalid YAML syntax with the file name", () => {
      const result = safeParseYaml("locale: [fr\n", Schema, "ergol.yaml");

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.type).toBe("yaml");
        expect(result.error.message).toBe("Invalid YAML syntax in ergol.yaml");
        expect(result.error.details).toHaveLength(1);
      }
    });

    test("reports validation issues with their path", () => {
      const result = safeParseYaml("locale: fr\n", Schema, "ergol.yaml");

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toEqual({
          type: "validation",
          message: "Invalid layout definition in ergol.yaml",
          details: ["variant: Required"],
        });
      }
    });
  });

  describe("toFriendlyError", () => {
    test("flags permission errors", () => {
      const friendly = toFriendlyError(createErrnoError("EACCES", "permission denied, open '/x'"));

      expect(friendly).toEqual({
        type: "permission",
        message: "Permission denied",
        details: [
          "EACCES: permission denied, open '/x'",
          "System-wide layouts require elevated privileges",
        ],
      });
    });

    test("names the file of I/O errors and keeps the cause", () => {
      const error = new XkbFileError("write", "/xkb/symbols/fr", {
        cause: new Error("ENOSPC: no space left on device"),
      });

      expect(toFriendlyError(error)).toEqual({
        type: "io",
        message: "Could not write file /xkb/symbols/fr",
        details: ["ENOSPC: no space left on device"],
      });
    });

    test("reports format errors", () => {
      const error = new XkbFormatError("no layoutList element", "/xkb/rules/evdev.xml");

      expect(toFriendlyError(error)).toEqual({
        type: "format",
        message: "Unexpected XML format in /xkb/rules/evdev.xml: no layoutList element",
      });
    });

    test("formats validation errors", () => {
      const result = Schema.safeParse({ locale: 1, variant: "ergol" });
      const error = result.success ? new ZodError([]) : result.error;

      expect(toFriendlyError(error)).toEqual({
        type: "validation",
        message: "Invalid layout definition",
        details: ["locale: Expected string, received number"],
      });
    });

    test("falls back to the error message", () => {
      expect(toFriendlyError(new Error("boom"))).toEqual({ type: "unknown", message: "boom" });
      expect(toFriendlyError("boom")).toEqual({ type: "unknown", message: "boom" });
    });
  });
});
