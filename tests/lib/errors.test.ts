import { describe, it, expect } from "vitest";

import {
  StylescanError,
  ValidationError,
  ConfigError,
  FilesystemError,
  FileReadError,
  OutputWriteError,
  errorMessage,
} from "@/lib/errors.js";

describe("Error Classes", () => {
  describe("StylescanError", () => {
    it("should create a basic error", () => {
      const error = new StylescanError("Test message", "TEST_CODE");
      expect(error.message).toBe("Test message");
      expect(error.name).toBe("StylescanError");
      expect(error.code).toBe("TEST_CODE");
      expect(error).toBeInstanceOf(Error);
    });

    it("should have proper stack trace", () => {
      const error = new StylescanError("Test message", "TEST_CODE");
      expect(error.stack).toContain("Test message");
    });

    it("should serialize to JSON", () => {
      const error = new StylescanError("Test message", "TEST_CODE", { key: "value" });
      expect(error.toJSON()).toEqual({
        name: "StylescanError",
        code: "TEST_CODE",
        message: "Test message",
        context: { key: "value" },
      });
    });
  });

  describe("ValidationError", () => {
    it("should carry the validation code", () => {
      const error = new ValidationError("Invalid input", { field: "exampleCap" });
      expect(error.name).toBe("ValidationError");
      expect(error.code).toBe("VALIDATION_ERROR");
      expect(error.context).toEqual({ field: "exampleCap" });
      expect(error).toBeInstanceOf(StylescanError);
    });
  });

  describe("ConfigError", () => {
    it("should carry the config code", () => {
      const error = new ConfigError("Invalid pattern for di_field");
      expect(error.name).toBe("ConfigError");
      expect(error.code).toBe("CONFIG_ERROR");
      expect(error.context).toBeUndefined();
    });
  });

  describe("FilesystemError", () => {
    it("should record the path in its context", () => {
      const error = new FilesystemError("Directory not found: /nowhere", "/nowhere", { cause: "ENOENT" });
      expect(error.code).toBe("FILESYSTEM_ERROR");
      expect(error.path).toBe("/nowhere");
      expect(error.context).toEqual({ cause: "ENOENT", path: "/nowhere" });
    });
  });

  describe("FileReadError", () => {
    it("should record the file path in its context", () => {
      const error = new FileReadError("Cannot read src/A.java", "src/A.java");
      expect(error.code).toBe("FILE_READ_ERROR");
      expect(error.filePath).toBe("src/A.java");
      expect(error.context).toEqual({ filePath: "src/A.java" });
    });
  });

  describe("OutputWriteError", () => {
    it("should record the output path in its context", () => {
      const error = new OutputWriteError("Cannot write report", "/tmp/out.md");
      expect(error.name).toBe("OutputWriteError");
      expect(error.code).toBe("OUTPUT_WRITE_ERROR");
      expect(error.outputPath).toBe("/tmp/out.md");
      expect(error.toJSON()["context"]).toEqual({ outputPath: "/tmp/out.md" });
    });
  });

  describe("errorMessage", () => {
    it("should use the message of an Error", () => {
      expect(errorMessage(new Error("boom"))).toBe("boom");
    });

    it("should stringify other values", () => {
      expect(errorMessage("plain")).toBe("plain");
      expect(errorMessage(42)).toBe("42");
    });
  });
});
