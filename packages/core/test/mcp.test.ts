import { describe, it, expect } from "vitest";
import { textResponse, errorResponse, successResponse, resultToResponse } from "../src/mcp.js";
import { Ok, Err, type Result } from "../src/result.js";

interface LookupError {
  code: "MISSING";
  message: string;
}

describe("MCP response helpers", () => {
  it("textResponse wraps plain text", () => {
    expect(textResponse("Line 1\nLine 2")).toEqual({
      content: [{ type: "text", text: "Line 1\nLine 2" }],
    });
  });

  it("errorResponse prefixes the text and flags the response", () => {
    expect(errorResponse("No element found")).toEqual({
      content: [{ type: "text", text: "Error: No element found" }],
      structuredContent: { success: false, error: "No element found" },
      isError: true,
    });
  });

  it("errorResponse merges details without overriding success or error", () => {
    const response = errorResponse("bad", { code: "X", success: true, error: "ignored" });
    expect(response.structuredContent).toEqual({ code: "X", success: false, error: "bad" });
  });

  it("successResponse marks the payload successful", () => {
    expect(successResponse("2 symbols", { count: 2 })).toEqual({
      content: [{ type: "text", text: "2 symbols" }],
      structuredContent: { count: 2, success: true },
    });
  });

  describe("resultToResponse", () => {
    const format = (names: string[]) => ({ text: names.join(", "), data: { names } });

    it("formats Ok results", () => {
      const result: Result<string[], LookupError> = Ok(["Dog", "Cat"]);
      expect(resultToResponse(result, format)).toEqual({
        content: [{ type: "text", text: "Dog, Cat" }],
        structuredContent: { names: ["Dog", "Cat"], success: true },
      });
    });

    it("uses the error message and extracted details for Err results", () => {
      const result: Result<string[], LookupError> = Err({ code: "MISSING", message: "nothing here" });
      const response = resultToResponse(result, format, (error) => ({ code: error.code }));
      expect(response).toEqual({
        content: [{ type: "text", text: "Error: nothing here" }],
        structuredContent: { code: "MISSING", success: false, error: "nothing here" },
        isError: true,
      });
    });

    it("accepts Error instances", () => {
      const result: Result<string[], Error> = Err(new Error("disk gone"));
      expect(resultToResponse(result, format).structuredContent).toEqual({
        success: false,
        error: "disk gone",
      });
    });
  });
});
