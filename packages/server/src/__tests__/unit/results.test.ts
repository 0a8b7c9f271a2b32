import { GradleCommandFailedError } from "@gradle-mcp/errors";
import { describe, expect, it } from "vitest";
import { errorResult, jsonResult } from "../../results.js";

describe("jsonResult", () => {
  it("serializes the value as indented JSON text", () => {
    expect(jsonResult({ success: true })).toEqual({
      content: [{ type: "text", text: '{\n  "success": true\n}' }],
    });
  });
});

describe("errorResult", () => {
  it("carries the catalog code and message", () => {
    const result = errorResult(new GradleCommandFailedError("projects -q", 1, "boom"));
    expect(result.isError).toBe(true);
    expect(result.content).toEqual([
      {
        type: "text",
        text: JSON.stringify(
          {
            code: "GRADLE_COMMAND_FAILED",
            message: "Gradle command 'projects -q' failed (exit code 1): boom",
          },
          null,
          2,
        ),
      },
    ]);
  });

  it("wraps non-errors", () => {
    const result = errorResult("plain text");
    expect(result.content).toEqual([
      { type: "text", text: JSON.stringify({ code: "INTERNAL_ERROR", message: "plain text" }, null, 2) },
    ]);
  });
});
