import { describe, it, expect } from "vitest";
import { textResponse, markdownResponse, errorResponse, resultToResponse } from "../src/mcp.js";
import { Ok, Err } from "../src/result.js";

describe("MCP responses", () => {
  it("textResponse wraps a single text block", () => {
    expect(textResponse("hello")).toEqual({ content: [{ type: "text", text: "hello" }] });
  });

  it("markdownResponse adds a heading and blank line", () => {
    const response = markdownResponse("Stats", ["**Types:** 3", "", "done"]);
    expect(response.content[0].text).toBe("## Stats\n\n**Types:** 3\n\ndone");
  });

  it("errorResponse flags the result as an error", () => {
    expect(errorResponse("nope")).toEqual({
      content: [{ type: "text", text: "Error: nope" }],
      isError: true,
    });
  });

  describe("resultToResponse", () => {
    it("formats successes", () => {
      const response = resultToResponse(Ok(3), (n) => textResponse(`count=${n}`));
      expect(response).toEqual(textResponse("count=3"));
    });

    it("uses string errors verbatim", () => {
      const response = resultToResponse(Err("no graph"), () => textResponse("unused"));
      expect(response).toEqual(errorResponse("no graph"));
    });

    it("uses the message of Error values", () => {
      const response = resultToResponse(Err(new Error("broken")), () => textResponse("unused"));
      expect(response.content[0].text).toBe("Error: broken");
      expect(response.isError).toBe(true);
    });
  });
});
