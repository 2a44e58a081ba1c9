import { describe, it, expect } from "vitest";
import { textResponse, jsonResponse, errorResponse, resultToResponse } from "../src/mcp.js";
import { Ok, Err } from "../src/result.js";
import { NotFoundError } from "../src/errors.js";

describe("MCP responses", () => {
  it("textResponse wraps text", () => {
    expect(textResponse("3 nodes")).toEqual({ content: [{ type: "text", text: "3 nodes" }] });
  });

  it("jsonResponse pretty-prints and exposes structured content", () => {
    const response = jsonResponse({ id: "END", serial: 1 });
    expect(response.content[0].text).toBe('{\n  "id": "END",\n  "serial": 1\n}');
    expect(response.structuredContent).toEqual({ id: "END", serial: 1 });
  });

  it("errorResponse marks the response as an error", () => {
    expect(errorResponse("bad id")).toEqual({
      content: [{ type: "text", text: "Error: bad id" }],
      isError: true,
    });
  });

  describe("resultToResponse", () => {
    it("formats Ok values", () => {
      const response = resultToResponse(Ok(4), (n) => textResponse(`size ${n}`));
      expect(response).toEqual(textResponse("size 4"));
    });

    it("uses the message of an Error", () => {
      const response = resultToResponse(Err(new NotFoundError("X")), () => textResponse("unused"));
      expect(response).toEqual(errorResponse("Node not found: X"));
    });

    it("uses a string error as is", () => {
      const response = resultToResponse(Err("no network"), () => textResponse("unused"));
      expect(response.content[0].text).toBe("Error: no network");
    });
  });
});
