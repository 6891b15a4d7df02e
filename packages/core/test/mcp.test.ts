import { describe, it, expect } from "vitest";
import {
  jsonResponse,
  errorResponse,
  resultToResponse,
} from "../src/mcp.js";
import { Ok, Err } from "../src/result.js";

describe("MCP utilities", () => {
  it("jsonResponse pretty-prints its payload", () => {
    expect(jsonResponse({ id: "CLI-001" })).toEqual({
      content: [{ type: "text", text: '{\n  "id": "CLI-001"\n}' }],
    });
  });

  describe("errorResponse", () => {
    it("prefixes the message and flags the response", () => {
      expect(errorResponse("Card not found: X-001")).toEqual({
        content: [{ type: "text", text: "Error: Card not found: X-001" }],
        isError: true,
      });
    });

    it("accepts objects carrying a message", () => {
      const response = errorResponse({ message: "Title is required" });
      expect(response.content[0].text).toBe("Error: Title is required");
    });
  });

  describe("resultToResponse", () => {
    it("formats a success", () => {
      const response = resultToResponse(Ok(3), (n) => jsonResponse({ count: n }));
      expect(response).toEqual({ content: [{ type: "text", text: '{\n  "count": 3\n}' }] });
    });

    it("turns an error into an error response", () => {
      const response = resultToResponse(Err({ message: "nope" }), () => jsonResponse("unused"));
      expect(response.isError).toBe(true);
      expect(response.content[0].text).toBe("Error: nope");
    });
  });
});
