import { describe, it, expect, vi } from "vitest";
import { createMCPServer } from "../src/mcp-server.js";

describe("MCP Server", () => {
  describe("server module", () => {
    it("should create server with its name", () => {
      const server = createMCPServer();
      expect(server.name).toBe("discern");
    });

    it("should list the inference and checking tools", () => {
      const server = createMCPServer();
      expect(server.getTools().map((t) => t.name)).toEqual(["infer_pattern", "check_pattern"]);
    });

    it("should have correct input schema for infer_pattern", () => {
      const server = createMCPServer();
      const tool = server.getTools().find((t) => t.name === "infer_pattern");

      expect(tool?.inputSchema.properties).toHaveProperty("valid");
      expect(tool?.inputSchema.properties).toHaveProperty("invalid");
      expect(tool?.inputSchema.required).toEqual(["valid", "invalid"]);
    });

    it("should have correct input schema for check_pattern", () => {
      const server = createMCPServer();
      const tool = server.getTools().find((t) => t.name === "check_pattern");

      expect(tool?.inputSchema.required).toEqual(["pattern", "valid", "invalid"]);
    });
  });

  describe("callTool", () => {
    it("should infer a pattern", async () => {
      const server = createMCPServer();
      const result = await server.callTool("infer_pattern", {
        valid: ["foo@abc.com", "bar@def.net"],
        invalid: ["baz@abc", "qux.com"],
      });

      expect(result).toEqual({ content: [{ type: "text", text: "^\\D+@\\w+\\.\\w+$" }] });
    });

    it("should return the sentinel when no pattern exists", async () => {
      const server = createMCPServer();
      const result = await server.callTool("infer_pattern", { valid: ["a"], invalid: ["a"] });

      expect(result).toEqual({ content: [{ type: "text", text: "pattern not found" }] });
    });

    it("should notify the infer callback", async () => {
      const onInfer = vi.fn();
      const server = createMCPServer({ onInfer });
      await server.callTool("infer_pattern", { valid: ["1"], invalid: ["a"] });

      expect(onInfer).toHaveBeenCalledWith({ valid: ["1"], invalid: ["a"] });
    });

    it("should check a pattern", async () => {
      const server = createMCPServer();

      const ok = await server.callTool("check_pattern", {
        pattern: "^.+-.+$",
        valid: ["abc-1"],
        invalid: ["abc1"],
      });
      expect(ok).toEqual({ content: [{ type: "text", text: '{"discriminates":true}' }] });

      const bad = await server.callTool("check_pattern", {
        pattern: "^(.+$",
        valid: ["abc"],
        invalid: [],
      });
      expect(bad).toEqual({ content: [{ type: "text", text: '{"discriminates":false}' }] });
    });

    it("should flag bad arguments as errors", async () => {
      const server = createMCPServer();

      const result = await server.callTool("infer_pattern", { valid: "abc", invalid: [] });
      expect(result).toEqual({
        content: [{ type: "text", text: "Error: 'valid' must be an array of strings" }],
        isError: true,
      });

      const noPattern = await server.callTool("check_pattern", { valid: [], invalid: [] });
      expect(noPattern).toEqual({
        content: [{ type: "text", text: "Error: 'pattern' must be a string" }],
        isError: true,
      });
    });

    it("should report unknown tools", async () => {
      const server = createMCPServer();
      const result = await server.callTool("nope", {});

      expect(result).toEqual({ content: [{ type: "text", text: "Unknown tool: nope" }] });
    });
  });
});
