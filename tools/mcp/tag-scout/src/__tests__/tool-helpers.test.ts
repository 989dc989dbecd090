import { describe, it, expect, vi } from "vitest";
import { DataNotReadyError, InvalidRequestError, isTagScoutError } from "../errors.js";
import { describeError, toolError, toolResponse, wrapTool } from "../tool-helpers.js";

describe("toolResponse", () => {
  it("wraps data as pretty JSON text", () => {
    expect(toolResponse({ tags: ["RPG"] })).toEqual({
      content: [{ type: "text", text: '{\n  "tags": [\n    "RPG"\n  ]\n}' }],
    });
  });

  it("passes strings through", () => {
    expect(toolResponse("done").content[0].text).toBe("done");
  });
});

describe("describeError", () => {
  it("prefixes tag-scout errors with their code", () => {
    expect(describeError(new DataNotReadyError("not built"))).toBe("Error [DATA_NOT_READY]: not built");
    expect(describeError(new InvalidRequestError(["teamSize: too big", "topN: too big"]))).toBe(
      "Error [INVALID_REQUEST]: Invalid recommendation request: teamSize: too big; topN: too big"
    );
  });

  it("describes other errors and thrown values", () => {
    expect(describeError(new Error("disk full"))).toBe("Error: disk full");
    expect(describeError("boom")).toBe("Error: boom");
  });

  it("only recognizes tag-scout errors", () => {
    expect(isTagScoutError(new DataNotReadyError("x"))).toBe(true);
    expect(isTagScoutError(new Error("x"))).toBe(false);
  });
});

describe("wrapTool", () => {
  it("turns a thrown error into an error response", async () => {
    const handler = wrapTool("failing_tool", async (_params: { tag: string }) => {
      throw new DataNotReadyError("not built");
    });
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    expect(await handler({ tag: "RPG" })).toEqual(toolError(new DataNotReadyError("not built")));
    expect(spy.mock.calls[0][0]).toContain("ERROR [failing_tool] not built");
    spy.mockRestore();
  });
});
