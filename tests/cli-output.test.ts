import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { writeOutput } from "../src/cli/output";

describe("writeOutput", () => {
  const originalLog = console.log;

  beforeEach(() => {
    console.log = vi.fn();
  });

  afterEach(() => {
    console.log = originalLog;
    vi.restoreAllMocks();
  });

  it("prints text payloads as-is", () => {
    writeOutput("3 categories", { format: "text" });
    expect(console.log).toHaveBeenCalledWith("3 categories");
  });

  it("pretty-prints non-string payloads in text mode", () => {
    const payload = { active: "cenguigui" };
    writeOutput(payload, { format: "text" });
    expect(console.log).toHaveBeenCalledWith(JSON.stringify(payload, null, 2));
  });

  it("prints JSON payloads in json mode", () => {
    const payload = { success: true };
    writeOutput(payload, { format: "json" });
    expect(console.log).toHaveBeenCalledWith('{"success":true}');
  });

  it("writes through a custom writer and honours quiet", () => {
    const write = vi.fn();
    writeOutput("hello", { format: "text", write });
    writeOutput("ignored", { format: "text", write, quiet: true });
    expect(write.mock.calls).toEqual([["hello"]]);
    expect(console.log).not.toHaveBeenCalled();
  });
});
