import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { VERSION, runCli } from "../src/cli/run";
import { getHelpText } from "../src/cli/args";
import { isRecord } from "../src/providers/normalize";
import { createRouteFetcher, jsonResponse } from "./provider-fixtures";

const argv = (...args: string[]) => ["node", "reelhub", ...args];

const eventOf = (line: string): unknown => {
  const parsed: unknown = JSON.parse(line);
  return isRecord(parsed) ? parsed.event : undefined;
};

describe("runCli", () => {
  let dir: string;
  let write: Mock<(line: string) => void>;
  let writeError: Mock<(line: string) => void>;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "reelhub-cli-"));
    write = vi.fn<(line: string) => void>();
    writeError = vi.fn<(line: string) => void>();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const writeConfig = (config: unknown): NodeJS.ProcessEnv => {
    const filePath = path.join(dir, "reelhub.jsonc");
    fs.writeFileSync(filePath, `// test config\n${JSON.stringify(config, null, 2)}\n`, "utf-8");
    return { REELHUB_CONFIG: filePath };
  };

  const cenguiguiOnly = { providers: [{ id: "cenguigui", kind: "cenguigui" }] };

  const searchFetcher = () => createRouteFetcher(() => jsonResponse({
    code: 200,
    page: 1,
    data: [
      { book_id: "b1", title: "总裁的逆袭" },
      { book_id: "b2", title: "总裁归来" }
    ]
  }));

  const errorLines = () => writeError.mock.calls.map(([line]) => line);

  it("prints help and the version without loading config", async () => {
    await expect(runCli(argv(), { write, writeError })).resolves.toBe(0);
    await expect(runCli(argv("--version"), { write, writeError })).resolves.toBe(0);

    expect(write.mock.calls).toEqual([[getHelpText()], [`reelhub v${VERSION}`]]);
    expect(writeError).not.toHaveBeenCalled();
  });

  it("searches the configured provider and prints JSON", async () => {
    const fetcher = searchFetcher();
    const code = await runCli(argv("search", "总裁"), { write, writeError, env: writeConfig(cenguiguiOnly), fetcher });

    expect(code).toBe(0);
    expect(fetcher).toHaveBeenCalledTimes(1);
    const output: unknown = JSON.parse(write.mock.calls[0]?.[0] ?? "null");
    expect(output).toMatchObject({
      success: true,
      message: "2 result(s) on page 1",
      data: { statusCode: 200, page: 1, items: [{ id: "b1" }, { id: "b2" }] }
    });
  });

  it("prints the summary line in text format", async () => {
    const code = await runCli(argv("search", "总裁", "--format", "text"), {
      write,
      writeError,
      env: writeConfig(cenguiguiOnly),
      fetcher: searchFetcher()
    });

    expect(code).toBe(0);
    expect(write.mock.calls).toEqual([["2 result(s) on page 1"]]);
  });

  it("lists providers from the default configuration", async () => {
    const code = await runCli(argv("providers", "--format=text"), {
      write,
      writeError,
      env: { REELHUB_CONFIG: path.join(dir, "missing.jsonc") }
    });

    expect(code).toBe(0);
    expect(write.mock.calls).toEqual([["3 provider(s), active: cenguigui"]]);
  });

  it("lists categories of a named provider", async () => {
    const fetcher = createRouteFetcher(() => jsonResponse({}));
    const code = await runCli(argv("categories", "--provider", "duanju-search"), {
      write,
      writeError,
      env: { REELHUB_CONFIG: path.join(dir, "missing.jsonc") },
      fetcher
    });

    expect(code).toBe(0);
    expect(JSON.parse(write.mock.calls[0]?.[0] ?? "null")).toEqual({
      success: true,
      message: "3 categories",
      data: ["今日更新", "热门榜单", "全部短剧"]
    });
    expect(fetcher).not.toHaveBeenCalled();
  });

  it("reports usage errors with a help hint", async () => {
    await expect(runCli(argv("launch"), { write, writeError })).resolves.toBe(1);

    expect(errorLines()).toEqual([
      JSON.stringify({ success: false, error: "Unknown command: launch", exitCode: 1 }),
      "For help: reelhub --help"
    ]);
    expect(write).not.toHaveBeenCalled();
  });

  it("reports query failures with exit code 2", async () => {
    const fetcher = createRouteFetcher(() => jsonResponse({ code: 500, msg: "busy" }));
    const sleep = vi.fn(async (_ms: number) => {});
    const code = await runCli(argv("search", "总裁"), {
      write,
      writeError,
      env: writeConfig(cenguiguiOnly),
      fetcher,
      sleep
    });

    expect(code).toBe(2);
    expect(fetcher).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(250);
    expect(errorLines().at(-1)).toBe(JSON.stringify({
      success: false,
      error: "Upstream rejected search: busy",
      exitCode: 2
    }));
  });

  it("reports invalid configuration", async () => {
    const env = writeConfig({ providers: [{ id: "a", kind: "unknown" }] });
    const code = await runCli(argv("providers"), { write, writeError, env });

    expect(code).toBe(2);
    const [line] = errorLines();
    expect(JSON.parse(line ?? "null")).toMatchObject({ success: false, exitCode: 2 });
    expect(line).toContain("Invalid reelhub config at");
    expect(line).toContain("providers.0.kind");
  });

  it("logs structured entries to stderr and shows debug entries only when asked", async () => {
    const quiet = await runCli(argv("search", "总裁"), {
      write,
      writeError,
      env: writeConfig(cenguiguiOnly),
      fetcher: searchFetcher()
    });
    expect(quiet).toBe(0);
    const quietEvents = errorLines().map(eventOf);
    expect(quietEvents).toEqual(["provider.registered"]);

    writeError.mockClear();
    const env = { ...writeConfig(cenguiguiOnly), REELHUB_DEBUG: "1" };
    await runCli(argv("search", "总裁"), { write, writeError, env, fetcher: searchFetcher() });
    const verboseEvents = errorLines().map(eventOf);
    expect(verboseEvents).toEqual(["provider.registered", "provider.fetch.succeeded"]);
  });
});
