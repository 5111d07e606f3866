/**
 * index.ts parses process.argv when it is imported, so each test sets argv,
 * resets the module registry and imports it again. The client, the play
 * loop and config loading are mocked; commander runs for real.
 */
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import type { ClientConfig } from "@crawlbridge/schemas";
import { red } from "./report-formatter.js";

const config: ClientConfig = {
  serverUrl: "ws://localhost:8080/socket",
  username: "tester",
  password: "test-secret",
  gameId: "",
  species: "b",
  background: "f",
  weapon: "",
  narrateInterval: 5,
  actionTimeoutMs: 5000,
  statusPath: null,
  logLevel: "info",
};

const mockClient = {
  requestShutdown: vi.fn(),
  connect: vi.fn(),
  disconnect: vi.fn(),
};
const playSession = vi.fn();
const loadConfig = vi.fn();

vi.mock("dotenv/config", () => ({}));

vi.mock("@crawlbridge/client", () => ({
  GameClient: vi.fn().mockImplementation(() => mockClient),
  consoleLoggerFactory: vi.fn(),
}));

vi.mock("./play-command.js", () => ({ playSession }));

vi.mock("./config.js", async (importOriginal) => ({
  ...(await importOriginal<typeof import("./config.js")>()),
  loadConfig,
}));

const originalArgv = process.argv;
let onSpy: MockInstance<typeof process.on>;
let exitSpy: MockInstance<typeof process.exit>;
let logSpy: MockInstance<typeof console.log>;
let errorSpy: MockInstance<typeof console.error>;

/** Listeners the CLI registered for `event` during this test. */
function registered(event: string): Array<(...args: unknown[]) => void> {
  return onSpy.mock.calls.filter(([name]) => name === event).map(([, listener]) => listener);
}

function runCli(...args: string[]): Promise<unknown> {
  process.argv = ["node", "crawlbridge", ...args];
  return import("./index.js");
}

describe("crawlbridge CLI", () => {
  beforeEach(() => {
    vi.resetModules();
    vi.clearAllMocks();
    loadConfig.mockReturnValue(config);
    mockClient.connect.mockResolvedValue(["dcss-web-trunk"]);
    mockClient.disconnect.mockResolvedValue(undefined);
    onSpy = vi.spyOn(process, "on");
    exitSpy = vi.spyOn(process, "exit").mockImplementation((code) => {
      throw new Error(`exit ${code}`);
    });
    logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    for (const [event, listener] of onSpy.mock.calls) process.removeListener(event, listener);
    onSpy.mockRestore();
    exitSpy.mockRestore();
    logSpy.mockRestore();
    errorSpy.mockRestore();
    process.argv = originalArgv;
    process.exitCode = undefined;
  });

  it("registers crash handlers for the whole process", async () => {
    playSession.mockResolvedValue({ reports: [], died: false });
    await runCli("play");
    expect(registered("unhandledRejection")).toHaveLength(1);
    expect(registered("uncaughtException")).toHaveLength(1);
  });

  it("passes the play options through and exits with 2 on death", async () => {
    playSession.mockResolvedValue({ reports: [], died: true });

    await runCli("play", "--rounds", "2", "--save", "--no-stop-on-altar", "--max-actions", "50");

    expect(playSession).toHaveBeenCalledWith(
      mockClient,
      config,
      {
        rounds: 2,
        save: true,
        autoPlay: { stopOnItems: true, stopOnAltar: false, autoDescend: false, maxActions: 50 },
      },
      expect.any(Function),
    );
    expect(process.exitCode).toBe(2);
  });

  it("leaves the exit code alone when the character survives", async () => {
    playSession.mockResolvedValue({ reports: [], died: false });
    await runCli("play");
    expect(process.exitCode).toBeUndefined();
  });

  it("asks for a graceful stop on the first Ctrl-C and quits on the second", async () => {
    playSession.mockResolvedValue({ reports: [], died: false });
    await runCli("play");

    const [sigint] = registered("SIGINT");
    expect(sigint).toBeDefined();
    if (!sigint) return;

    sigint("SIGINT");
    expect(mockClient.requestShutdown).toHaveBeenCalledTimes(1);
    expect(exitSpy).not.toHaveBeenCalled();

    expect(() => sigint("SIGINT")).toThrow("exit 130");
    expect(mockClient.requestShutdown).toHaveBeenCalledTimes(1);
  });

  it("prints the lobby games", async () => {
    await runCli("lobby", "--username", "tester");

    expect(mockClient.connect).toHaveBeenCalledWith("ws://localhost:8080/socket", "tester", "test-secret");
    expect(mockClient.disconnect).toHaveBeenCalledTimes(1);
    expect(loadConfig.mock.calls[0]?.[0]).toMatchObject({ flags: { username: "tester" } });
  });

  it("reports a failure in red and exits with 1", async () => {
    loadConfig.mockImplementation(() => {
      throw new Error("Invalid config: /actionTimeoutMs must be >= 100");
    });

    await expect(runCli("play")).rejects.toThrow("exit 1");
    expect(errorSpy).toHaveBeenCalledWith(red("Error: Invalid config: /actionTimeoutMs must be >= 100"));
    expect(playSession).not.toHaveBeenCalled();
  });
});
