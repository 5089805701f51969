import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { ConsoleLogger, FileLogger, InMemoryLogger, TeeLogger, logOutput } from "../src/logging";

describe("FileLogger", () => {
  let dir: string;
  let logPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "provision-log-"));
    logPath = path.join(dir, "setup.log");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("starts each run with a fresh file and a header", () => {
    fs.writeFileSync(logPath, "previous run\n");

    new FileLogger(logPath, "Setup started");

    const lines = fs.readFileSync(logPath, "utf-8").split("\n");
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] === Setup started ===$/);
    expect(lines[1]).toBe("");
  });

  it("labels each line with its level", () => {
    const logger = new FileLogger(logPath);

    logger.info("Installing");
    logger.success("Installed");
    logger.warn("Slow mirror");
    logger.error("Broken");
    logger.verbose("Reading package lists...");

    const labels = fs
      .readFileSync(logPath, "utf-8")
      .trimEnd()
      .split("\n")
      .slice(1)
      .map((line) => line.replace(/^\[[^\]]+\] /, ""));
    expect(labels).toEqual([
      "[INFO] Installing",
      "[OK] Installed",
      "[WARN] Slow mirror",
      "[ERROR] Broken",
      "[OUT] Reading package lists...",
    ]);
    expect(logger.getFilePath()).toBe(logPath);
  });
});

describe("ConsoleLogger", () => {
  let log: jest.SpyInstance;
  let warn: jest.SpyInstance;
  let error: jest.SpyInstance;

  beforeEach(() => {
    log = jest.spyOn(console, "log").mockImplementation();
    warn = jest.spyOn(console, "warn").mockImplementation();
    error = jest.spyOn(console, "error").mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("prints plain text when colors are off", () => {
    const logger = new ConsoleLogger({ colors: false });

    logger.info("Installing");
    logger.warn("Slow mirror");
    logger.error("Broken");

    expect(log).toHaveBeenCalledWith("Installing");
    expect(warn).toHaveBeenCalledWith("Warning: Slow mirror");
    expect(error).toHaveBeenCalledWith("Broken");
  });

  it("colors success lines green", () => {
    new ConsoleLogger({ colors: true }).success("Done");

    expect(log).toHaveBeenCalledWith("\x1b[0;32mDone\x1b[0m");
  });

  it("hides command output below debug level", () => {
    new ConsoleLogger({ colors: false }).verbose("Reading package lists...");

    expect(log).not.toHaveBeenCalled();
  });

  it("shows command output at debug level", () => {
    new ConsoleLogger({ colors: false, logLevel: "debug" }).verbose("Reading package lists...");

    expect(log).toHaveBeenCalledWith("Reading package lists...");
  });
});

describe("TeeLogger", () => {
  it("forwards every entry to each logger", () => {
    const first = new InMemoryLogger();
    const second = new InMemoryLogger();
    const tee = new TeeLogger([first, second]);

    tee.info("a");
    tee.error("b");

    const expected = [
      { level: "info", message: "a" },
      { level: "error", message: "b" },
    ];
    expect(first.getEntries()).toEqual(expected);
    expect(second.getEntries()).toEqual(expected);
  });
});

describe("logOutput", () => {
  it("logs one verbose entry per non-blank line", () => {
    const logger = new InMemoryLogger();

    logOutput(logger, "pulling manifest  \r\n\n   \nsuccess\n");

    expect(logger.getEntries()).toEqual([
      { level: "verbose", message: "pulling manifest" },
      { level: "verbose", message: "success" },
    ]);
  });
});
