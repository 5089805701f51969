import { SystemPackagesStage } from "../../src/stages/SystemPackagesStage";
import { PythonDependenciesStage } from "../../src/stages/PythonDependenciesStage";
import { RuntimeInstallStage } from "../../src/stages/RuntimeInstallStage";
import { ProvisioningPipeline } from "../../src/pipeline/ProvisioningPipeline";
import type { StageContext } from "../../src/pipeline/types";
import { InMemoryProcessRunner } from "../../src/abstractions/InMemoryProcessRunner";
import { InMemoryFileSystem } from "../../src/abstractions/InMemoryFileSystem";
import { FixedClock } from "../../src/abstractions/FixedClock";
import { InMemoryLogger } from "../../src/logging";
import { CommandFailedError } from "../../src/errors";

const FAILED = { stdout: "", stderr: "E: Could not get lock /var/lib/apt/lists/lock", exitCode: 100 };
const OK = { stdout: "", stderr: "", exitCode: 0 };

describe("install stages", () => {
  let runner: InMemoryProcessRunner;
  let logger: InMemoryLogger;
  let context: StageContext;

  beforeEach(() => {
    runner = new InMemoryProcessRunner();
    logger = new InMemoryLogger();
    context = { logger, signal: new AbortController().signal, warn: (message) => logger.warn(message) };
  });

  describe("SystemPackagesStage", () => {
    const createStage = (): SystemPackagesStage =>
      new SystemPackagesStage(runner, ["python3", "python3-pip", "curl"], ["python3", "pip3", "curl"]);

    it("is satisfied when every required command is on PATH", async () => {
      await expect(createStage().isSatisfied(context)).resolves.toEqual({
        satisfied: true,
        reason: "python3, pip3, curl already installed",
      });
      expect(runner.getCommandLines()).toEqual([
        'sh -c command -v "$1" sh python3',
        'sh -c command -v "$1" sh pip3',
        'sh -c command -v "$1" sh curl',
      ]);
    });

    it("names the missing commands", async () => {
      runner.mockResponse('sh -c command -v "$1" sh pip3', { stdout: "", stderr: "", exitCode: 1 });

      await expect(createStage().isSatisfied(context)).resolves.toEqual({
        satisfied: false,
        reason: "missing pip3",
      });
    });

    it("updates the package index, then installs", async () => {
      await createStage().execute(context);

      expect(runner.getCommandLines()).toEqual([
        "sudo apt-get update -y",
        "sudo apt-get install -y --no-install-recommends python3 python3-pip curl",
      ]);
      expect(logger.getMessages("verbose")).toEqual([
        "$ sudo apt-get update -y",
        "$ sudo apt-get install -y --no-install-recommends python3 python3-pip curl",
      ]);
    });

    it("does not install when the update fails", async () => {
      runner.mockResponse("sudo apt-get update -y", FAILED);

      await expect(createStage().execute(context)).rejects.toBeInstanceOf(CommandFailedError);
      expect(runner.getCommandLines()).toEqual(["sudo apt-get update -y"]);
    });

    it("is retried by the pipeline after a transient failure", async () => {
      runner.mockResponse('sh -c command -v "$1" sh curl', { stdout: "", stderr: "", exitCode: 1 });
      runner.mockResponse("sudo apt-get update -y", FAILED, OK);
      const clock = new FixedClock();

      const result = await new ProvisioningPipeline(logger, clock).run([createStage()]);

      expect(result.ok).toBe(true);
      expect(result.reports[0]).toMatchObject({ status: "completed", attempts: 2 });
      expect(clock.getSleeps()).toEqual([5000]);
      expect(runner.countCalls("sudo apt-get update -y")).toBe(2);
    });
  });

  describe("PythonDependenciesStage", () => {
    const createStage = (): PythonDependenciesStage => new PythonDependenciesStage(runner, ["flask", "flask-cors"]);

    it("is satisfied when pip knows every package", async () => {
      await expect(createStage().isSatisfied(context)).resolves.toEqual({
        satisfied: true,
        reason: "all packages present",
      });
      expect(runner.getCommandLines()).toEqual(["pip3 show flask flask-cors"]);
    });

    it("is not satisfied when a package is missing", async () => {
      runner.mockResponse("pip3 show flask flask-cors", {
        stdout: "",
        stderr: "WARNING: Package(s) not found: flask-cors",
        exitCode: 1,
      });

      await expect(createStage().isSatisfied(context)).resolves.toEqual({ satisfied: false });
    });

    it("installs into the user site", async () => {
      await createStage().execute(context);

      expect(runner.getCommandLines()).toEqual(["pip3 install --user flask flask-cors"]);
    });
  });

  describe("RuntimeInstallStage", () => {
    const PROFILE = "/home/dev/.bashrc";
    const BIN_DIR = "/home/dev/.ollama/bin";
    const EXPORT_LINE = 'export PATH="$PATH:/home/dev/.ollama/bin"';
    let fs: InMemoryFileSystem;
    let env: Record<string, string | undefined>;

    const createStage = (): RuntimeInstallStage =>
      new RuntimeInstallStage(runner, fs, env, {
        installUrl: "https://ollama.com/install.sh",
        binDir: BIN_DIR,
        shellProfile: PROFILE,
      });

    beforeEach(() => {
      fs = new InMemoryFileSystem();
      env = { PATH: "/usr/bin" };
    });

    it("is satisfied when ollama is already on PATH", async () => {
      await expect(createStage().isSatisfied(context)).resolves.toEqual({
        satisfied: true,
        reason: "ollama already on PATH",
      });
    });

    it("is not satisfied when ollama is missing", async () => {
      runner.mockResponse('sh -c command -v "$1" sh ollama', { stdout: "", stderr: "", exitCode: 127 });

      await expect(createStage().isSatisfied(context)).resolves.toEqual({ satisfied: false });
    });

    it("runs the install script and puts the bin directory on PATH", async () => {
      await createStage().execute(context);

      expect(runner.getCommandLines()).toEqual(['sh -c curl -fsSL "$1" | sh sh https://ollama.com/install.sh']);
      expect(env.PATH).toBe("/usr/bin:/home/dev/.ollama/bin");
      await expect(fs.readFile(PROFILE)).resolves.toBe(`${EXPORT_LINE}\n`);
    });

    it("starts the export on a new line when the profile lacks a trailing newline", async () => {
      await fs.writeFile(PROFILE, "alias ll='ls -l'");

      await createStage().execute(context);

      await expect(fs.readFile(PROFILE)).resolves.toBe(`alias ll='ls -l'\n${EXPORT_LINE}\n`);
    });

    it("adds the PATH entries only once across repeated runs", async () => {
      await createStage().execute(context);
      await createStage().execute(context);

      expect(env.PATH).toBe("/usr/bin:/home/dev/.ollama/bin");
      await expect(fs.readFile(PROFILE)).resolves.toBe(`${EXPORT_LINE}\n`);
    });

    it("leaves PATH alone when the install script fails", async () => {
      runner.mockResponse('sh -c curl -fsSL "$1" | sh sh https://ollama.com/install.sh', {
        stdout: "",
        stderr: "curl: (6) Could not resolve host: ollama.com",
        exitCode: 6,
      });

      await expect(createStage().execute(context)).rejects.toThrow(
        'Command "sh -c curl -fsSL "$1" | sh sh https://ollama.com/install.sh" exited with code 6: curl: (6) Could not resolve host: ollama.com'
      );
      expect(env.PATH).toBe("/usr/bin");
      await expect(fs.exists(PROFILE)).resolves.toBe(false);
    });
  });
});
