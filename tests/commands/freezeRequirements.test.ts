import { freezeRequirements, unpinRequirements } from "../../src/commands/freezeRequirements";
import { InMemoryProcessRunner } from "../../src/abstractions/InMemoryProcessRunner";
import { InMemoryFileSystem } from "../../src/abstractions/InMemoryFileSystem";
import { CommandFailedError } from "../../src/errors";

describe("unpinRequirements", () => {
  it("drops version pins and blank lines", () => {
    expect(unpinRequirements("flask==3.0.3\nollama==0.3.0\n\nrequests==2.32.3\n")).toEqual([
      "flask",
      "ollama",
      "requests",
    ]);
  });

  it("keeps unpinned lines as they are", () => {
    expect(unpinRequirements("  mypkg  \n")).toEqual(["mypkg"]);
  });
});

describe("freezeRequirements", () => {
  it("writes one unpinned package per line", async () => {
    const runner = new InMemoryProcessRunner();
    const fs = new InMemoryFileSystem();
    runner.mockResponse("pip3 freeze", { stdout: "flask==3.0.3\nflask-cors==4.0.1\n", stderr: "", exitCode: 0 });

    const result = await freezeRequirements(runner, fs, "/project/requirements.txt");

    expect(result).toEqual({ path: "/project/requirements.txt", packages: ["flask", "flask-cors"] });
    await expect(fs.readFile("/project/requirements.txt")).resolves.toBe("flask\nflask-cors");
  });

  it("fails without writing when pip fails", async () => {
    const runner = new InMemoryProcessRunner();
    const fs = new InMemoryFileSystem();
    runner.mockResponse("pip3 freeze", { stdout: "", stderr: "pip3: command not found", exitCode: 127 });

    await expect(freezeRequirements(runner, fs, "/project/requirements.txt")).rejects.toBeInstanceOf(
      CommandFailedError
    );
    await expect(fs.exists("/project/requirements.txt")).resolves.toBe(false);
  });
});
