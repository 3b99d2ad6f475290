import { describe, expect, it } from "vitest";
import { FakeCommandRunner } from "../../testing/fakeCommandRunner.js";
import { Command, CommandError, NodeCommandRunner, checkResult } from "./command.js";

describe("checkResult", () => {
  it("passes a zero exit through", () => {
    const result = { argv: ["true"], exitCode: 0, signal: null, stdout: "ok", stderr: "" };
    expect(checkResult(result)).toBe(result);
  });

  it("throws a failed CommandError carrying the exit status", () => {
    const result = { argv: ["ssh", "::1", "ls"], exitCode: 255, signal: null, stdout: "", stderr: "no route" };
    try {
      checkResult(result);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(CommandError);
      if (!(err instanceof CommandError)) return;
      expect(err.kind).toBe("failed");
      expect(err.message).toBe("ssh ::1 ls failed");
      expect(err.details.status).toBe(255);
      expect(err.details.stderr).toBe("no route");
    }
  });
});

describe("Command", () => {
  it("runs through its runner", async () => {
    const runner = new FakeCommandRunner().on("cat", { stdout: "hello" });
    const cmd = new Command(runner, ["cat"]);
    expect(String(cmd)).toBe("cat");

    const result = await cmd.output({ input: "hello" });
    expect(result.stdout).toBe("hello");
    expect(runner.calls).toEqual([{ kind: "exec", argv: ["cat"], input: "hello" }]);
  });

  it("check() rejects on a nonzero exit", async () => {
    const runner = new FakeCommandRunner().on("false", { exitCode: 1 });
    await expect(new Command(runner, ["false"]).check()).rejects.toBeInstanceOf(CommandError);
  });
});

describe("NodeCommandRunner", () => {
  it("reports an executable that cannot be found", async () => {
    const runner = new NodeCommandRunner();
    await expect(runner.exec(["rfuzz-no-such-executable"])).rejects.toMatchObject({
      name: "CommandError",
      kind: "missing",
    });
  });

  it("reports the exit status of a child that ignores its input", async () => {
    const result = await new NodeCommandRunner().exec(["sh", "-c", "exit 3"], { input: "x".repeat(8 * 1024 * 1024) });
    expect(result).toMatchObject({ exitCode: 3, stdout: "", stderr: "" });
  });

  it("refuses an empty argv", async () => {
    await expect(new NodeCommandRunner().exec([])).rejects.toMatchObject({ kind: "failed" });
  });
});
