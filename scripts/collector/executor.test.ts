import { describe, expect, it } from "vitest";

import { createCommandExecutor, decodeJsonOutput } from "./executor";
import { AuthenticationError, DataDecodeError, ExternalToolError } from "./errors";

function nodeScript(source: string): string[] {
  return [process.execPath, "-e", source];
}

describe("decodeJsonOutput", () => {
  it("parses a single document", () => {
    expect(decodeJsonOutput('[{"name":"a"}]\n', "listing")).toEqual([{ name: "a" }]);
  });

  it("returns null for empty output", () => {
    expect(decodeJsonOutput("  \n", "listing")).toBeNull();
  });

  it("collects one document per line when the output holds several", () => {
    expect(decodeJsonOutput("30\n30\n4\n", "branches")).toEqual([30, 30, 4]);
  });

  it("raises DataDecodeError with a bounded payload preview", () => {
    const payload = `not json ${"x".repeat(600)}`;
    expect(() => decodeJsonOutput(payload, "listing")).toThrow(DataDecodeError);
    try {
      decodeJsonOutput(payload, "listing");
    } catch (error) {
      if (!(error instanceof DataDecodeError)) {
        throw error;
      }
      expect(error.operation).toBe("listing");
      expect(error.payloadPreview).toHaveLength(500);
      expect(error.payloadPreview.startsWith("not json x")).toBe(true);
    }
  });
});

describe("createCommandExecutor", () => {
  const executor = createCommandExecutor();

  it("returns parsed stdout of a successful command", async () => {
    const result = await executor.execute(nodeScript("process.stdout.write(JSON.stringify({ ok: true, n: 3 }))"));
    expect(result).toEqual({ ok: true, n: 3 });
  });

  it("passes arguments without shell interpretation", async () => {
    const result = await executor.execute([
      process.execPath,
      "-e",
      "process.stdout.write(JSON.stringify(process.argv.slice(1)))",
      "$(whoami)",
      "a b;c",
    ]);
    expect(result).toEqual(["$(whoami)", "a b;c"]);
  });

  it("raises ExternalToolError with stderr and exit code on failure", async () => {
    const argv = nodeScript("process.stderr.write('repository not found'); process.exit(4)");
    const error = await executor.execute(argv).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ExternalToolError);
    expect(error).not.toBeInstanceOf(AuthenticationError);
    expect(error).toMatchObject({ exitCode: 4, stderr: "repository not found", argv, timedOut: false });
  });

  it("recognises authentication failures from stderr", async () => {
    const error = await executor
      .execute(nodeScript("process.stderr.write('To get started with GitHub CLI, please run:  gh auth login'); process.exit(1)"))
      .catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(AuthenticationError);
  });

  it("raises DataDecodeError when stdout is not JSON", async () => {
    const error = await executor
      .execute(nodeScript("process.stdout.write('<html>rate limited</html>')"))
      .catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(DataDecodeError);
    expect(error).toMatchObject({ payloadPreview: "<html>rate limited</html>" });
  });

  it("reports a missing binary as ExternalToolError", async () => {
    const error = await executor
      .execute(["definitely-not-an-installed-binary-4711", "repo", "list"])
      .catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ExternalToolError);
    expect(error).toMatchObject({ exitCode: null });
  });

  it("kills commands that exceed the timeout", async () => {
    const slow = createCommandExecutor({ timeoutMs: 200 });
    const error = await slow.execute(nodeScript("setTimeout(() => {}, 10000)")).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ExternalToolError);
    expect(error).toMatchObject({ timedOut: true });
  });

  it("does not report an output overrun as a timeout", async () => {
    const chatty = createCommandExecutor({ timeoutMs: 5000, maxOutputBytes: 100 });
    const error = await chatty
      .execute(nodeScript('process.stdout.write("x".repeat(5000))'))
      .catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ExternalToolError);
    expect(error).toMatchObject({ timedOut: false, exitCode: null });
  });
});
