import { test, describe, before, after, mock } from "node:test";
import assert from "node:assert";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { compileFile, type CompileFlags } from "./compile.ts";

const recorder = () => ({
  log: mock.fn<(...args: unknown[]) => void>(),
  warn: mock.fn<(...args: unknown[]) => void>(),
  error: mock.fn<(...args: unknown[]) => void>(),
});

describe("compile command", () => {
  let dir = "";
  const file = (name: string) => path.join(dir, name);
  const flags = (overrides: Partial<CompileFlags> = {}): CompileFlags => ({
    format: "json",
    pretty: false,
    noColor: true,
    ...overrides,
  });

  const exported = {
    start: 1,
    nodes: [
      { id: 1, kind: "talk", text: "Hi", talkers: [] },
      { id: 2, kind: "talk", text: "Bye", talkers: [] },
    ],
    edges: [{ source: 1, target: 2 }],
  };

  before(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "talkgraph-compile-"));
    await fs.writeFile(
      file("hello.json"),
      JSON.stringify({
        lines: [
          { id: 1, text: "Hi", start: true, next: 2 },
          { id: 2, text: "Bye" },
        ],
      }),
    );
    await fs.writeFile(
      file("headless.json"),
      JSON.stringify({ lines: [{ id: 1, text: "Hi" }] }),
    );
  });

  after(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  test("Prints compact JSON by default", async () => {
    const out = recorder();
    assert.strictEqual(await compileFile(file("hello.json"), flags(), out), true);
    assert.deepStrictEqual(out.log.mock.calls[0]?.arguments, [
      JSON.stringify(exported),
    ]);
  });

  test("Indents JSON when asked to", async () => {
    const out = recorder();
    await compileFile(file("hello.json"), flags({ pretty: true }), out);
    assert.deepStrictEqual(out.log.mock.calls[0]?.arguments, [
      JSON.stringify(exported, null, 2),
    ]);
  });

  test("Writes DOT output to a file", async () => {
    const out = recorder();
    const target = file("hello.dot");
    const ok = await compileFile(
      file("hello.json"),
      flags({ format: "dot", output: target }),
      out,
    );

    assert.strictEqual(ok, true);
    assert.strictEqual(
      await fs.readFile(target, "utf-8"),
      [
        "digraph conversation {",
        '  1 [label="Hi", shape=doublecircle];',
        '  2 [label="Bye", shape=box];',
        "  1 -> 2;",
        "}",
        "",
      ].join("\n"),
    );
    assert.deepStrictEqual(out.log.mock.calls[0]?.arguments, [
      `Wrote dot output to ${target}`,
    ]);
  });

  test("Reports compile errors and writes nothing", async () => {
    const out = recorder();
    const ok = await compileFile(file("headless.json"), flags(), out);

    assert.strictEqual(ok, false);
    assert.strictEqual(out.log.mock.callCount(), 0);
    assert.deepStrictEqual(out.error.mock.calls[0]?.arguments, [
      `${file("headless.json")}: error: no initial dialogue was found, add a 'start': true to one of the dialogue lines`,
    ]);
  });

  test("Rejects an unknown export format", async () => {
    await assert.rejects(
      compileFile(file("hello.json"), flags({ format: "csv" }), recorder()),
      /Invalid export format: "csv"/,
    );
  });
});
