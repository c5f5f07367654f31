import { test, describe, mock } from "node:test";
import assert from "node:assert";
import { Logger } from "./logger.ts";
import { compile } from "../graph/compiler.ts";
import { TalkDirector } from "../director/director.ts";

const recorder = () => ({
  log: mock.fn<(...args: unknown[]) => void>(),
  warn: mock.fn<(...args: unknown[]) => void>(),
  error: mock.fn<(...args: unknown[]) => void>(),
});

describe("Logger", () => {
  test("Stays silent while disabled", () => {
    const sink = recorder();
    const logger = new Logger("cli", { sink });
    logger.log("hidden");
    logger.error("hidden too");
    assert.strictEqual(sink.log.mock.callCount(), 0);
    assert.strictEqual(sink.error.mock.callCount(), 0);
  });

  test("Prefixes messages with its scope", () => {
    const sink = recorder();
    new Logger("director", { enabled: true, sink }).warn("careful", 42);
    assert.deepStrictEqual(sink.warn.mock.calls[0]?.arguments, [
      "[talkgraph director] careful",
      42,
    ]);
  });

  test("Tags messages with a talk name and keeps its sink", () => {
    const sink = recorder();
    const logger = new Logger("director", { enabled: true, sink });
    logger.forTalk("cafe").log("hello");
    assert.deepStrictEqual(sink.log.mock.calls[0]?.arguments, [
      "[talkgraph director:cafe] hello",
    ]);

    const silent = new Logger("director", { sink }).forTalk("cafe");
    silent.log("nothing");
    assert.strictEqual(sink.log.mock.callCount(), 1);
  });

  test("Receives compile warnings and errors", () => {
    const sink = recorder();
    const logger = new Logger("compiler", { enabled: true, sink });

    compile(
      {
        talkers: [],
        lines: [{ id: 1, text: "Bye", start: true, end: true, next: 1 }],
      },
      { logger },
    );
    assert.deepStrictEqual(sink.warn.mock.calls[0]?.arguments, [
      "[talkgraph compiler] Line 1 is an end line, its next line 1 is ignored",
    ]);
    assert.deepStrictEqual(sink.log.mock.calls[0]?.arguments, [
      "[talkgraph compiler] compiled 1 lines and 0 links",
    ]);

    compile({ talkers: [], lines: [] }, { logger });
    assert.deepStrictEqual(sink.error.mock.calls[0]?.arguments, [
      "[talkgraph compiler] an empty lines list was used to build the conversation",
    ]);
  });

  test("Receives director failures tagged with the talk", () => {
    const sink = recorder();
    const director = new TalkDirector({
      logger: new Logger("director", { enabled: true, sink }),
    });
    director.handle({ type: "next", talk: "bar" });
    assert.deepStrictEqual(sink.warn.mock.calls[0]?.arguments, [
      "[talkgraph director:bar] request failed: No talk named 'bar' was found",
    ]);
  });
});
