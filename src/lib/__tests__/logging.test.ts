import assert from "node:assert/strict";
import test from "node:test";
import { configureLogging, logError, logInfo, logWarn, serializeError } from "../logging.js";

function capture(): { lines: string[]; write: (chunk: string) => void } {
  const lines: string[] = [];
  return {
    lines,
    write: (chunk: string) => {
      lines.push(chunk);
    }
  };
}

test("events below the configured level are dropped", () => {
  const sink = capture();
  configureLogging("warn", sink);

  try {
    logInfo("dropped");
    logWarn("kept.warn", { attempt: 2 });
    logError("kept.error");
  } finally {
    configureLogging("info");
  }

  assert.deepEqual(
    sink.lines.map((line) => {
      const { level, event, attempt } = JSON.parse(line);
      return { level, event, attempt };
    }),
    [
      { level: "warn", event: "kept.warn", attempt: 2 },
      { level: "error", event: "kept.error", attempt: undefined }
    ]
  );
  assert.ok(sink.lines.every((line) => line.endsWith("\n")));
});

test("silent drops every event", () => {
  const sink = capture();
  configureLogging("silent", sink);

  try {
    logError("never");
  } finally {
    configureLogging("info");
  }

  assert.deepEqual(sink.lines, []);
});

test("serializeError keeps name and message", () => {
  const serialized = serializeError(new TypeError("bad seed"));

  assert.equal(serialized.name, "TypeError");
  assert.equal(serialized.message, "bad seed");
  assert.deepEqual(serializeError("plain"), { message: "plain" });
});
