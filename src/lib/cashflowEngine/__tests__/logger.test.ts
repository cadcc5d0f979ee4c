import { describe, it, mock } from "node:test";
import assert from "node:assert/strict";

import { consoleLogger, recordingLogger } from "../logger";

describe("consoleLogger", () => {
  it("prefixes the tag and drops messages below the level", () => {
    const warn = mock.method(console, "warn", () => {});
    const info = mock.method(console, "info", () => {});
    try {
      const logger = consoleLogger("projection", "warn");
      logger.info("horizon", { horizon: 5 });
      logger.warn("nominal inflation", { cashflow: "Plant|Sales" });

      assert.equal(info.mock.callCount(), 0);
      assert.equal(warn.mock.callCount(), 1);
      assert.deepEqual(warn.mock.calls[0].arguments, ["[projection] nominal inflation", { cashflow: "Plant|Sales" }]);
    } finally {
      warn.mock.restore();
      info.mock.restore();
    }
  });

  it("emits nothing when silent", () => {
    const error = mock.method(console, "error", () => {});
    try {
      consoleLogger("engine", "silent").error("boom");
      assert.equal(error.mock.callCount(), 0);
    } finally {
      error.mock.restore();
    }
  });
});

describe("recordingLogger", () => {
  it("keeps entries in call order", () => {
    const logger = recordingLogger();
    logger.debug("a");
    logger.error("b", { n: 1 });
    assert.deepEqual(logger.entries, [
      { level: "debug", message: "a", meta: undefined },
      { level: "error", message: "b", meta: { n: 1 } },
    ]);
  });
});
