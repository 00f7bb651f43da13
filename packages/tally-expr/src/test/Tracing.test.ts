import { expect, test } from "vitest";
import { _withBaseLogger, enableTracing } from "mini-parse";
import { logCatch } from "mini-parse/test-util";
import { parseExpression } from "../ParseExpression.js";

// tracing stays enabled for the rest of this file

test("trace option logs grammar rules", () => {
  const { log, logged } = logCatch();
  enableTracing();
  _withBaseLogger(log, () =>
    parseExpression("1", { trace: { successOnly: true } })
  );
  const lines = logged()
    .split("\n")
    .map((l) => l.trim());
  expect(lines).toContain("✓ number");
  expect(lines).toContain("✓ equation");
});
