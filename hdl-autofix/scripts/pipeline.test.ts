import assert from "node:assert/strict";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { test } from "node:test";
import { parseConfig } from "./config";
import { createLogger } from "./logger";
import { createDefaultCollaborators, runQuery } from "./pipeline";
import type { RunReport } from "./report";
import { createStubCollaborators } from "./testStubs";

test("runQuery writes a report for the finished run", async () => {
  const runsDir = await mkdtemp(path.join(os.tmpdir(), "hdl-autofix-runs-"));
  try {
    const config = parseConfig({ output: { runsDir, designsDir: path.join(runsDir, "designs") } });
    const stubs = createStubCollaborators({
      validations: [{ passed: false, log: "and_gate_tb.v:3: error" }, { passed: true, log: "PASS" }],
      correct: () => JSON.stringify({ "and_gate_tb.v": "module and_gate_tb; and_gate dut(); endmodule" }),
    });

    const { state, reportPath } = await runQuery("2-input AND gate", config, {
      retryBudget: 2,
      collaborators: () => stubs,
    });

    assert.equal(state.terminal, "SUCCEEDED");
    assert.equal(reportPath, path.join(runsDir, `${state.runId}.json`));
    const report: RunReport = JSON.parse(await readFile(reportPath, "utf-8"));
    assert.equal(report.run_id, state.runId);
    assert.equal(report.terminal, "SUCCEEDED");
    assert.equal(report.retry_count, 1);
    assert.equal(report.change_log.length, 1);
    assert.equal(report.change_log[0].artifact, "and_gate_tb.v");
    assert.deepEqual(
      report.artifacts.map((artifact) => [artifact.name, artifact.role]),
      [
        ["and_gate.v", "primary"],
        ["and_gate_tb.v", "companion"],
      ],
    );
    assert.equal(report.events[0].event, "RUN_START");
    assert.equal(report.events[report.events.length - 1].event, "RUN_DONE");
  } finally {
    await rm(runsDir, { recursive: true, force: true });
  }
});

test("the default collaborators are wired from config", () => {
  const collaborators = createDefaultCollaborators(parseConfig({}), createLogger("run-1"));
  assert.deepEqual(Object.keys(collaborators).sort(), [
    "companionGenerator",
    "decomposer",
    "generator",
    "persistence",
    "validator",
  ]);
});
