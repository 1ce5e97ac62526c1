import assert from "node:assert/strict";
import { test } from "node:test";
import { correctArtifact, resolveImplicatedArtifact } from "./corrector";
import { StageTimeoutError } from "./errors";
import type { PromptPair } from "./prompts";
import type { ArtifactStore } from "./types";

const AND_GATE = "module and_gate(input a, input b, output y);\n  assign y = a | b;\nendmodule";
const AND_GATE_FIXED = "module and_gate(input a, input b, output y);\n  assign y = a & b;\nendmodule";
const AND_GATE_TB = "module and_gate_tb;\n  and_gate dut(.a(a), .b(b), .y(y));\nendmodule";

const store: ArtifactStore = [
  { name: "and_gate.v", role: "primary", content: AND_GATE },
  { name: "defs.vh", role: "dependency", content: "`define WIDTH 1" },
  { name: "and_gate_tb.v", role: "companion", content: AND_GATE_TB },
];

test("resolveImplicatedArtifact prefers files named in the log", () => {
  assert.equal(resolveImplicatedArtifact("PRIMARY", store, "defs.vh:1: syntax error")?.name, "defs.vh");
  assert.equal(resolveImplicatedArtifact("PRIMARY", store, "ERROR: unknown")?.name, "and_gate.v");
  assert.equal(resolveImplicatedArtifact("COMPANION", store, "ERROR: timed out")?.name, "and_gate_tb.v");
});

test("a primary correction returns the fenced code and leaves the store alone", async () => {
  const prompts: PromptPair[] = [];
  const outcome = await correctArtifact({
    role: "PRIMARY",
    store,
    artifactName: "and_gate.v",
    validationLog: "ERROR: y mismatch",
    generate: async (prompt) => {
      prompts.push(prompt);
      return "Here you go:\n```verilog\n" + AND_GATE_FIXED + "\n```\n";
    },
  });

  assert.equal(outcome.outcome, "patched");
  assert.equal(outcome.beforeContent, AND_GATE);
  assert.equal(outcome.afterContent, AND_GATE_FIXED);
  assert.equal(store[0].content, AND_GATE);
  assert.equal(prompts.length, 1);
  assert.ok(prompts[0].userPrompt.includes("FAULTY FILE (and_gate.v):"));
  assert.ok(prompts[0].userPrompt.includes("ERROR: y mismatch"));
});

test("returning the same text is an unchanged correction", async () => {
  const outcome = await correctArtifact({
    role: "PRIMARY",
    store,
    artifactName: "and_gate.v",
    validationLog: "ERROR",
    generate: async () => "```verilog\n" + AND_GATE + "\n```",
  });
  assert.equal(outcome.outcome, "unchanged");
  assert.equal(outcome.afterContent, outcome.beforeContent);
});

test("a companion correction reads its entry from the JSON file map", async () => {
  const patched = AND_GATE_TB.replace("endmodule", "  initial $finish;\nendmodule");
  const outcome = await correctArtifact({
    role: "COMPANION",
    store,
    artifactName: "and_gate_tb.v",
    validationLog: "ERROR: Simulation timed out.",
    generate: async (prompt) => {
      assert.ok(prompt.userPrompt.includes("DEVICE UNDER TEST (and_gate.v, read-only):"));
      return JSON.stringify({ "and_gate_tb.v": patched });
    },
  });
  assert.equal(outcome.outcome, "patched");
  assert.equal(outcome.artifactName, "and_gate_tb.v");
  assert.equal(outcome.afterContent, patched);
});

test("malformed responses keep the original content", async () => {
  const outcome = await correctArtifact({
    role: "COMPANION",
    store,
    artifactName: "and_gate_tb.v",
    validationLog: "ERROR",
    generate: async () => "I could not fix it.",
  });
  assert.equal(outcome.outcome, "malformed");
  assert.equal(outcome.afterContent, AND_GATE_TB);
  assert.equal(outcome.detail, "No JSON object found in response");
});

test("prose instead of code is malformed for the design side", async () => {
  const outcome = await correctArtifact({
    role: "PRIMARY",
    store,
    artifactName: "and_gate.v",
    validationLog: "ERROR",
    generate: async () => "Sorry, I am not sure what is wrong.",
  });
  assert.equal(outcome.outcome, "malformed");
  assert.equal(outcome.detail, "Response contained no Verilog");
  assert.equal(outcome.afterContent, AND_GATE);

  const header = await correctArtifact({
    role: "PRIMARY",
    store,
    artifactName: "defs.vh",
    validationLog: "defs.vh:1: error",
    generate: async () => "```verilog\n`define WIDTH 2\n```",
  });
  assert.equal(header.outcome, "patched");
  assert.equal(header.afterContent, "`define WIDTH 2");
});

test("generator timeouts become a timeout outcome; other failures propagate", async () => {
  const timedOut = await correctArtifact({
    role: "PRIMARY",
    store,
    artifactName: "and_gate.v",
    validationLog: "ERROR",
    generate: async () => {
      throw new StageTimeoutError("correct_primary", 50);
    },
  });
  assert.equal(timedOut.outcome, "timeout");
  assert.equal(timedOut.afterContent, AND_GATE);
  assert.equal(timedOut.detail, "correct_primary timed out after 50ms");

  await assert.rejects(
    correctArtifact({
      role: "PRIMARY",
      store,
      artifactName: "and_gate.v",
      validationLog: "ERROR",
      generate: async () => {
        throw new Error("provider down");
      },
    }),
    /provider down/,
  );
  await assert.rejects(
    correctArtifact({ role: "PRIMARY", store, artifactName: "nope.v", validationLog: "ERROR", generate: async () => "" }),
    /Cannot correct unknown artifact nope.v/,
  );
});
