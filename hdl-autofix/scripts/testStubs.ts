import { createMemoryPersistence, type MemoryPersistence } from "./collaborators/persistence";
import type { Collaborators, DecomposeResult, ValidationResult } from "./collaborators/types";
import type { PromptPair } from "./prompts";
import type { StageName } from "./types";

export const AND_GATE = "module and_gate(input a, input b, output y);\n  assign y = a & b;\nendmodule";

export const AND_GATE_TB = [
  "module and_gate_tb;",
  "  reg a, b;",
  "  wire y;",
  "  and_gate dut(.a(a), .b(b), .y(y));",
  "  initial begin",
  "    a = 1; b = 1; #1;",
  '    if (y !== 1) $display("ERROR: y=%b", y);',
  "  end",
  "endmodule",
].join("\n");

/** A validation step: a result, a thrown error, or a call that never settles. */
export type ScriptedValidation = ValidationResult | Error | "hang";

export interface StubOptions {
  /** Consumed in order; the last one repeats. */
  validations: ScriptedValidation[];
  correct?: (stage: StageName, prompt: PromptPair, call: number) => string;
  decompose?: DecomposeResult;
  onValidate?: (call: number) => void;
}

export interface StubCollaborators extends Collaborators {
  persistence: MemoryPersistence;
  generatorStages: StageName[];
  validations: number;
}

export function fenced(code: string): string {
  return "```verilog\n" + code + "\n```";
}

export function createStubCollaborators(options: StubOptions): StubCollaborators {
  const generatorStages: StageName[] = [];
  let corrections = 0;
  const stubs: StubCollaborators = {
    generatorStages,
    validations: 0,
    persistence: createMemoryPersistence(),
    generator: {
      async generate(prompt, ctx) {
        generatorStages.push(ctx.stage);
        if (ctx.stage === "generate") return fenced(AND_GATE);
        if (!options.correct) throw new Error(`unexpected generator call in ${ctx.stage}`);
        corrections += 1;
        return options.correct(ctx.stage, prompt, corrections);
      },
    },
    decomposer: {
      async decompose(candidateText) {
        return (
          options.decompose ?? {
            primaryName: "and_gate.v",
            artifacts: [{ name: "and_gate.v", role: "primary", content: candidateText }],
          }
        );
      },
    },
    companionGenerator: {
      async generateCompanion() {
        return { companionName: "and_gate_tb.v", companionContent: AND_GATE_TB };
      },
    },
    validator: {
      async validate() {
        const index = Math.min(stubs.validations, options.validations.length - 1);
        stubs.validations += 1;
        options.onValidate?.(stubs.validations);
        const step = options.validations[index];
        if (step === "hang") return new Promise<ValidationResult>(() => undefined);
        if (step instanceof Error) throw step;
        return step;
      },
    },
  };
  return stubs;
}
