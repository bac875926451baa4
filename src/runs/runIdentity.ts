import path from "path";
import type { RunId } from "../core/ids.js";
import { deriveRunIdFromParts, newRunId } from "../core/ids.js";

export interface RunIdentityInput {
  template: string;
  inputRoot: string;
  outputRoot: string;
  configHash: `sha256:${string}`;
}

/**
 * The same template, roots and effective configuration always map to the same
 * run id, which is what lets an interrupted invocation pick up its checkpoints.
 */
export function deriveRunId(input: RunIdentityInput): RunId {
  return deriveRunIdFromParts([
    `template=${input.template}`,
    `input=${path.resolve(input.inputRoot)}`,
    `output=${path.resolve(input.outputRoot)}`,
    `config=${input.configHash}`
  ]);
}

export function resolveRunId(input: RunIdentityInput, fresh: boolean): RunId {
  return fresh ? newRunId() : deriveRunId(input);
}
