import { CompilerRun } from "./toolchain";

export const WARNING_PATTERN = /warning: /;

export interface ClassifiedOutput {
  errors: string[];
  warnings: string[];
}

export function classifyCompilerOutput(run: CompilerRun): ClassifiedOutput {
  const warnings: string[] = [];
  const errors: string[] = [];
  for (const line of run.output) {
    if (WARNING_PATTERN.test(line)) {
      warnings.push(line);
    } else {
      errors.push(line);
    }
  }

  if (run.spawnError) {
    errors.push(run.spawnError);
  } else if (run.exitCode !== 0 && errors.length === 0) {
    errors.push(
      run.exitCode === null ? "compiler terminated without an exit status" : `compiler exited with status ${run.exitCode}`
    );
  }

  return { errors, warnings };
}
