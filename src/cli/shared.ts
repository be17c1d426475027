import type { BaseContext } from "clipanion";
import { errorMessage } from "../errors.js";

export function reportFailure(context: BaseContext, err: unknown): void {
  context.stderr.write(`Error: ${errorMessage(err)}\n`);
  process.exitCode = 1;
}

export function formatCost(value: number): string {
  return `$${value.toFixed(4)}`;
}
