import { ConfigError, errorMessage } from "../../deploy/slotcast/errors.js";
import type { RuntimeEnv } from "../runtime.js";

/**
 * Run a command body, turning a thrown error into an error line and exit 1.
 */
export async function runCommandWithRuntime(
  runtime: RuntimeEnv,
  action: () => Promise<void>,
): Promise<void> {
  try {
    await action();
  } catch (err) {
    if (err instanceof ConfigError) {
      runtime.error(err.message);
    } else {
      runtime.error(`Error: ${errorMessage(err)}`);
    }
    runtime.exit(1);
  }
}

/** Parse a positive integer option; undefined when absent. */
export function parsePositiveInt(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`${name} must be a positive integer (got "${value}")`);
  }
  return parsed;
}
