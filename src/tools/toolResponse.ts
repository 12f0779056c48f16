import { isInputError } from "../utils/errors.js";

/**
 * Input errors go back to the model as a JSON payload it can relay to the user.
 * Anything else (broken catalogs, bugs) is rethrown so the host sees it.
 */
export function invalidInputResponse(toolName: string, error: unknown): string {
  if (isInputError(error)) {
    console.warn(`[${toolName}] Invalid input: ${error.message}`);
    return JSON.stringify(
      { status: "invalid_input", error: error.name, message: error.message, context: error.context },
      null,
      2,
    );
  }
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[${toolName}] ${message}`);
  throw error;
}
