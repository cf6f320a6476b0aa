/**
 * Extracts a JSON object from process output that may carry log lines around it.
 * The whole text is tried first, then the span from the first '{' to the last '}'.
 *
 * @param context - Names the producer in error messages, e.g. 'env generator'
 * @throws Error if no parsable JSON object is found
 */
export function extractJsonObject(text: string, context?: string): unknown {
  const trimmed = text.trim();
  if (trimmed.startsWith('{') && trimmed.endsWith('}')) {
    try {
      const value: unknown = JSON.parse(trimmed);
      return value;
    } catch {
      // fall through to the brace scan
    }
  }

  const firstBrace = text.indexOf('{');
  const lastBrace = text.lastIndexOf('}');
  const from = context ? ` from ${context}` : '';

  if (firstBrace === -1 || lastBrace === -1 || lastBrace <= firstBrace) {
    throw new Error(`No JSON object found in output${from}.`);
  }

  try {
    const value: unknown = JSON.parse(text.slice(firstBrace, lastBrace + 1));
    return value;
  } catch (e) {
    throw new Error(
      `Failed to parse JSON${from}: ${e instanceof Error ? e.message : String(e)}`,
    );
  }
}
