/**
 * JSON Recovery Utility
 *
 * Recovers broken or truncated JSON from service output. Pure structural
 * text recovery: nothing here knows the question schema.
 */

export interface JsonRecoveryResult {
  parsed: unknown;
  recovered: boolean;
  fixesApplied: string[];
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false; error: unknown } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, error };
  }
}

/**
 * Cut the outermost `{...}` out of surrounding prose
 * ("Here is the JSON: {...} Let me know if...").
 */
export function extractJsonObject(text: string): string | null {
  const start = text.indexOf("{");
  if (start === -1) return null;
  const end = text.lastIndexOf("}");
  return end > start ? text.slice(start, end + 1) : text.slice(start);
}

/**
 * Attempt to parse JSON, applying progressive recovery steps if needed.
 *
 * Recovery steps (in order):
 * 1. Strip markdown code fences
 * 2. Cut the object out of surrounding prose
 * 3. Fix unterminated fractional numbers (0. → 0.0)
 * 4. Escape stray backslashes (LaTeX such as \sqrt inside strings)
 * 5. Replace single-quoted keys/values, strip line comments
 * 6. Remove an incomplete trailing entry, trailing commas
 * 7. Add missing closing braces/brackets
 *
 * @param context - Label for error logging (e.g. "structure:Q12")
 * @throws SyntaxError if the JSON is unrecoverable
 */
export function recoverBrokenJson(raw: string, context?: string): JsonRecoveryResult {
  const fixesApplied: string[] = [];
  let content = raw.trim();

  const attempt = (text: string): JsonRecoveryResult | null => {
    const result = tryParse(text);
    return result.ok ? { parsed: result.value, recovered: fixesApplied.length > 0, fixesApplied } : null;
  };

  const apply = (name: string, next: string): void => {
    if (next !== content) {
      fixesApplied.push(name);
      content = next;
    }
  };

  // Step 1: code fences
  if (content.startsWith("```")) {
    apply("stripped_code_fences", content.replace(/^```(?:json)?\s*\n?/, "").replace(/\n?```\s*$/, ""));
  }

  // Step 2: prose around the object
  if (!content.startsWith("{") && !content.startsWith("[")) {
    const embedded = extractJsonObject(content);
    if (embedded !== null) apply("extracted_embedded_object", embedded);
  }

  // Step 3: "0." → "0.0"
  apply("fixed_fractional_numbers", content.replace(/(\d+\.)(?=\s*[,}\]]|$)/g, (_match, num: string) => num + "0"));

  const direct = attempt(content);
  if (direct) return direct;

  // Step 4: backslashes that do not start a valid JSON escape
  apply("escaped_backslashes", content.replace(/\\(?!["\\/bfnrtu])/g, "\\\\"));
  const escaped = attempt(content);
  if (escaped) return escaped;

  // Step 5: JS-style quoting and comments
  apply(
    "replaced_single_quotes",
    content
      .replace(/'([^'\\]*(?:\\.[^'\\]*)*)'\s*:/g, '"$1":')
      .replace(/:\s*'([^'\\]*(?:\\.[^'\\]*)*)'/g, ': "$1"'),
  );
  apply("stripped_comments", content.replace(/^\s*\/\/[^\n]*$/gm, "").replace(/\/\*[\s\S]*?\*\//g, ""));
  const requoted = attempt(content);
  if (requoted) return requoted;

  let fixed = content;

  // Step 6: truncated output
  const quoteCount = (fixed.match(/(?<!\\)"/g) ?? []).length;
  if (quoteCount % 2 !== 0) {
    fixed = fixed.replace(/,\s*[^,]*$/, "");
    fixesApplied.push("removed_incomplete_trailing_entry");
  }

  const trailingFixed = fixed.replace(/,(\s*[}\]])/g, "$1");
  if (trailingFixed !== fixed) {
    fixesApplied.push("removed_trailing_commas");
    fixed = trailingFixed;
  }

  // Step 7: closers
  const missingBrackets = (fixed.match(/\[/g) ?? []).length - (fixed.match(/\]/g) ?? []).length;
  const missingBraces = (fixed.match(/\{/g) ?? []).length - (fixed.match(/\}/g) ?? []).length;
  if (missingBrackets > 0 || missingBraces > 0) {
    fixed += "]".repeat(Math.max(0, missingBrackets)) + "}".repeat(Math.max(0, missingBraces));
    fixesApplied.push("added_missing_closers");
  }

  const final = tryParse(fixed);
  if (final.ok) {
    return { parsed: final.value, recovered: true, fixesApplied };
  }

  if (context) {
    console.error(`[json-recovery] ${context}: recovery failed`, {
      originalLength: raw.length,
      fixedLength: fixed.length,
      fixesApplied,
      lastChars: fixed.slice(-200),
    });
  }
  throw final.error;
}
