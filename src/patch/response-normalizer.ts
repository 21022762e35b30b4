/**
 * Response Normalizer
 *
 * Turns the raw completion text of an inference backend into a validated
 * patch candidate. Never throws: malformed input comes back as a tagged
 * failure carrying a MalformedResponse InferenceError.
 */

import { z } from 'zod';
import { InferenceError } from './errors.js';
import { PatchGenerationFailure } from '../types/index.js';

export interface ParsedPatch {
  fixedCode: string;
  explanation: string;
  reasoning: string;
  /** True when the code was recovered from a fenced block in a non-JSON body */
  salvaged: boolean;
}

export type NormalizeResult =
  | { ok: true; value: ParsedPatch }
  | { ok: false; error: InferenceError };

const DEFAULT_EXPLANATION = 'AI provided a fix';
const SALVAGED_EXPLANATION = 'AI attempted to fix the code (recovered from a non-JSON response)';

/**
 * Expected completion payload. Only `fixed_code` is required; mistyped
 * optional fields are dropped instead of failing the whole patch.
 */
export const patchResponseSchema = z.object({
  fixed_code: z.string(),
  explanation: z.string().optional().catch(undefined),
  reasoning: z.string().optional().catch(undefined),
  line_edits: z.array(z.unknown()).optional().catch(undefined),
});

export type PatchResponse = z.infer<typeof patchResponseSchema>;

const STATEMENT_PATTERN =
  /^(?:(?:def|class|if|elif|else|for|while|try|except|finally|with|return|import|from|print|pass|break|continue|raise|assert|global|nonlocal|lambda|async|await|del|yield)\b|@[A-Za-z_]|[A-Za-z_][\w.]*(?:\s*,\s*[A-Za-z_][\w.]*)*\s*(?:=(?!=)|\+=|-=|\*=|\/=)|[A-Za-z_][\w.]*[([])/;

function malformed(message: string): NormalizeResult {
  return {
    ok: false,
    error: new InferenceError(PatchGenerationFailure.MALFORMED_RESPONSE, message),
  };
}

/**
 * Remove a surrounding markdown code fence, with or without a language tag.
 */
export function stripCodeFences(text: string): string {
  let result = text.trim();

  const opening = /^```[\w+-]*[ \t]*(?:\r?\n|$)/.exec(result);
  if (opening) {
    result = result.slice(opening[0].length);
  }

  const trimmedEnd = result.trimEnd();
  if (trimmedEnd.endsWith('```')) {
    result = trimmedEnd.slice(0, -3);
  }

  return result;
}

/**
 * First fenced code block in free-form text, if any.
 */
export function extractFencedBlock(text: string): string | null {
  const match = /```[\w+-]*[ \t]*\r?\n([\s\S]*?)```/.exec(text);
  return match?.[1] ?? null;
}

/**
 * Whether the code arrived double-escaped: no real line break, but an escaped
 * line separator outside any string literal.
 */
export function isDoubleEscaped(code: string): boolean {
  if (code.includes('\n')) {
    return false;
  }

  let quote: string | null = null;
  for (let i = 0; i < code.length; i++) {
    const char = code[i];
    const next = code[i + 1];

    if (char === '\\') {
      if (quote === null && (next === 'n' || next === 'r')) {
        return true;
      }
      if (next === '"' || next === "'") {
        // An escaped quote is a real quote once unescaped
        if (quote === null) quote = next;
        else if (quote === next) quote = null;
      }
      i++;
      continue;
    }

    if (char === '"' || char === "'") {
      if (quote === null) quote = char;
      else if (quote === char) quote = null;
    }
  }

  return false;
}

/**
 * Collapse escaped line separators, tabs and quotes.
 */
export function unescapeCode(code: string): string {
  return code
    .replace(/\\r\\n/g, '\n')
    .replace(/\\n/g, '\n')
    .replace(/\\t/g, '\t')
    .replace(/\\"/g, '"')
    .replace(/\\'/g, "'");
}

/**
 * Whether at least one line reads like a Python statement.
 */
export function looksLikeCode(code: string): boolean {
  return code.split('\n').some((line) => {
    const trimmed = line.trim();
    return trimmed.length > 0 && !trimmed.startsWith('#') && STATEMENT_PATTERN.test(trimmed);
  });
}

/**
 * Fence stripping and unescaping applied to every candidate program.
 */
export function normalizeCode(code: string): string {
  let result = code.trim();
  if (isDoubleEscaped(result)) {
    result = unescapeCode(result);
  }
  result = stripCodeFences(result);

  // Leading blank lines and trailing whitespace only; indentation is significant
  return result.replace(/^(?:[ \t]*\r?\n)+/, '').trimEnd();
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

/**
 * Validate and normalize a raw completion.
 */
export function normalizeResponse(raw: string): NormalizeResult {
  const text = raw.trim();
  if (text.length === 0) {
    return malformed('Inference backend returned an empty response');
  }

  let candidate: Omit<ParsedPatch, 'fixedCode'> & { code: string };
  const json = parseJson(stripCodeFences(text));

  if (json.ok) {
    const parsed = patchResponseSchema.safeParse(json.value);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'response'}: ${issue.message}`);
      return malformed(`Response does not match the expected shape (${issues.join('; ')})`);
    }
    candidate = {
      code: parsed.data.fixed_code,
      explanation: parsed.data.explanation?.trim() || DEFAULT_EXPLANATION,
      reasoning: parsed.data.reasoning?.trim() ?? '',
      salvaged: false,
    };
  } else {
    const block = extractFencedBlock(text);
    if (block === null) {
      return malformed('Response is neither JSON nor contains a fenced code block');
    }
    candidate = {
      code: block,
      explanation: SALVAGED_EXPLANATION,
      reasoning: '',
      salvaged: true,
    };
  }

  const fixedCode = normalizeCode(candidate.code);
  if (fixedCode.length === 0) {
    return malformed('Response contains no code');
  }
  if (!looksLikeCode(fixedCode)) {
    return malformed('Response code does not look like a Python program');
  }

  return {
    ok: true,
    value: {
      fixedCode,
      explanation: candidate.explanation,
      reasoning: candidate.reasoning,
      salvaged: candidate.salvaged,
    },
  };
}
