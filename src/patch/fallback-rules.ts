/**
 * Fallback Rules
 *
 * Deterministic, pattern-based repairs used when the inference backend is
 * unavailable, slow, or returns something unusable. One rule per error type;
 * a rule that has nothing to change returns the code untouched, which the
 * generator reports as the no-change signal.
 */

import {
  extractFailingLine,
  extractMissingModule,
  extractUndefinedName,
} from '../sandbox/error-classifier.js';
import { ErrorType, ERROR_TYPE_DESCRIPTIONS } from '../types/index.js';
import type { FailedExecution } from '../types/index.js';

export interface FallbackFix {
  fixedCode: string;
  explanation: string;
  reasoning: string;
}

export type FallbackRule = (code: string, failure: FailedExecution) => FallbackFix;

const INDENT_UNIT = '    ';
const ZERO_DIVISION_SENTINEL = 'print("Error: Division by zero")';
const AUTO_FIX_MARKER = '# Auto-fixed:';

interface ScannedLine {
  /** Source with any trailing comment removed, right-trimmed */
  code: string;
  /** `code` with the contents of string literals blanked out */
  bare: string;
  /** Opening minus closing brackets outside string literals */
  bracketDelta: number;
}

/**
 * Single-line lexical scan that ignores brackets and `#` inside strings.
 */
function scanLine(line: string): ScannedLine {
  let quote: string | null = null;
  let bracketDelta = 0;
  let bare = '';

  for (let i = 0; i < line.length; i++) {
    const char = line[i] ?? '';

    if (quote !== null) {
      if (char === '\\') {
        bare += line[i + 1] === undefined ? ' ' : '  ';
        i++;
      } else if (char === quote) {
        quote = null;
        bare += char;
      } else {
        bare += ' ';
      }
      continue;
    }

    if (char === '"' || char === "'") {
      quote = char;
    } else if (char === '#') {
      return { code: line.slice(0, i).trimEnd(), bare: bare.trimEnd(), bracketDelta };
    } else if (char === '(' || char === '[' || char === '{') {
      bracketDelta++;
    } else if (char === ')' || char === ']' || char === '}') {
      bracketDelta--;
    }
    bare += char;
  }

  return { code: line.trimEnd(), bare: bare.trimEnd(), bracketDelta };
}

function leadingWhitespace(line: string): string {
  return /^[ \t]*/.exec(line)?.[0] ?? '';
}

function toLines(code: string): string[] {
  return code.replace(/\r\n?/g, '\n').split('\n');
}

function failureContext(failure: FailedExecution): string {
  return [failure.stackTrace, failure.errorMessage].filter((part) => part !== null).join('\n');
}

function noChange(code: string, explanation: string, reasoning: string): FallbackFix {
  return { fixedCode: code, explanation, reasoning };
}

// ---------------------------------------------------------------------------
// ZeroDivisionError
// ---------------------------------------------------------------------------

const CLAUSE_KEYWORD = /^(?:elif|else|except|finally)\b/;

/** Line range wrapped by one guard; `compound` when it opens a block */
interface WrapUnit {
  start: number;
  end: number;
  compound: boolean;
}

/**
 * Logical layout of a program: which physical lines form one statement.
 */
class StatementLayout {
  private readonly scanned: ScannedLine[];
  /** Index of the first line of the statement each line belongs to */
  private readonly startOf: number[] = [];
  /** Index of the last line of each statement, keyed by its first line */
  private readonly endOf = new Map<number, number>();

  constructor(private readonly lines: string[]) {
    this.scanned = lines.map(scanLine);

    let index = 0;
    while (index < lines.length) {
      const start = index;
      let depth = this.scanned[index]?.bracketDelta ?? 0;
      while (depth > 0 && index + 1 < lines.length) {
        index++;
        depth += this.scanned[index]?.bracketDelta ?? 0;
      }
      for (let line = start; line <= index; line++) this.startOf.push(start);
      this.endOf.set(start, index);
      index++;
    }
  }

  hasCode(index: number): boolean {
    return (this.scanned[index]?.code.trim() ?? '') !== '';
  }

  hasDivision(index: number): boolean {
    return /\/|%/.test(this.scanned[index]?.bare ?? '');
  }

  /**
   * First and last line of the smallest unit around `index` that can be
   * wrapped in a try block on its own: the whole statement, and for a block
   * header its body and any elif/else/except/finally clauses.
   */
  unitAround(index: number): WrapUnit {
    let start = this.startOf[index] ?? index;

    // A clause cannot stand alone; move up to the statement that opens it
    while (CLAUSE_KEYWORD.test(this.lines[start]?.trim() ?? '')) {
      const opener = this.previousAtIndent(start);
      if (opener === null) break;
      start = this.startOf[opener] ?? opener;
    }

    const compound = this.scanned[this.statementEnd(start)]?.code.endsWith(':') ?? false;
    return { start, end: compound ? this.blockEnd(start) : this.statementEnd(start), compound };
  }

  private statementEnd(start: number): number {
    return this.endOf.get(start) ?? start;
  }

  private indentOf(index: number): number {
    return leadingWhitespace(this.lines[index] ?? '').length;
  }

  private previousAtIndent(index: number): number | null {
    const indent = this.indentOf(index);
    for (let line = index - 1; line >= 0; line--) {
      if (!this.hasCode(line) || this.startOf[line] !== line) continue;
      const lineIndent = this.indentOf(line);
      if (lineIndent === indent) return line;
      if (lineIndent < indent) return null;
    }
    return null;
  }

  private blockEnd(start: number): number {
    let end = this.statementEnd(start);
    const indent = this.indentOf(start);
    let line = end + 1;
    while (line < this.lines.length) {
      if (!this.hasCode(line)) {
        line++;
        continue;
      }
      const lineIndent = this.indentOf(line);
      if (lineIndent > indent) {
        end = this.statementEnd(this.startOf[line] ?? line);
        line = end + 1;
      } else if (lineIndent === indent && CLAUSE_KEYWORD.test(this.lines[line]?.trim() ?? '')) {
        end = this.statementEnd(line);
        line = end + 1;
      } else {
        break;
      }
    }
    return end;
  }
}

/**
 * Names bound by a plain assignment statement, if the line is one.
 */
function assignmentTargets(statement: string): string[] {
  const match = /^([A-Za-z_][\w.]*(?:\s*,\s*[A-Za-z_][\w.]*)*)\s*=(?!=)/.exec(statement);
  if (!match?.[1]) return [];
  return match[1].split(',').map((name) => name.trim());
}

function wrapInZeroDivisionGuard(lines: string[], compound: boolean): string[] {
  const first = lines[0] ?? '';
  const indent = leadingWhitespace(first);
  const inner = `${indent}${INDENT_UNIT}`;
  const targets = compound ? [] : assignmentTargets(first.trim());

  return [
    `${indent}try:`,
    ...lines.map((line) => {
      if (line.trim() === '') return '';
      return line.startsWith(indent)
        ? `${inner}${line.slice(indent.length).trimEnd()}`
        : `${INDENT_UNIT}${line.trimEnd()}`;
    }),
    `${indent}except ZeroDivisionError:`,
    ...targets.map((target) => `${inner}${target} = None`),
    `${inner}${ZERO_DIVISION_SENTINEL}`,
  ];
}

function describeUnit(unit: WrapUnit): string {
  return unit.start === unit.end ? `line ${unit.start + 1}` : `lines ${unit.start + 1}-${unit.end + 1}`;
}

const fixZeroDivision: FallbackRule = (code, failure) => {
  const lines = toLines(code);
  const layout = new StatementLayout(lines);
  const failingLine = extractFailingLine(failure.stackTrace);
  const failingIndex = failingLine === null ? -1 : failingLine - 1;

  const units: WrapUnit[] = [];
  let scope: string;
  if (failingIndex >= 0 && failingIndex < lines.length && layout.hasCode(failingIndex)) {
    const unit = layout.unitAround(failingIndex);
    units.push(unit);
    scope = describeUnit(unit);
  } else {
    for (let index = 0; index < lines.length; index++) {
      const covered = units.some((unit) => index <= unit.end);
      if (covered || !layout.hasDivision(index)) continue;
      const unit = layout.unitAround(index);
      // A clause pulls its opener in; drop units the new one now contains
      while ((units[units.length - 1]?.start ?? -1) >= unit.start) units.pop();
      units.push(unit);
    }
    scope = 'every statement containing a division';
  }

  if (units.length === 0) {
    return noChange(
      code,
      'Division by zero, but no division statement could be located',
      'The traceback did not point at a statement that can be guarded and no line contains a division operator.'
    );
  }

  const fixed: string[] = [];
  let next = 0;
  for (const unit of units) {
    fixed.push(...lines.slice(next, unit.start));
    fixed.push(...wrapInZeroDivisionGuard(lines.slice(unit.start, unit.end + 1), unit.compound));
    next = unit.end + 1;
  }
  fixed.push(...lines.slice(next));

  return {
    fixedCode: fixed.join('\n'),
    explanation: 'Added a zero division check around the failing division',
    reasoning: `The program divided by zero. Guarded ${scope} with try/except ZeroDivisionError; assigned names fall back to None and a message is printed instead of crashing.`,
  };
};

// ---------------------------------------------------------------------------
// NameError
// ---------------------------------------------------------------------------

const fixUndefinedName: FallbackRule = (code, failure) => {
  const name = extractUndefinedName(failureContext(failure));
  if (name === null) {
    return noChange(
      code,
      'Undefined name, but the identifier could not be determined',
      'The error message did not contain a recognizable "name \'...\' is not defined" clause.'
    );
  }

  const lines = toLines(code);
  const declaration = `${name} = None  ${AUTO_FIX_MARKER} undefined variable`;
  if (lines.includes(declaration)) {
    return noChange(
      code,
      `'${name}' is still undefined after a module-level definition was added`,
      'The name is looked up in a scope a module-level placeholder cannot reach.'
    );
  }

  // `from __future__` imports must stay first
  let insertAt = 0;
  lines.forEach((line, index) => {
    if (/^from\s+__future__\s+import\b/.test(line)) insertAt = index + 1;
  });
  lines.splice(insertAt, 0, declaration);

  return {
    fixedCode: lines.join('\n'),
    explanation: `Defined the missing variable '${name}'`,
    reasoning: `'${name}' was used before it was defined. Bound it to None at module level so the lookup succeeds.`,
  };
};

// ---------------------------------------------------------------------------
// IndentationError
// ---------------------------------------------------------------------------

function indentWidth(whitespace: string): number {
  let width = 0;
  for (const char of whitespace) {
    width += char === '\t' ? INDENT_UNIT.length : 1;
  }
  return width;
}

/**
 * Re-indent a program to four spaces per block level.
 *
 * Block structure is inferred from observed indentation widths: a deeper line
 * opens a block only after a line ending in `:`, and the line after a `:` is
 * always placed one level deeper. Lines inside open brackets keep their
 * original text.
 */
export function reindent(code: string): string {
  const stack: number[] = [0];
  let expectBlock = false;
  let openBrackets = 0;

  const output = toLines(code).map((line) => {
    if (openBrackets > 0) {
      openBrackets = Math.max(0, openBrackets + scanLine(line).bracketDelta);
      return line;
    }

    const content = line.trim();
    if (content.length === 0) {
      return '';
    }

    const width = indentWidth(leadingWhitespace(line));
    const top = (): number => stack[stack.length - 1] ?? 0;

    if (content.startsWith('#')) {
      return `${INDENT_UNIT.repeat(stack.length - 1 + (expectBlock ? 1 : 0))}${content}`;
    }

    if (expectBlock) {
      stack.push(width > top() ? width : top() + 1);
      expectBlock = false;
    } else if (width < top()) {
      while (stack.length > 1 && width < top()) {
        stack.pop();
      }
    }

    const scanned = scanLine(content);
    openBrackets = Math.max(0, scanned.bracketDelta);
    expectBlock = openBrackets === 0 && scanned.code.endsWith(':');

    return `${INDENT_UNIT.repeat(stack.length - 1)}${content}`;
  });

  return output.join('\n');
}

const fixIndentation: FallbackRule = (code) => {
  const fixed = reindent(code);
  if (fixed === toLines(code).join('\n')) {
    return noChange(
      code,
      'Indentation error, but the block structure is already consistent',
      'Re-indenting to four spaces per level did not change the program; the defect needs manual review.'
    );
  }

  return {
    fixedCode: fixed,
    explanation: 'Re-indented the program to a consistent four-space convention',
    reasoning: 'The interpreter rejected the indentation. Rebuilt block levels from the colons that open blocks and normalized tabs and mixed widths to four spaces per level.',
  };
};

// ---------------------------------------------------------------------------
// ImportError / ModuleNotFoundError
// ---------------------------------------------------------------------------

function importsModule(entry: string, module: string): boolean {
  const name = entry.trim().split(/\s+as\s+/)[0]?.trim() ?? '';
  return name === module || name.startsWith(`${module}.`);
}

/**
 * Rewrite one import line without the unavailable module, or null if the
 * line does not import it.
 */
function removeImport(line: string, module: string): string | null {
  const indent = leadingWhitespace(line);
  const statement = scanLine(line).code.trim();
  const note = `${AUTO_FIX_MARKER} module '${module}' is not available in the sandbox`;
  // Inside a block a bare comment would leave the block empty
  const disabled = indent.length > 0 ? `${indent}pass  # ${statement}  ${note}` : `# ${statement}  ${note}`;

  const fromImport = /^from\s+([\w.]+)\s+import\b/.exec(statement);
  if (fromImport?.[1]) {
    return importsModule(fromImport[1], module) ? disabled : null;
  }

  const plainImport = /^import\s+(.+)$/.exec(statement);
  if (!plainImport?.[1]) return null;

  const entries = plainImport[1].split(',').map((entry) => entry.trim());
  const kept = entries.filter((entry) => !importsModule(entry, module));
  if (kept.length === entries.length) return null;
  if (kept.length === 0) return disabled;
  return `${indent}import ${kept.join(', ')}  ${note}`;
}

const fixMissingModule: FallbackRule = (code, failure) => {
  const module = extractMissingModule(failureContext(failure));
  if (module === null) {
    return noChange(
      code,
      'Import failed, but the missing module could not be determined',
      'The error message did not name the module that failed to import.'
    );
  }

  const lines = toLines(code);
  const failingLine = extractFailingLine(failure.stackTrace);
  const candidates = lines.map((_, index) => index);
  if (failingLine !== null) {
    // Prefer the line the traceback points at
    candidates.sort((a, b) => Number(b === failingLine - 1) - Number(a === failingLine - 1));
  }

  for (const index of candidates) {
    const line = lines[index];
    if (line === undefined) continue;
    const replacement = removeImport(line, module);
    if (replacement !== null) {
      lines[index] = replacement;
      return {
        fixedCode: lines.join('\n'),
        explanation: `Removed the import of unavailable module '${module}'`,
        reasoning: `'${module}' cannot be installed in the sandbox. Commented out its import; code that depends on it may need a standard-library replacement.`,
      };
    }
  }

  return noChange(
    code,
    `Module '${module}' is unavailable, but no import statement for it was found`,
    'The import may be built dynamically or happen inside a dependency.'
  );
};

// ---------------------------------------------------------------------------
// No-rewrite rules
// ---------------------------------------------------------------------------

const reportSyntaxError: FallbackRule = (code, failure) => {
  const location = extractFailingLine(failure.stackTrace);
  const where = location === null ? '' : ` near line ${location}`;
  return noChange(
    code,
    `Syntax error${where}: the program does not parse; manual review is recommended`,
    `${failure.errorMessage ?? 'The interpreter rejected the source'}. Syntax defects are not rewritten automatically.`
  );
};

function reportUnhandled(errorType: ErrorType): FallbackRule {
  return (code) =>
    noChange(
      code,
      `No automatic fix is available for ${errorType}`,
      `${ERROR_TYPE_DESCRIPTIONS[errorType]}. No deterministic rule applies to this class of failure.`
    );
}

/**
 * Rule table keyed by every error type.
 */
export const FALLBACK_RULES: Readonly<Record<ErrorType, FallbackRule>> = {
  [ErrorType.ZERO_DIVISION]: fixZeroDivision,
  [ErrorType.NAME]: fixUndefinedName,
  [ErrorType.INDENTATION]: fixIndentation,
  [ErrorType.IMPORT]: fixMissingModule,
  [ErrorType.MODULE_NOT_FOUND]: fixMissingModule,
  [ErrorType.SYNTAX]: reportSyntaxError,
  [ErrorType.TYPE]: reportUnhandled(ErrorType.TYPE),
  [ErrorType.TIMEOUT]: reportUnhandled(ErrorType.TIMEOUT),
  [ErrorType.MEMORY]: reportUnhandled(ErrorType.MEMORY),
  [ErrorType.UNKNOWN]: reportUnhandled(ErrorType.UNKNOWN),
};

/**
 * Apply the rule registered for the failure's error type.
 */
export function applyFallbackRule(code: string, failure: FailedExecution): FallbackFix {
  return FALLBACK_RULES[failure.errorType](code, failure);
}
