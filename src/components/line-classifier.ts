/**
 * Executable-line classifier for coverage statistics
 *
 * A pure, line-at-a-time heuristic. Multi-line constructs (a statement
 * continued over several lines, a call whose arguments span lines) can be
 * misclassified; the classification is kept stable rather than exact.
 */

const PROCEDURE_DECLARATION = /^(?:async\s+)?function\s*\*?\s*[A-Za-z_$][\w$]*\s*\([^)]*\)\s*\{?$/;

// Closing delimiters, optionally followed by the punctuation that ends a call or literal
const BARE_DELIMITER = /^[{}\])]+[;,]?$/;

const KEYWORD_LINES: readonly RegExp[] = [
  /^else$/,
  /^else\s*\{$/,
  /^\}\s*else$/,
  /^\}\s*else\s*\{$/,
  /^(?:\}\s*)?catch(?:\s*\([^)]*\))?\s*\{?$/,
  /^(?:\}\s*)?finally\s*\{?$/,
  /^\}\s*while\s*\(.*\)\s*;?$/,
  /^case\s.*:$/,
  /^default\s*:$/
];

/**
 * Decides whether a physical source line counts towards coverage
 *
 * @param line - One line of source text, without its line terminator
 * @returns false for blank, shebang, comment, procedure-declaration and bare
 *   delimiter/keyword lines; true for everything else
 */
export function isExecutableLine(line: string): boolean {
  const trimmed = line.trim();

  if (trimmed === '') {
    return false;
  }

  if (trimmed.startsWith('#!')) {
    return false;
  }

  if (trimmed.startsWith('//') || trimmed.startsWith('/*') || trimmed.startsWith('*')) {
    return false;
  }

  if (PROCEDURE_DECLARATION.test(trimmed)) {
    return false;
  }

  if (BARE_DELIMITER.test(trimmed)) {
    return false;
  }

  return !KEYWORD_LINES.some((pattern) => pattern.test(trimmed));
}

/**
 * Splits source text into physical lines; a final line terminator does not start a new line
 */
export function splitLines(source: string): string[] {
  if (source === '') {
    return [];
  }
  const lines = source.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Returns the 1-based numbers of every executable line in the source
 */
export function executableLineNumbers(source: string): number[] {
  const numbers: number[] = [];
  splitLines(source).forEach((line, index) => {
    if (isExecutableLine(line)) {
      numbers.push(index + 1);
    }
  });
  return numbers;
}
