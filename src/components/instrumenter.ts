/**
 * Source instrumenter
 *
 * Inserts a call to the trace hook in front of every statement so that
 * running the script reports which lines executed. Insertions never add
 * line breaks, so line numbers in stack traces and in the trace records
 * match the file on disk.
 */

import * as ts from 'typescript';

export const TRACE_HOOK = '__trace__';

export interface InstrumentedSource {
  readonly code: string;
  readonly markedLines: readonly number[];
}

interface Insertion {
  readonly position: number;
  // closing braces sort ahead of openings at the same offset
  readonly rank: 0 | 1;
  readonly text: string;
}

function isStatementList(node: ts.Node): node is ts.SourceFile | ts.Block | ts.ModuleBlock | ts.CaseClause | ts.DefaultClause {
  return ts.isSourceFile(node) || ts.isBlock(node) || ts.isModuleBlock(node) || ts.isCaseClause(node) || ts.isDefaultClause(node);
}

function isTraceable(statement: ts.Statement): boolean {
  if (ts.isFunctionDeclaration(statement) || ts.isEmptyStatement(statement) || ts.isBlock(statement)) {
    return false;
  }
  // directive prologues ('use strict') stop being directives once anything precedes them
  return !(ts.isExpressionStatement(statement) && ts.isStringLiteral(statement.expression));
}

/**
 * Instruments script source for line tracing
 *
 * @param source - Script source text
 * @param fileName - Used for parser diagnostics only
 * @param fileId - Numeric id passed to the trace hook
 */
export function instrumentSource(source: string, fileName: string, fileId: number): InstrumentedSource {
  const sourceFile = ts.createSourceFile(fileName, source, ts.ScriptTarget.Latest, false, ts.ScriptKind.JS);
  const insertions: Insertion[] = [];
  const markedLines = new Set<number>();

  const markerFor = (statement: ts.Statement): { start: number; call: string } => {
    const start = statement.getStart(sourceFile);
    const line = sourceFile.getLineAndCharacterOfPosition(start).line + 1;
    markedLines.add(line);
    return { start, call: `${TRACE_HOOK}(${fileId},${line});` };
  };

  const markInList = (statement: ts.Statement): void => {
    if (!isTraceable(statement)) {
      return;
    }
    const { start, call } = markerFor(statement);
    insertions.push({ position: start, rank: 1, text: call });
  };

  // A branch or loop body that is a single statement becomes a block
  const wrapBody = (statement: ts.Statement): void => {
    if (!isTraceable(statement)) {
      return;
    }
    const { start, call } = markerFor(statement);
    insertions.push({ position: start, rank: 1, text: `{${call}` });
    insertions.push({ position: statement.getEnd(), rank: 0, text: '}' });
  };

  const visit = (node: ts.Node): void => {
    if (isStatementList(node)) {
      node.statements.forEach(markInList);
    } else if (ts.isIfStatement(node)) {
      wrapBody(node.thenStatement);
      if (node.elseStatement) {
        wrapBody(node.elseStatement);
      }
    } else if (ts.isIterationStatement(node, false)) {
      wrapBody(node.statement);
    }
    ts.forEachChild(node, visit);
  };

  visit(sourceFile);

  insertions.sort((a, b) => a.position - b.position || a.rank - b.rank);

  let code = '';
  let cursor = 0;
  for (const insertion of insertions) {
    code += source.slice(cursor, insertion.position) + insertion.text;
    cursor = insertion.position;
  }
  code += source.slice(cursor);

  return {
    code,
    markedLines: [...markedLines].sort((a, b) => a - b)
  };
}
