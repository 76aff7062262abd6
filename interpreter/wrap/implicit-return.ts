/**
 * Utilities for giving a statement list expression-block semantics: the
 * value of the last expression statement is the value of the block.
 */
import ts from 'typescript';

/**
 * Replace [start, end) with whitespace, keeping every newline so that line
 * numbers after the range do not move.
 */
export function blankRange(text: string, start: number, end: number): string {
  const blanked = text.slice(start, end).replace(/[^\r\n]/g, ' ');
  return text.slice(0, start) + blanked + text.slice(end);
}

/**
 * The statement whose value the block yields: the last one that is not an
 * empty statement, so `1 + 1;;` still yields `1 + 1`.
 */
export function lastValueStatement(statements: readonly ts.Statement[]): ts.Statement | undefined {
  for (let index = statements.length - 1; index >= 0; index--) {
    const statement = statements[index];
    if (!ts.isEmptyStatement(statement)) {
      return statement;
    }
  }
  return undefined;
}

/**
 * Turn a trailing expression statement into `return (<expr>);`. Any other
 * trailing statement (an explicit return, a declaration, a loop) leaves the
 * code unchanged. Offsets in `code` must still match `sourceFile`.
 */
export function addImplicitReturn(
  code: string,
  sourceFile: ts.SourceFile,
  last: ts.Statement | undefined
): string {
  if (!last || !ts.isExpressionStatement(last)) {
    return code;
  }

  const expression = last.expression.getText(sourceFile);
  const start = last.getStart(sourceFile);
  return `${code.slice(0, start)}return (${expression});${code.slice(last.getEnd())}`;
}
