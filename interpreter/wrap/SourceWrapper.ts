import ts from 'typescript';
import { wrapperLogger } from '@core/utils/logger';
import { addImplicitReturn, blankRange, lastValueStatement } from './implicit-return';

/** Where a generated header line came from in the caller's source (0-based) */
export interface HoistedLine {
  readonly sourceLine: number;
  /** Added to a generated column to get the caller's column */
  readonly characterOffset: number;
}

/**
 * Generated source for one unit: an exported class whose zero-argument
 * `produce()` runs the caller's statements.
 */
export interface WrappedUnit {
  readonly unitName: string;
  readonly text: string;
  /**
   * Number of generated lines before the caller's first line. Caller line
   * `n` is generated line `n + bodyLineOffset`.
   */
  readonly bodyLineOffset: number;
  /**
   * Caller positions of the hoisted import lines, indexed by generated line.
   * Covers the first `hoistedLines.length` lines of the header.
   */
  readonly hoistedLines: readonly HoistedLine[];
  /** Number of lines in the caller's source */
  readonly sourceLineCount: number;
  /**
   * Position (0-based, caller coordinates) where `return (` was inserted
   * before the trailing expression, if it was.
   */
  readonly implicitReturnAt?: { readonly line: number; readonly character: number };
  /** `produce()` is async because the body awaits at top level */
  readonly isAsync: boolean;
}

function isImportStatement(statement: ts.Statement): boolean {
  return ts.isImportDeclaration(statement) || ts.isImportEqualsDeclaration(statement);
}

/**
 * True when `await` (or `for await`) appears outside any nested function,
 * i.e. where it would be a syntax error in a synchronous method.
 */
export function awaitsAtTopLevel(sourceFile: ts.SourceFile): boolean {
  let found = false;
  const visit = (node: ts.Node): void => {
    if (found || ts.isFunctionLike(node) || ts.isClassLike(node)) {
      return;
    }
    if (ts.isAwaitExpression(node) || (ts.isForOfStatement(node) && node.awaitModifier !== undefined)) {
      found = true;
      return;
    }
    ts.forEachChild(node, visit);
  };
  ts.forEachChild(sourceFile, visit);
  return found;
}

function countLines(text: string): number {
  return text.length === 0 ? 0 : text.split('\n').length;
}

/**
 * Wrap caller source into a named unit. Imports are hoisted above the class
 * and blanked in place; a trailing expression statement becomes the return
 * value. Line structure of the body is preserved.
 */
export function wrapSource(source: string, unitName: string): WrappedUnit {
  const sourceFile = ts.createSourceFile(`${unitName}.input.ts`, source, ts.ScriptTarget.Latest, true);

  const imports = sourceFile.statements.filter(isImportStatement);
  const hoisted = imports.map(statement => statement.getText(sourceFile)).join('\n');
  const hoistedLines = imports.flatMap(statement => {
    const start = sourceFile.getLineAndCharacterOfPosition(statement.getStart(sourceFile));
    const end = sourceFile.getLineAndCharacterOfPosition(statement.getEnd());
    const lines: HoistedLine[] = [];
    for (let line = start.line; line <= end.line; line++) {
      lines.push({ sourceLine: line, characterOffset: line === start.line ? start.character : 0 });
    }
    return lines;
  });

  // Blanking keeps lengths, so statement offsets stay valid for the return edit.
  let body = source;
  for (const statement of imports) {
    body = blankRange(body, statement.getStart(sourceFile), statement.getEnd());
  }
  const last = lastValueStatement(sourceFile.statements.filter(statement => !isImportStatement(statement)));
  const withReturn = addImplicitReturn(body, sourceFile, last);
  const implicitReturnAt = withReturn !== body && last
    ? sourceFile.getLineAndCharacterOfPosition(last.getStart(sourceFile))
    : undefined;
  body = withReturn;

  const isAsync = awaitsAtTopLevel(sourceFile);
  const header = [
    ...(hoisted.length > 0 ? [hoisted] : []),
    `export class ${unitName} {`,
    `  ${isAsync ? 'async ' : ''}produce() {`
  ].join('\n');

  const text = `${header}\n${body}\n  }\n}\n`;
  const bodyLineOffset = countLines(header);

  wrapperLogger.debug('Wrapped source', { unitName, imports: imports.length, isAsync });
  return {
    unitName,
    text,
    bodyLineOffset,
    hoistedLines,
    sourceLineCount: sourceFile.getLineStarts().length,
    implicitReturnAt,
    isAsync
  };
}
