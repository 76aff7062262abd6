import ts from 'typescript';

/** Code the TypeScript language service uses for "'{0}' is deprecated." */
export const DEPRECATED_SYMBOL_CODE = 6385;

/**
 * Warning diagnostics for every reference to a symbol whose declaration
 * carries a `@deprecated` JSDoc tag. The compiler only reports these through
 * the language service, so the program is walked here instead.
 */
export function collectDeprecations(program: ts.Program, sourceFile: ts.SourceFile): ts.Diagnostic[] {
  const checker = program.getTypeChecker();
  const diagnostics: ts.Diagnostic[] = [];

  const visit = (node: ts.Node): void => {
    if (ts.isIdentifier(node)) {
      const symbol = checker.getSymbolAtLocation(node);
      const own = symbol?.declarations ?? [];
      const target = symbol && (symbol.flags & ts.SymbolFlags.Alias) !== 0
        ? checker.getAliasedSymbol(symbol)
        : symbol;
      const declarations = target?.declarations ?? [];
      const declares = [...own, ...declarations].some(declaration => ts.getNameOfDeclaration(declaration) === node);

      if (!declares && declarations.some(declaration => ts.getJSDocDeprecatedTag(declaration) !== undefined)) {
        diagnostics.push({
          category: ts.DiagnosticCategory.Warning,
          code: DEPRECATED_SYMBOL_CODE,
          file: sourceFile,
          start: node.getStart(sourceFile),
          length: node.getWidth(sourceFile),
          messageText: `'${node.text}' is deprecated.`
        });
      }
    }
    ts.forEachChild(node, visit);
  };

  visit(sourceFile);
  return diagnostics;
}
