import { EvalError, ErrorSeverity } from './EvalError';

/**
 * Raised when an artifact is allocated over the paths of another artifact
 * that is still in flight. Only reachable with fixed unit naming.
 */
export class ArtifactCollisionError extends EvalError {
  public readonly unitName: string;
  public readonly sourceFile: string;

  constructor(unitName: string, sourceFile: string) {
    super(
      `Generated unit ${unitName} is already in flight at ${sourceFile}; concurrent evaluations need unique unit names`,
      {
        code: 'ARTIFACT_IN_USE',
        severity: ErrorSeverity.Recoverable,
        details: { unitName, sourceFile }
      }
    );
    this.unitName = unitName;
    this.sourceFile = sourceFile;
  }
}
