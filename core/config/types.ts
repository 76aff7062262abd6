/**
 * Configuration types for evalconf
 */

/** What happens to an artifact's compiled output once the call completes */
export type OutputRetention = 'retain' | 'delete';

/**
 * unique: a fresh unit name and directory per call.
 * fixed: one constant unit name and directory for every call. Kept for
 * callers that expect stable paths; concurrent calls collide.
 */
export type UnitNaming = 'unique' | 'fixed';

/** host: run the unit in the caller's realm. isolated: fresh vm context. */
export type IsolationMode = 'host' | 'isolated';

/** propagate: rethrow the evaluated code's own exception. wrap: EvaluationError. */
export type EvaluationErrorMode = 'propagate' | 'wrap';

export interface EvalConfig {
  tmpDir?: string;
  outputRetention?: OutputRetention;
  naming?: UnitNaming;
  unitPrefix?: string;
  classpath?: string[];
  typeCheck?: boolean;
  strict?: boolean;
  deprecationWarnings?: boolean;
  isolation?: IsolationMode;
  evaluationErrors?: EvaluationErrorMode;
}

/** EvalConfig with every default applied */
export interface EvaluatorSettings {
  tmpDir: string;
  outputRetention: OutputRetention;
  naming: UnitNaming;
  unitPrefix: string;
  classpath: string[];
  typeCheck: boolean;
  strict: boolean;
  deprecationWarnings: boolean;
  isolation: IsolationMode;
  evaluationErrors: EvaluationErrorMode;
}
