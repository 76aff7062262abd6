export * from './EvalError';
export * from './WrapError';
export * from './ArtifactCollisionError';
export * from './ClasspathResolutionError';
export * from './CompilationError';
export * from './LoadError';
export * from './EvaluationError';
export * from './CastError';
export * from './ConfigError';
