export { loadConfig, mergeConfig, resolveConfigPath, DEFAULT_CONFIG_FILE } from './config/loader.js';
export { configSchema, DEFAULT_CONFIG, type OracleConfig } from './config/schema.js';

export { parseUnifiedDiff, renderChangeSet, changeSetPaths } from './diff/parser.js';
export { policyFromConfig, classifyPath, matchingLabels } from './diff/classifier.js';
export { splitChangeSet, splitDiff } from './diff/splitter.js';
export type { ChangeLabel, ChangeSet, ClassificationPolicy, FileDiff, FileStatus, Hunk, SplitResult } from './diff/types.js';

export { Workspace } from './workspace/workspace.js';
export type { CommandResult, RunCommandOptions, WorkspaceOptions, WorkspaceState } from './workspace/types.js';

export { screenScript, screeningOptionsFromConfig, commandSegments } from './screening/screen.js';
export type { ScreeningOptions, ScreeningReason, ScreeningResult } from './screening/screen.js';

export { DifferentialValidator, classifyExitCodes, type ValidatorOptions } from './validation/validator.js';
export type { RunSummary, ValidationOutcome, ValidationStage, ValidationVerdict } from './validation/types.js';

export { OracleSession, type OracleSessionDeps, type SessionOptions } from './session/oracle-session.js';
export { actorResponseSchema, actionTools, parseToolCall, type ActorResponse, type ToolCallResult } from './session/actions.js';
export { formatFeedback, formatVerdictFeedback, validationFeedback } from './session/feedback.js';
export { buildBriefing } from './session/briefing.js';
export { AttemptTracker } from './session/attempts.js';
export type { ActorRequest, Attempt, Feedback, ProposingActor, SessionContext, SessionResult } from './session/types.js';

export { createArtifact, createRecord, instanceId } from './output/artifact.js';
export type { OracleArtifact, OracleRecord } from './output/types.js';

export { DirectorySink, JsonFileChangeSource, type ArtifactSink, type ChangeRecord, type ChangeSource } from './collaborators.js';
export { buildOracle, buildOracles, type BatchEntry, type OracleBuildResult, type OracleTask, type PipelineDeps } from './pipeline.js';

export { OracleError, OracleErrorCode, isOracleError, describeError } from './shared/errors.js';
export { logger, childLogger, type Logger } from './shared/logger.js';
