// The minimal record a downstream packager needs.
export interface OracleArtifact {
  oracleScript: string;
  testChangeSet: string;   // unified diff text
  fixChangeSet: string;    // unified diff text
  buggyExitCode: number;
  fixedExitCode: number;
}

export interface OracleRecord extends OracleArtifact {
  instanceId: string;
  repo: string;
  changeId: string;
  baseRevision: string;
  title?: string;
  testFiles: string[];
  fixFiles: string[];
  ignoredPaths: string[];
  turns: number;
  generatedAt: string;     // ISO 8601
}
