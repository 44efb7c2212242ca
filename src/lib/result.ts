export type FailureKind =
  | 'ArgumentError'
  | 'MissingTool'
  | 'InvalidCredential'
  | 'NotAuthenticated'
  | 'MissingArtifact'
  | 'MissingIdentity'
  | 'AlreadyExists'
  | 'RemoteError'
  | 'VcsError'
  | 'PushError';

export type StageName = 'preconditions' | 'provision' | 'sync' | 'publish' | 'pull-request';

export interface StageFailure {
  kind: FailureKind;
  stage: StageName;
  message: string;
}

export type StageResult<T> = { ok: true; value: T } | { ok: false; failure: StageFailure };

export function success<T>(value: T): StageResult<T> {
  return { ok: true, value };
}

export function failure<T = never>(stage: StageName, kind: FailureKind, message: string): StageResult<T> {
  return { ok: false, failure: { kind, stage, message } };
}

/** Re-types a failed result so it can be returned from a stage with a different payload. */
export function forward<T>(result: { ok: false; failure: StageFailure }): StageResult<T> {
  return { ok: false, failure: result.failure };
}

export function formatFailure(f: StageFailure): string {
  return `${f.stage}: [${f.kind}] ${f.message}`;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
