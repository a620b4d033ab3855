export type SiteBackupErrorCode =
  | 'configuration'
  | 'operation_in_progress'
  | 'source_missing'
  | 'target_missing'
  | 'no_snapshot_found'
  | 'unreadable_file'
  | 'transient_transfer'
  | 'upload_failed'
  | 'partial_download'
  | 'traversal_rejected'
  | 'unsafe_target'
  | 'timeout'
  | 'interrupted'
  | 'internal';

const ERROR_CODES: readonly SiteBackupErrorCode[] = [
  'configuration',
  'operation_in_progress',
  'source_missing',
  'target_missing',
  'no_snapshot_found',
  'unreadable_file',
  'transient_transfer',
  'upload_failed',
  'partial_download',
  'traversal_rejected',
  'unsafe_target',
  'timeout',
  'interrupted',
  'internal',
];

export class SiteBackupError extends Error {
  readonly code: SiteBackupErrorCode;
  /** File path or object key the failure is about, when there is one. */
  readonly path: string | null;

  constructor(code: SiteBackupErrorCode, message: string, path: string | null = null) {
    super(message);
    this.name = 'SiteBackupError';
    this.code = code;
    this.path = path;
  }
}

export function isSiteBackupError(error: unknown, code?: SiteBackupErrorCode): error is SiteBackupError {
  return error instanceof SiteBackupError && (code === undefined || error.code === code);
}

export function isSiteBackupErrorCode(value: unknown): value is SiteBackupErrorCode {
  return typeof value === 'string' && ERROR_CODES.some((code) => code === value);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
