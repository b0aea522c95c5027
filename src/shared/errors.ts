export enum LabErrorCode {
  CONFIG_INVALID = 'CONFIG_INVALID',
  COMMAND_FAILED = 'COMMAND_FAILED',
  TRANSPORT_FAILED = 'TRANSPORT_FAILED',
  PARSE_FAILED = 'PARSE_FAILED',
  LAB_NOT_DEPLOYED = 'LAB_NOT_DEPLOYED',
  NO_DEVICES = 'NO_DEVICES',
  FETCH_TIMEOUT = 'FETCH_TIMEOUT',
  CUTSHEET_INVALID = 'CUTSHEET_INVALID',
}

export class LabError extends Error {
  readonly code: LabErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: LabErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'LabError';
    this.code = code;
    this.context = context;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
