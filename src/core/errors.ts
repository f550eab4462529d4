/**
 * Error taxonomy for report execution.
 *
 * Every class carries a stable `code` so transports and notifications can tell
 * failures apart without matching on messages.
 */

export class ReportServiceError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Malformed or missing report definition. The offending file is skipped.
 */
export class ReportDefinitionError extends ReportServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("report_definition_invalid", message, options);
  }
}

/**
 * The report store directory cannot be read. Fatal for a sweep.
 */
export class ReportStoreUnavailableError extends ReportServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("report_store_unavailable", message, options);
  }
}

export type RemoteJobStage = "create" | "status" | "download";

/**
 * Job creation, polling, or download failure.
 */
export class RemoteJobError extends ReportServiceError {
  readonly stage: RemoteJobStage;
  readonly jobId?: string;

  constructor(stage: RemoteJobStage, message: string, options?: { cause?: unknown; jobId?: string }) {
    super(`remote_job_${stage}_failed`, message, options);
    this.stage = stage;
    this.jobId = options?.jobId;
  }
}

export class JobTimeoutError extends ReportServiceError {
  readonly jobId: string;

  constructor(jobId: string, timeoutMs: number) {
    super("remote_job_timed_out", `Export job ${jobId} did not finish within ${Math.round(timeoutMs / 1000)}s`);
    this.jobId = jobId;
  }
}

/**
 * Archive unreadable or expected payload absent.
 */
export class ExtractionError extends ReportServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("extraction_failed", message, options);
  }
}

/**
 * Named storage configuration could not be resolved.
 */
export class StorageConfigurationError extends ReportServiceError {
  readonly configName: string;

  constructor(configName: string, message?: string) {
    super("storage_config_not_found", message ?? `Storage configuration '${configName}' not found`);
    this.configName = configName;
  }
}

/**
 * Upload or link generation failed in transport or authentication.
 */
export class StorageTransportError extends ReportServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("storage_transport_failed", message, options);
  }
}

/**
 * Message of any thrown value.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
