export class AuditError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

// Session could not be established; the only fault that aborts a site scan
export class ConnectivityError extends AuditError {}

export class ConfigError extends AuditError {}

export class ReportFormatError extends AuditError {}

export class SnapshotFormatError extends AuditError {}
