/**
 * Declaration problems found before any host is touched.
 */
export class PlaybookError extends Error {
  source?: string;

  constructor(message: string, options?: { source?: string }) {
    super(options?.source ? `${options.source}: ${message}` : message);
    this.name = "PlaybookError";
    this.source = options?.source;
  }
}

export type ProvisionErrorKind = "unreachable" | "become_failed" | "command_failed";

/**
 * Infrastructure failure while reading or writing a host's crontab.
 * Fails the affected host only.
 */
export class ProvisionError extends Error {
  kind: ProvisionErrorKind;
  host: string;
  exitCode: number | null;
  stderr?: string;

  constructor(args: {
    message: string;
    kind: ProvisionErrorKind;
    host: string;
    exitCode?: number | null;
    stderr?: string;
  }) {
    super(args.message);
    this.name = "ProvisionError";
    this.kind = args.kind;
    this.host = args.host;
    this.exitCode = args.exitCode ?? null;
    this.stderr = args.stderr;
  }
}
