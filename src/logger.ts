import { Logger } from "@vscode/debugadapter";

export enum Severity {
  VERBOSE = "verbose",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
}

/**
 * Sink for non-fatal findings while decoding
 */
export interface Diagnostics {
  report(severity: Severity, message: string): void;
}

/**
 * Forwards diagnostics to a debug adapter logger
 */
export class LoggerDiagnostics implements Diagnostics {
  constructor(private logger: Logger.ILogger = Logger.logger) {}

  report(severity: Severity, message: string) {
    switch (severity) {
      case Severity.VERBOSE:
        this.logger.verbose(message);
        break;
      case Severity.INFO:
        this.logger.log(message);
        break;
      case Severity.WARN:
        this.logger.warn(message);
        break;
      case Severity.ERROR:
        this.logger.error(message);
        break;
    }
  }
}

export class NullDiagnostics implements Diagnostics {
  report() {
    return null;
  }
}

export interface DiagnosticEntry {
  severity: Severity;
  message: string;
}

/**
 * Keeps reported entries in memory, for hosts that display them later
 */
export class CollectingDiagnostics implements Diagnostics {
  public entries: DiagnosticEntry[] = [];

  constructor(private minSeverity = Severity.INFO) {}

  report(severity: Severity, message: string) {
    if (severityRank(severity) >= severityRank(this.minSeverity)) {
      this.entries.push({ severity, message });
    }
  }

  messages(severity?: Severity): string[] {
    return this.entries
      .filter((e) => severity === undefined || e.severity === severity)
      .map((e) => e.message);
  }
}

const ranks: Record<Severity, number> = {
  [Severity.VERBOSE]: 0,
  [Severity.INFO]: 1,
  [Severity.WARN]: 2,
  [Severity.ERROR]: 3,
};

export function severityRank(severity: Severity): number {
  return ranks[severity];
}
