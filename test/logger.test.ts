import { Logger } from "@vscode/debugadapter";
import { instance, mock, verify } from "@johanblumenberg/ts-mockito";
import {
  CollectingDiagnostics,
  LoggerDiagnostics,
  Severity,
} from "../src/logger";

describe("LoggerDiagnostics", () => {
  it("maps severities onto logger methods", () => {
    const mockedLogger = mock(Logger.Logger);
    const diagnostics = new LoggerDiagnostics(instance(mockedLogger));
    diagnostics.report(Severity.VERBOSE, "record");
    diagnostics.report(Severity.INFO, "info");
    diagnostics.report(Severity.WARN, "odd value");
    diagnostics.report(Severity.ERROR, "failed");
    verify(mockedLogger.verbose("record")).once();
    verify(mockedLogger.log("info")).once();
    verify(mockedLogger.warn("odd value")).once();
    verify(mockedLogger.error("failed")).once();
  });
});

describe("CollectingDiagnostics", () => {
  it("keeps entries at or above the minimum severity", () => {
    const diagnostics = new CollectingDiagnostics(Severity.WARN);
    diagnostics.report(Severity.INFO, "skipped");
    diagnostics.report(Severity.WARN, "kept");
    diagnostics.report(Severity.ERROR, "also kept");
    expect(diagnostics.entries).toEqual([
      { severity: Severity.WARN, message: "kept" },
      { severity: Severity.ERROR, message: "also kept" },
    ]);
    expect(diagnostics.messages(Severity.ERROR)).toEqual(["also kept"]);
  });
});
