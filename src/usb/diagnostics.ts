import { ByteCursorOutOfBoundsError } from "./byteCursor.js";

export type Severity = "error" | "warning";

export type Verdict = "well-formed" | "valid-with-warnings" | "invalid";

export type DiagnosticCode =
  // BOS
  | "bos-too-short"
  | "bos-invalid-type"
  | "bos-length-mismatch"
  | "capability-truncated"
  | "capability-invalid-length"
  | "capability-overflow"
  | "webusb-vendor-code-zero"
  | "msos20-unusual-windows-version"
  // WebUSB URL
  | "url-too-short"
  // MS OS 2.0 descriptor set
  | "msos20-truncated-header"
  | "msos20-zero-length"
  | "msos20-invalid-length"
  | "msos20-overflow"
  | "msos20-unknown-type"
  | "msos20-descriptor-too-short"
  | "set-header-length-mismatch"
  | "set-header-not-first"
  | "set-header-unusual-windows-version"
  | "subset-reserved-nonzero"
  | "configuration-subset-overflow"
  | "function-subset-overflow"
  | "function-subset-too-small"
  | "compatible-id-not-winusb"
  | "compatible-id-not-terminated"
  | "registry-unusual-data-type"
  | "registry-invalid-name-length"
  | "registry-name-overflow"
  | "registry-empty-name"
  | "registry-data-length-overflow"
  | "registry-length-mismatch"
  | "registry-data-overflow"
  // Shared
  | "out-of-bounds";

export interface Diagnostic {
  severity: Severity;
  code: DiagnosticCode;
  message: string;
  offset?: number;
  /** Set on the single diagnostic that halted its parse pass. */
  fatal: boolean;
}

export interface AnalysisResult<T> {
  diagnostics: readonly Diagnostic[];
  errorCount: number;
  warningCount: number;
  verdict: Verdict;
  /** `null` when the input was too short to decode any field. */
  parsed: T | null;
}

export function computeVerdict(errorCount: number, warningCount: number): Verdict {
  if (errorCount === 0 && warningCount === 0) return "well-formed";
  if (errorCount === 0) return "valid-with-warnings";
  return "invalid";
}

/**
 * Accumulates diagnostics for one parse pass. Create one per call; never share across calls.
 */
export class DiagnosticsBuilder {
  private readonly entries: Diagnostic[] = [];
  private fatalSeen = false;

  get hasFatal(): boolean {
    return this.fatalSeen;
  }

  error(code: DiagnosticCode, message: string, offset?: number): void {
    this.push("error", code, message, offset, false);
  }

  warning(code: DiagnosticCode, message: string, offset?: number): void {
    this.push("warning", code, message, offset, false);
  }

  /** Records the error that stops the current pass. Only the first fatal diagnostic is kept. */
  fatal(code: DiagnosticCode, message: string, offset?: number): void {
    if (this.fatalSeen) return;
    this.fatalSeen = true;
    this.push("error", code, message, offset, true);
  }

  finish<T>(parsed: T | null): AnalysisResult<T> {
    const diagnostics = this.entries.slice();
    let errorCount = 0;
    let warningCount = 0;
    for (const d of diagnostics) {
      if (d.severity === "error") errorCount += 1;
      else warningCount += 1;
    }
    return { diagnostics, errorCount, warningCount, verdict: computeVerdict(errorCount, warningCount), parsed };
  }

  private push(severity: Severity, code: DiagnosticCode, message: string, offset: number | undefined, fatal: boolean): void {
    const diagnostic: Diagnostic = { severity, code, message, fatal };
    // Leave `offset` absent rather than `undefined` so results compare cleanly.
    if (offset !== undefined) diagnostic.offset = offset;
    this.entries.push(diagnostic);
  }
}

/**
 * Runs a parse body and converts a stray out-of-bounds read into a fatal diagnostic, so parse entry
 * points never throw on malformed input.
 */
export function runParse<T>(body: (diagnostics: DiagnosticsBuilder) => T | null): AnalysisResult<T> {
  const diagnostics = new DiagnosticsBuilder();
  let parsed: T | null = null;
  try {
    parsed = body(diagnostics);
  } catch (err) {
    if (!(err instanceof ByteCursorOutOfBoundsError)) throw err;
    diagnostics.fatal("out-of-bounds", err.message, err.offset);
  }
  return diagnostics.finish(parsed);
}
