/** Counters describing one finished run. */
export interface ValidationSummary {
  readonly runId: string;
  readonly table: string;
  readonly source: string;
  readonly passed: boolean;
  readonly rowsRead: number;
  readonly errorCount: number;
  readonly lineErrorCount: number;
  readonly fieldErrorCount: number;
  readonly durationMs: number;
}
