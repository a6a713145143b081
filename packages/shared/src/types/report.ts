/**
 * Report and reference data type definitions
 * @module @capbench/shared/types/report
 */

/**
 * Scalar summary value
 */
export type ReportValue = string | number | boolean | null;

/**
 * Key/value summary written at the top of a report
 */
export type ReportSummary = Record<string, ReportValue>;

/**
 * One named series of rows
 */
export interface ReportSeries {
  title: string;
  rows: Array<Record<string, ReportValue>>;
}

/**
 * Report persistence collaborator
 */
export interface ReportSink {
  /**
   * Persist a report and return the path of the primary file. The raw
   * `detailedResults` are kept beside the summary in the JSON form.
   */
  save(
    prefix: string,
    timestamp: string,
    summary: ReportSummary,
    series?: readonly ReportSeries[],
    detailedResults?: unknown,
  ): Promise<string>;
}

/**
 * One CAP property score
 */
export interface CapPropertyScore {
  level: string;
  description: string;
  score: number;
}

/**
 * Qualitative CAP scorecard for one store
 */
export interface CapScorecard {
  consistency: CapPropertyScore;
  availability: CapPropertyScore;
  partitionTolerance: CapPropertyScore;
  capClassification: 'CP' | 'AP' | 'CA';
}

/**
 * Static reference scorecard (not computed from live runs)
 */
export const CAP_REFERENCE: Readonly<Record<string, CapScorecard>> = {
  mongodb: {
    consistency: { level: 'Strong', description: 'ACID transactions', score: 90 },
    availability: { level: 'High', description: 'Automatic failover', score: 75 },
    partitionTolerance: { level: 'High', description: 'Replica sets', score: 85 },
    capClassification: 'CP',
  },
  cassandra: {
    consistency: { level: 'Tunable', description: 'Configurable consistency', score: 60 },
    availability: { level: 'Very High', description: 'No single point of failure', score: 95 },
    partitionTolerance: { level: 'Very High', description: 'Designed for partitions', score: 95 },
    capClassification: 'AP',
  },
};
