/**
 * Types for the BusinessObjects RESTful web service (BIPRWS) integration
 */

export interface BiprwsConfig {
  /** Service root, e.g. `http://bi.example.com:6405/biprws` */
  url: string;
  timeoutInSeconds?: number;
}

export interface Credential {
  username: string;
  password: string;
}

export const DEFAULT_AUTH_MODE = "secWinAD";

export const WEBI_ENTRY_TYPE = "Webi";

export interface ReportMetadata {
  id: string;
  path: string;
  name: string;
}

export interface DataProvider {
  id: string;
  name: string;
}

export interface FolderEntry {
  id: string;
  type: string;
  name?: string;
}

/**
 * One occurrence of a requested object name inside a data provider's
 * query specification.
 */
export interface MatchRecord {
  reportPath: string;
  reportName: string;
  dataProvider: string;
  objectName: string;
}

export interface ReportFailure {
  reportId: string;
  reportName?: string;
  error: Error;
}

export interface FolderScanOptions {
  /** Number of reports inspected at once. Defaults to 1 (sequential). */
  concurrency?: number;
  /** Record failing reports and keep scanning instead of aborting. */
  continueOnError?: boolean;
}

export interface FolderScanResult {
  matches: MatchRecord[];
  failures: ReportFailure[];
  reportsInspected: number;
}
