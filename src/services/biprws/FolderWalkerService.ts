import {
  FolderEntry,
  FolderScanOptions,
  FolderScanResult,
  MatchRecord,
  ReportFailure,
  WEBI_ENTRY_TYPE,
} from "../../types/biprws.js";
import { logger } from "../../utils/logger.js";
import { BiprwsWebApiService } from "./BiprwsWebApiService.js";
import { ReportInspectorService } from "./ReportInspectorService.js";
import { isFatalError } from "./errors.js";
import {
  folderChildrenResponseSchema,
  readResponse,
} from "./responseSchemas.js";

type ReportOutcome =
  | { ok: true; matches: MatchRecord[] }
  | { ok: false; failure: ReportFailure };

/**
 * Runs the Report Inspector over the Webi reports directly inside a folder.
 */
export class FolderWalkerService {
  constructor(
    private readonly api: BiprwsWebApiService,
    private readonly inspector: ReportInspectorService,
  ) {}

  async listChildren(folderId: string, token: string): Promise<FolderEntry[]> {
    const data = await this.api.sendJson(
      `/infostore/${encodeURIComponent(folderId)}/children`,
      { token },
    );
    const { entries } = readResponse(
      folderChildrenResponseSchema,
      data,
      `children of folder ${folderId}`,
    );
    return entries ?? [];
  }

  /**
   * Inspect every Webi report in the folder (no recursion into sub-folders).
   *
   * Match records are concatenated in folder entry order regardless of
   * `concurrency`. Without `continueOnError` the first failing report aborts
   * the walk; with it, non-fatal failures are recorded and skipped.
   */
  async walkFolder(
    folderId: string,
    token: string,
    objectNames: readonly string[],
    options: FolderScanOptions = {},
  ): Promise<FolderScanResult> {
    const entries = await this.listChildren(folderId, token);
    const reports = entries.filter((entry) => entry.type === WEBI_ENTRY_TYPE);

    logger.info(
      `Folder ${folderId}: ${reports.length} Webi report(s) out of ${entries.length} entries`,
    );

    const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
    const outcomes: ReportOutcome[] = new Array(reports.length);
    let next = 0;

    let firstError: unknown;
    let aborted = false;

    // Workers stop taking reports once one of them has failed.
    const worker = async (): Promise<void> => {
      while (!aborted && next < reports.length) {
        const index = next++;
        try {
          outcomes[index] = await this.inspectEntry(
            reports[index],
            token,
            objectNames,
            options.continueOnError === true,
          );
        } catch (error) {
          if (!aborted) {
            aborted = true;
            firstError = error;
          }
        }
      }
    };

    const workers: Promise<void>[] = [];
    for (let i = 0; i < Math.min(concurrency, reports.length); i++) {
      workers.push(worker());
    }
    await Promise.all(workers);
    if (aborted) {
      throw firstError;
    }

    const result: FolderScanResult = {
      matches: [],
      failures: [],
      reportsInspected: reports.length,
    };
    for (const outcome of outcomes) {
      if (outcome.ok) {
        result.matches.push(...outcome.matches);
      } else {
        result.failures.push(outcome.failure);
      }
    }
    return result;
  }

  private async inspectEntry(
    entry: FolderEntry,
    token: string,
    objectNames: readonly string[],
    continueOnError: boolean,
  ): Promise<ReportOutcome> {
    try {
      const matches = await this.inspector.inspectReport(
        entry.id,
        token,
        objectNames,
      );
      return { ok: true, matches };
    } catch (error) {
      logger.exception("Report inspection failed", error, {
        component: "FolderWalkerService",
        operation: "walkFolder",
        reportId: entry.id,
      });
      if (!continueOnError || isFatalError(error) || !(error instanceof Error)) {
        throw error;
      }
      return {
        ok: false,
        failure: { reportId: entry.id, reportName: entry.name, error },
      };
    }
  }
}
