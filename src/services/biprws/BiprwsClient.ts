import {
  Credential,
  DEFAULT_AUTH_MODE,
  FolderScanOptions,
  FolderScanResult,
  MatchRecord,
} from "../../types/biprws.js";
import { ConnectionStringParams } from "../../utils/connectionStringParser.js";
import { logger } from "../../utils/logger.js";
import { BiprwsWebApiService } from "./BiprwsWebApiService.js";
import { ConfigurationError } from "./errors.js";
import { FolderWalkerService } from "./FolderWalkerService.js";
import { ReportInspectorService } from "./ReportInspectorService.js";
import { SessionService } from "./SessionService.js";

/**
 * Entry point for scans. Every public method runs inside its own logon
 * session, and the token is revoked exactly once before it returns.
 */
export class BiprwsClient {
  private credential: Credential;
  private authMode: string;
  private sessionService: SessionService;
  private reportInspector: ReportInspectorService;
  private folderWalker: FolderWalkerService;

  constructor(params: ConnectionStringParams) {
    const api = new BiprwsWebApiService({
      url: params.url,
      timeoutInSeconds: params.timeoutInSeconds,
    });
    this.credential = { username: params.username, password: params.password };
    this.authMode = params.authMode ?? DEFAULT_AUTH_MODE;
    this.sessionService = new SessionService(api);
    this.reportInspector = new ReportInspectorService(api);
    this.folderWalker = new FolderWalkerService(api, this.reportInspector);
  }

  async findObjectsInFolder(
    folderId: string,
    objectNames: readonly string[],
    options: FolderScanOptions = {},
  ): Promise<FolderScanResult> {
    assertObjectNames(objectNames);
    return this.withSession((token) =>
      this.folderWalker.walkFolder(folderId, token, objectNames, options),
    );
  }

  async findObjectsInReport(
    reportId: string,
    objectNames: readonly string[],
  ): Promise<MatchRecord[]> {
    assertObjectNames(objectNames);
    return this.withSession((token) =>
      this.reportInspector.inspectReport(reportId, token, objectNames),
    );
  }

  /**
   * Log on, run `work`, and log off whatever happened. An error from `work`
   * wins over a logoff error, which is then only logged.
   */
  private async withSession<T>(
    work: (token: string) => Promise<T>,
  ): Promise<T> {
    const token = await this.sessionService.logon(
      this.credential,
      this.authMode,
    );

    let result: T;
    try {
      result = await work(token);
    } catch (error) {
      await this.sessionService.logoff(token).catch((logoffError: unknown) => {
        logger.warn(
          "Logoff after a failed scan also failed; the token may still be valid until it expires",
          logoffError instanceof Error ? logoffError.message : logoffError,
        );
      });
      throw error;
    }

    await this.sessionService.logoff(token);
    return result;
  }
}

function assertObjectNames(objectNames: readonly string[]): void {
  if (objectNames.length === 0) {
    throw new ConfigurationError("At least one object name is required");
  }
}
