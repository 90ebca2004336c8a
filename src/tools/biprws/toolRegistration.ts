import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { BiprwsClient } from "../../services/biprws/BiprwsClient.js";
import { MatchRecord } from "../../types/biprws.js";
import { logger } from "../../utils/logger.js";

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

export type ToolServer = Pick<McpServer, "registerTool">;

export type ScanClient = Pick<
  BiprwsClient,
  "findObjectsInFolder" | "findObjectsInReport"
>;

function textResult(payload: object, isError = false): ToolResult {
  const result: ToolResult = {
    content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
  };
  if (isError) {
    result.isError = true;
  }
  return result;
}

function toMatchPayload(match: MatchRecord) {
  return {
    report_path: match.reportPath,
    report_name: match.reportName,
    data_provider: match.dataProvider,
    object_name: match.objectName,
  };
}

/**
 * Turn a failed scan into the tool's error payload
 */
export function errorResult(error: unknown, context: object): ToolResult {
  const errorType = error instanceof Error ? error.name : "Error";
  const details = error instanceof Error ? error.message : String(error);

  const message =
    errorType === "AuthError"
      ? `Authentication error: ${details}. Check the configured username, password and authentication type.`
      : errorType === "NotFoundError"
      ? `Not found: ${details}. Verify the folder or report id.`
      : errorType === "TransportError"
      ? `Connection error: ${details}. The BusinessObjects server may be unreachable.`
      : errorType === "ParseError"
      ? `Unexpected response: ${details}.`
      : `Unexpected error while scanning: ${details}. Please check the server logs for more details.`;

  return textResult(
    {
      error: true,
      error_type: errorType,
      message,
      ...context,
    },
    true
  );
}

export interface FolderToolParams {
  folderId: string;
  objectNames: string[];
  continueOnError?: boolean;
}

export interface ReportToolParams {
  reportId: string;
  objectNames: string[];
}

export function createFindObjectsInFolderHandler(client: ScanClient) {
  return async (params: FolderToolParams): Promise<ToolResult> => {
    try {
      logger.info(
        `Executing FindObjectsInFolder tool for folder ${params.folderId} with objects [${params.objectNames.join(", ")}]`
      );
      const result = await client.findObjectsInFolder(
        params.folderId,
        params.objectNames,
        { continueOnError: params.continueOnError === true }
      );
      return textResult({
        folder_id: params.folderId,
        reports_inspected: result.reportsInspected,
        match_count: result.matches.length,
        matches: result.matches.map(toMatchPayload),
        failures: result.failures.map((failure) => ({
          report_id: failure.reportId,
          report_name: failure.reportName,
          error_type: failure.error.name,
          details: failure.error.message,
        })),
      });
    } catch (error) {
      logger.error("Error executing FindObjectsInFolder tool:", error);
      return errorResult(error, { folder_id: params.folderId });
    }
  };
}

export function createFindObjectsInReportHandler(client: ScanClient) {
  return async (params: ReportToolParams): Promise<ToolResult> => {
    try {
      logger.info(
        `Executing FindObjectsInReport tool for report ${params.reportId} with objects [${params.objectNames.join(", ")}]`
      );
      const matches = await client.findObjectsInReport(
        params.reportId,
        params.objectNames
      );
      return textResult({
        report_id: params.reportId,
        match_count: matches.length,
        matches: matches.map(toMatchPayload),
      });
    } catch (error) {
      logger.error("Error executing FindObjectsInReport tool:", error);
      return errorResult(error, { report_id: params.reportId });
    }
  };
}

const objectNamesSchema = z
  .array(z.string().min(1))
  .min(1)
  .describe(
    "Business object names to look for in the data providers' result objects. Matching is exact and case-sensitive (e.g. ['Revenue', 'Fiscal Year'])."
  );

export function registerBiprwsTools(server: ToolServer, client: ScanClient) {
  server.registerTool(
    "find_objects_in_folder",
    {
      description:
        "Find which Web Intelligence reports in a BusinessObjects folder use the given business objects. Inspects every Webi report directly inside the folder (sub-folders are not searched) and returns one match per report, data provider and matching result object.",
      inputSchema: {
        folderId: z
          .string()
          .min(1)
          .describe("The InfoStore id of the folder to scan (e.g. '123456')"),
        objectNames: objectNamesSchema,
        continueOnError: z
          .boolean()
          .optional()
          .describe(
            "Optional: If true, reports that fail are listed under 'failures' and the scan continues (default: false)"
          ),
      },
    },
    createFindObjectsInFolderHandler(client)
  );

  server.registerTool(
    "find_objects_in_report",
    {
      description:
        "Find the data providers of a single Web Intelligence report that use the given business objects.",
      inputSchema: {
        reportId: z
          .string()
          .min(1)
          .describe("The id of the Web Intelligence document"),
        objectNames: objectNamesSchema,
      },
    },
    createFindObjectsInReportHandler(client)
  );
}
