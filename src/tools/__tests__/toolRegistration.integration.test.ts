import {
  createFindObjectsInFolderHandler,
  createFindObjectsInReportHandler,
  registerBiprwsTools,
  ScanClient,
} from "../biprws/toolRegistration.js";
import { AuthError, NotFoundError } from "../../services/biprws/errors.js";

const revenueMatch = {
  reportPath: "Public Folders/Finance",
  reportName: "Revenue by Year",
  dataProvider: "DP1",
  objectName: "Revenue",
};

function createClient(): jest.Mocked<ScanClient> {
  return {
    findObjectsInFolder: jest.fn(),
    findObjectsInReport: jest.fn(),
  };
}

function parsePayload(result: { content: Array<{ text: string }> }): unknown {
  return JSON.parse(result.content[0].text);
}

describe("BIPRWS tool registration", () => {
  it("registers both scan tools", () => {
    const server = { registerTool: jest.fn() };

    registerBiprwsTools(server, createClient());

    expect(server.registerTool.mock.calls.map((call) => call[0])).toEqual([
      "find_objects_in_folder",
      "find_objects_in_report",
    ]);
  });

  it("find_objects_in_folder returns matches and failures", async () => {
    const client = createClient();
    client.findObjectsInFolder.mockResolvedValue({
      matches: [revenueMatch],
      failures: [
        {
          reportId: "2",
          reportName: "Broken",
          error: new NotFoundError("gone"),
        },
      ],
      reportsInspected: 2,
    });
    const handler = createFindObjectsInFolderHandler(client);

    const result = await handler({
      folderId: "123456",
      objectNames: ["Revenue"],
      continueOnError: true,
    });

    expect(client.findObjectsInFolder).toHaveBeenCalledWith(
      "123456",
      ["Revenue"],
      { continueOnError: true }
    );
    expect(result.isError).toBeUndefined();
    expect(parsePayload(result)).toEqual({
      folder_id: "123456",
      reports_inspected: 2,
      match_count: 1,
      matches: [
        {
          report_path: "Public Folders/Finance",
          report_name: "Revenue by Year",
          data_provider: "DP1",
          object_name: "Revenue",
        },
      ],
      failures: [
        {
          report_id: "2",
          report_name: "Broken",
          error_type: "NotFoundError",
          details: "gone",
        },
      ],
    });
  });

  it("find_objects_in_report returns the report's matches", async () => {
    const client = createClient();
    client.findObjectsInReport.mockResolvedValue([revenueMatch]);
    const handler = createFindObjectsInReportHandler(client);

    const result = await handler({ reportId: "1", objectNames: ["Revenue"] });

    expect(client.findObjectsInReport).toHaveBeenCalledWith("1", ["Revenue"]);
    expect(parsePayload(result)).toMatchObject({
      report_id: "1",
      match_count: 1,
    });
  });

  it("reports scan errors as an error payload", async () => {
    const client = createClient();
    client.findObjectsInFolder.mockRejectedValue(
      new AuthError("Logon as auditor was rejected")
    );
    const handler = createFindObjectsInFolderHandler(client);

    const result = await handler({ folderId: "9", objectNames: ["Revenue"] });

    expect(result.isError).toBe(true);
    expect(parsePayload(result)).toEqual({
      error: true,
      error_type: "AuthError",
      message:
        "Authentication error: Logon as auditor was rejected. Check the configured username, password and authentication type.",
      folder_id: "9",
    });
  });
});
