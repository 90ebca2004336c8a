import { BiprwsWebApiService } from "../BiprwsWebApiService.js";
import { ReportInspectorService } from "../ReportInspectorService.js";
import { NotFoundError, ParseError } from "../errors.js";
import {
  BASE_URL,
  createBiprwsResponse,
  jsonResponse,
  recordedRequests,
  requestedPaths,
  setRoutes,
} from "../../../test/helpers.js";

const DOC = "/raylight/v1/documents/1";

describe("ReportInspectorService", () => {
  let inspector: ReportInspectorService;

  beforeEach(() => {
    inspector = new ReportInspectorService(
      new BiprwsWebApiService({ url: BASE_URL })
    );
  });

  it("should return no matches for a report without data providers", async () => {
    setRoutes({
      [`GET ${DOC}`]: () =>
        createBiprwsResponse.document("1", "Public Folders/Sales", "Quarterly"),
      [`GET ${DOC}/dataproviders`]: () => createBiprwsResponse.dataProviders([]),
    });

    await expect(inspector.inspectReport("1", "tok", ["Revenue"])).resolves.toEqual(
      []
    );
    expect(requestedPaths()).toEqual([
      `GET ${DOC}`,
      `GET ${DOC}/dataproviders`,
    ]);
  });

  it("should treat a missing dataprovider list as empty", async () => {
    setRoutes({
      [`GET ${DOC}`]: () => createBiprwsResponse.document("1", "p", "n"),
      [`GET ${DOC}/dataproviders`]: () => jsonResponse(200, { dataproviders: {} }),
    });

    await expect(inspector.listDataProviders("1", "tok")).resolves.toEqual([]);
  });

  it("should accept a single data provider returned as an object", async () => {
    setRoutes({
      [`GET ${DOC}/dataproviders`]: () =>
        jsonResponse(200, {
          dataproviders: { dataprovider: { id: "DP0", name: "Sales Query" } },
        }),
    });

    await expect(inspector.listDataProviders("1", "tok")).resolves.toEqual([
      { id: "DP0", name: "Sales Query" },
    ]);
  });

  it("should emit matches by data provider, requested name, then position", async () => {
    setRoutes({
      [`GET ${DOC}`]: () =>
        createBiprwsResponse.document("1", "Public Folders/Sales", "Quarterly"),
      [`GET ${DOC}/dataproviders`]: () =>
        createBiprwsResponse.dataProviders([
          { id: "DP0", name: "Orders" },
          { id: "DP1", name: "Targets" },
        ]),
      [`GET ${DOC}/dataproviders/DP0/specification`]: () =>
        createBiprwsResponse.specification(["Revenue", "Year", "Revenue"]),
      [`GET ${DOC}/dataproviders/DP1/specification`]: () =>
        createBiprwsResponse.specification(["Year", "Region"]),
    });

    const matches = await inspector.inspectReport("1", "tok", ["Year", "Revenue"]);

    const base = { reportPath: "Public Folders/Sales", reportName: "Quarterly" };
    expect(matches).toEqual([
      { ...base, dataProvider: "Orders", objectName: "Year" },
      { ...base, dataProvider: "Orders", objectName: "Revenue" },
      { ...base, dataProvider: "Orders", objectName: "Revenue" },
      { ...base, dataProvider: "Targets", objectName: "Year" },
    ]);
  });

  it("should match names exactly and case-sensitively", async () => {
    setRoutes({
      [`GET ${DOC}`]: () => createBiprwsResponse.document("1", "p", "n"),
      [`GET ${DOC}/dataproviders`]: () =>
        createBiprwsResponse.dataProviders([{ id: "DP0", name: "Orders" }]),
      [`GET ${DOC}/dataproviders/DP0/specification`]: () =>
        createBiprwsResponse.specification(["revenue", "Revenue Total", " Revenue"]),
    });

    await expect(inspector.inspectReport("1", "tok", ["Revenue"])).resolves.toEqual(
      []
    );
  });

  it("should fetch specifications with XML headers and the token", async () => {
    setRoutes({
      [`GET ${DOC}`]: () => createBiprwsResponse.document("1", "p", "n"),
      [`GET ${DOC}/dataproviders`]: () =>
        createBiprwsResponse.dataProviders([{ id: "DP0", name: "Orders" }]),
      [`GET ${DOC}/dataproviders/DP0/specification`]: () =>
        createBiprwsResponse.specification(["Revenue"]),
    });

    await inspector.inspectReport("1", "tok", ["Revenue"]);

    expect(recordedRequests.map((r) => r.headers)).toEqual([
      {
        accept: "application/json",
        "content-type": "application/json",
        "x-sap-logontoken": "tok",
      },
      {
        accept: "application/json",
        "content-type": "application/json",
        "x-sap-logontoken": "tok",
      },
      {
        accept: "text/xml",
        "content-type": "text/xml",
        "x-sap-logontoken": "tok",
      },
    ]);
  });

  it("should propagate NotFoundError for an unknown report", async () => {
    setRoutes({});

    await expect(
      inspector.inspectReport("1", "tok", ["Revenue"])
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it("should raise ParseError when the document has no path", async () => {
    setRoutes({
      [`GET ${DOC}`]: () => jsonResponse(200, { document: { name: "n" } }),
    });

    const error = await inspector.getReport("1", "tok").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({
      message: "Unexpected document 1 response: document.path: Required",
    });
  });
});
