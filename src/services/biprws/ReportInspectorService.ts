import {
  DataProvider,
  MatchRecord,
  ReportMetadata,
} from "../../types/biprws.js";
import { logger } from "../../utils/logger.js";
import {
  findResultObjects,
  parseResultObjects,
} from "../../utils/specificationParser.js";
import { BiprwsWebApiService } from "./BiprwsWebApiService.js";
import {
  dataProvidersResponseSchema,
  documentResponseSchema,
  readResponse,
} from "./responseSchemas.js";

const RAYLIGHT_PATH = "/raylight/v1";

/**
 * Looks for requested object names in the data providers of one
 * Web Intelligence report.
 */
export class ReportInspectorService {
  constructor(private readonly api: BiprwsWebApiService) {}

  async getReport(reportId: string, token: string): Promise<ReportMetadata> {
    const data = await this.api.sendJson(documentPath(reportId), { token });
    const { document } = readResponse(
      documentResponseSchema,
      data,
      `document ${reportId}`,
    );
    return { id: reportId, path: document.path, name: document.name };
  }

  async listDataProviders(
    reportId: string,
    token: string,
  ): Promise<DataProvider[]> {
    const data = await this.api.sendJson(
      `${documentPath(reportId)}/dataproviders`,
      { token },
    );
    const { dataproviders } = readResponse(
      dataProvidersResponseSchema,
      data,
      `data providers of document ${reportId}`,
    );
    const list = dataproviders?.dataprovider;
    if (list === undefined) {
      return [];
    }
    return Array.isArray(list) ? list : [list];
  }

  async getSpecification(
    reportId: string,
    dataProviderId: string,
    token: string,
  ): Promise<string> {
    return this.api.sendXml(
      `${documentPath(reportId)}/dataproviders/${encodeURIComponent(dataProviderId)}/specification`,
      token,
    );
  }

  /**
   * Return one match record per result object whose name exactly equals a
   * requested name, ordered by data provider, then requested name, then
   * position in the specification.
   */
  async inspectReport(
    reportId: string,
    token: string,
    objectNames: readonly string[],
  ): Promise<MatchRecord[]> {
    const report = await this.getReport(reportId, token);
    const dataProviders = await this.listDataProviders(reportId, token);

    logger.debug(
      `Report ${reportId} '${report.name}' has ${dataProviders.length} data provider(s)`,
    );

    const matches: MatchRecord[] = [];
    for (const dataProvider of dataProviders) {
      const xml = await this.getSpecification(reportId, dataProvider.id, token);
      const resultObjects = parseResultObjects(xml);

      for (const objectName of objectNames) {
        for (const resultObject of findResultObjects(resultObjects, objectName)) {
          matches.push({
            reportPath: report.path,
            reportName: report.name,
            dataProvider: dataProvider.name,
            objectName: resultObject.name,
          });
        }
      }
    }

    logger.debug(`Report ${reportId}: ${matches.length} match(es)`);
    return matches;
  }
}

function documentPath(reportId: string): string {
  return `${RAYLIGHT_PATH}/documents/${encodeURIComponent(reportId)}`;
}
