import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { BiprwsClient } from "./services/biprws/BiprwsClient.js";
import { ConnectionStringParams } from "./utils/connectionStringParser.js";
import { logger, LogMode } from "./utils/logger.js";
import { registerBiprwsTools } from "./tools/biprws/toolRegistration.js";

export const SERVER_NAME = "webi-object-finder";
export const SERVER_VERSION = "1.0.0";

/**
 * STDIO MCP Server exposing the Webi object scan as tools.
 * Each tool call logs on and off on its own; no session is kept between calls.
 */
export async function startStdioServer(
  connectionParams: ConnectionStringParams
): Promise<void> {
  // stdout is reserved for JSON-RPC
  logger.setMode(LogMode.STDIO);

  logger.info(`BIPRWS URL: ${connectionParams.url}`);
  logger.info(`Username: ${connectionParams.username}`);

  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerBiprwsTools(server, new BiprwsClient(connectionParams));

  const transport = new StdioServerTransport();

  logger.info("Starting Webi Object Finder MCP Server (STDIO mode)...");

  await server.connect(transport);

  logger.info("Webi Object Finder MCP Server running in STDIO mode");
}
