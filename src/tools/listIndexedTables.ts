import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { SchemaIndexService } from "../services/schemaIndexService.js";
import { jsonContent } from "./jsonContent.js";

export function registerListIndexedTablesTool(server: McpServer, service: SchemaIndexService) {
  server.registerTool(
    "list_indexed_tables",
    {
      title: "List Indexed Tables",
      description: "Lists indexed tables with their chunk counts.",
      inputSchema: {},
    },
    async () => jsonContent(await service.listIndexedTables()),
  );
}
