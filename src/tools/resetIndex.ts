import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { SchemaIndexService } from "../services/schemaIndexService.js";
import { jsonContent } from "./jsonContent.js";

export function registerResetIndexTool(server: McpServer, service: SchemaIndexService) {
  server.registerTool(
    "reset_index",
    {
      title: "Reset Index",
      description: "Removes every indexed table and chunk.",
      inputSchema: {},
    },
    async () => jsonContent(await service.resetIndex()),
  );
}
