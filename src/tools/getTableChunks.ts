import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { SchemaIndexService } from "../services/schemaIndexService.js";
import { jsonContent } from "./jsonContent.js";

export function registerGetTableChunksTool(server: McpServer, service: SchemaIndexService) {
  server.registerTool(
    "get_table_chunks",
    {
      title: "Get Table Chunks",
      description: "Reads one table from the database and returns its ordered schema chunks.",
      inputSchema: {
        table: z.string().min(1).describe("Table name"),
      },
    },
    async ({ table }) => jsonContent({ chunks: await service.getTableChunks(table) }),
  );
}
