import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { SchemaIndexService } from "../services/schemaIndexService.js";
import { jsonContent } from "./jsonContent.js";

export function registerSearchSchemaTool(server: McpServer, service: SchemaIndexService) {
  server.registerTool(
    "search_schema",
    {
      title: "Search Schema",
      description: "Retrieves the schema chunks most relevant to a question about the database.",
      inputSchema: {
        query: z.string().min(2).describe("Search query"),
        top_k: z.number().int().min(1).max(20).optional().describe("Max hits"),
        table_filter: z
          .array(z.string())
          .optional()
          .describe("Table names to limit search"),
      },
    },
    async ({ query, top_k, table_filter }) =>
      jsonContent(
        await service.searchSchema({ query, topK: top_k, tableNames: table_filter }),
      ),
  );
}
