import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { SchemaIndexService } from "../services/schemaIndexService.js";
import { jsonContent } from "./jsonContent.js";

export function registerIndexSchemaTool(server: McpServer, service: SchemaIndexService) {
  server.registerTool(
    "index_schema",
    {
      title: "Index Schema",
      description:
        "Extracts table schemas from the database, chunks them and indexes the chunks for retrieval.",
      inputSchema: {
        tables: z
          .array(z.string().min(1))
          .optional()
          .describe("Table names to index; all usable tables when omitted"),
      },
    },
    async ({ tables }) => jsonContent(await service.indexSchemas(tables)),
  );
}
