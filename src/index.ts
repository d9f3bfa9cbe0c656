#!/usr/bin/env node
import 'dotenv/config';
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { loadConfig } from "./config.js";
import { logger } from "./infra/logger.js";
import {
  ExtractPdfSchema,
  ExtractMarkupSchema,
  TabulateFolderSchema,
  type ExtractPdfArgs,
  type ExtractMarkupArgs,
  type TabulateFolderArgs,
} from "./mcp/schemas.js";
import {
  handleExtractPdf,
  handleExtractMarkup,
  handleTabulateFolder,
  handleStatus,
  type ToolContext,
} from "./mcp/tools.js";

function formatError(err: unknown): string {
  if (err instanceof Error) return err.stack || err.message;
  return String(err);
}

function safeTool<TArgs>(name: string, fn: (args: TArgs) => Promise<CallToolResult>) {
  return async (args: TArgs): Promise<CallToolResult> => {
    try {
      logger.debug({ tool: name, args }, 'tool called');
      return await fn(args);
    } catch (err) {
      logger.error({ tool: name, err }, 'tool failed');
      return {
        isError: true,
        content: [{ type: 'text' as const, text: formatError(err) }],
      };
    }
  };
}

const server = new McpServer({
  name: "paper-tabulate",
  version: "1.0.0",
});

function registerTools(ctx: ToolContext): void {
  server.tool(
    "grobid_extract_pdf",
    "Send one PDF to GROBID and return the extracted record (title, authors, abstract, text, references).",
    ExtractPdfSchema,
    safeTool<ExtractPdfArgs>("grobid_extract_pdf", (args) => handleExtractPdf(ctx, args))
  );

  server.tool(
    "grobid_extract_markup",
    "Extract a record from a TEI XML file already produced by GROBID.",
    ExtractMarkupSchema,
    safeTool<ExtractMarkupArgs>("grobid_extract_markup", (args) => handleExtractMarkup(ctx, args))
  );

  server.tool(
    "grobid_tabulate_folder",
    "Process every PDF of a folder and write one CSV row per document.",
    TabulateFolderSchema,
    safeTool<TabulateFolderArgs>("grobid_tabulate_folder", (args) => handleTabulateFolder(ctx, args))
  );

  server.tool(
    "grobid_status",
    "Check whether the configured GROBID service is reachable.",
    safeTool("grobid_status", () => handleStatus(ctx))
  );
}

async function main() {
  const config = loadConfig();
  registerTools({ config, logger });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ endpoint: config.endpoint }, "paper-tabulate MCP server running on stdio");

  const shutdown = async () => {
    await server.close();
    process.exit(0);
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((error) => {
  logger.fatal({ err: error }, "Fatal error in main()");
  process.exit(1);
});
