#!/usr/bin/env node
import "dotenv/config";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadSettings, createRuntime, SessionRegistry } from "@account-plan/agents";
import { registerAccountPlanTools } from "./tools/account-plan.js";

const server = new McpServer({
  name: "account-plan-mcp",
  version: "0.1.0",
});

const runtime = await createRuntime(loadSettings());
registerAccountPlanTools(server, new SessionRegistry(runtime));

const transport = new StdioServerTransport();
await server.connect(transport);
