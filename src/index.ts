#!/usr/bin/env node
import { ReportingMCPServer } from './server/ReportingMCPServer.js';

async function main(): Promise<void> {
  const server = new ReportingMCPServer();
  await server.run();
}

main().catch((error: unknown) => {
  console.error('Fatal error starting reporting MCP server:', error);
  process.exit(1);
});
