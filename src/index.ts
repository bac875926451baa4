import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createDb, openPool } from "./db/connection.js";
import { createGatewayServer, RunRegistry } from "./mcp/gatewayServer.js";
import { PostgresStore } from "./store/postgresStore.js";

async function main(): Promise<void> {
  const configPath = process.env.FANOUT_CONFIG ?? null;

  const pool = await openPool();
  const store = new PostgresStore(createDb(pool));
  const registry = new RunRegistry();

  const server = createGatewayServer({ store, configPath, registry });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("cohort-fanout gateway ready");
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
