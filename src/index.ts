import express, { Request, Response } from 'express';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { loadConfigFromEnv } from './config.js';
import { ChildProcessExecutor } from './lib/process-executor.js';
import { createBackend } from './lib/platform.js';
import { InterfaceRegistry } from './lib/wireless-interface.js';
import { registerWifiTools } from './tools/wifi.js';

const SERVER_NAME = 'wifi-control-mcp';
const SERVER_VERSION = '1.0.0';

const config = loadConfigFromEnv();
const backend = createBackend(new ChildProcessExecutor(), config.wifi);
const registry = new InterfaceRegistry(backend);

console.log(`Using ${backend.platform} backend`, {
  defaultInterface: config.wifi.interface,
});

function createMcpServer(): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });
  registerWifiTools(server, registry, config.wifi.interface);
  return server;
}

const app = express();
app.use(express.json());

// MCP endpoint using Streamable HTTP Transport
app.post('/mcp', async (req: Request, res: Response) => {
  try {
    const server = createMcpServer();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined, // Stateless mode
    });

    res.on('close', () => {
      transport.close().catch((error: unknown) => {
        console.error('MCP transport close error:', error);
      });
      server.close().catch((error: unknown) => {
        console.error('MCP server close error:', error);
      });
    });

    await server.connect(transport);
    await transport.handleRequest(req, res, req.body);
  } catch (error) {
    console.error('MCP request error:', error);
    if (!res.headersSent) {
      res.status(500).json({ error: 'Internal server error' });
    }
  }
});

// Health check endpoint
app.get('/health', (_req: Request, res: Response) => {
  res.json({
    status: 'ok',
    server: SERVER_NAME,
    version: SERVER_VERSION,
    platform: backend.platform,
    interfaces: registry.list().map((wifi) => ({
      name: wifi.name,
      connection: wifi.getConnection(),
    })),
  });
});

const { host, port } = config.server;

app.listen(port, host, () => {
  console.log(`${SERVER_NAME} listening on http://${host}:${port}`);
  console.log(`MCP endpoint: http://${host}:${port}/mcp`);
  console.log(`Health check: http://${host}:${port}/health`);
});
