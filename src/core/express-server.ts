import express, { Request, Response, NextFunction } from 'express';
import type { Server as HttpServer } from 'node:http';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { PokeMCPServer, SERVER_INFO } from '../server.js';
import { ErrorHandler } from './error-handler.js';
import { ServerConfig } from '../types/server.types.js';

export class ExpressServer {
  private app: express.Application;
  private config: ServerConfig;
  private mcpServer: PokeMCPServer;
  private errorHandler: ErrorHandler;
  private httpServer: HttpServer | undefined;
  private requestCount = 0;

  // Transport failures that are the client's fault
  private static readonly ERROR_PATTERNS = [
    { pattern: /stream is not readable/i, type: 'transport_stream', status: 400 },
    { pattern: /parse error/i, type: 'mcp_parse', status: 400 },
    { pattern: /invalid request/i, type: 'mcp_validation', status: 400 },
    { pattern: /timeout/i, type: 'transport_timeout', status: 504 },
  ] as const;

  private static readonly DEFAULT_ERROR = { type: 'server_internal', status: 500 } as const;

  constructor(config: ServerConfig, mcpServer: PokeMCPServer) {
    this.app = express();
    this.config = config;
    this.mcpServer = mcpServer;
    this.errorHandler = mcpServer.getErrorHandler();

    this.setupMiddleware();
    this.setupRoutes();
  }

  getApp(): express.Application {
    return this.app;
  }

  private setupMiddleware(): void {
    this.app.use(express.json());

    this.app.use((req, res, next) => {
      const origin = req.get('Origin');

      if (this.config.environment === 'development') {
        res.header('Access-Control-Allow-Origin', '*');
      } else if (this.config.allowedOrigins.length > 0) {
        if (origin && this.config.allowedOrigins.includes(origin)) {
          res.header('Access-Control-Allow-Origin', origin);
        }
      } else if (origin) {
        // No allowed origins configured: browsers get nothing outside development
        res.status(403).json({
          error: 'CORS policy violation',
          message: 'Origin not allowed. Set ALLOWED_ORIGINS to permit browser clients.',
          origin,
        });
        return;
      }

      res.header('Access-Control-Allow-Headers', 'Origin, X-Requested-With, Content-Type, Accept, Authorization, Mcp-Session-Id');
      res.header('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');

      if (req.method === 'OPTIONS') {
        res.status(200).end();
        return;
      }

      next();
    });
  }

  /**
   * Stateless streamable HTTP: every request gets its own SDK server and
   * transport, both closed once the response is done
   */
  private async handleMcpRequest(req: Request, res: Response): Promise<void> {
    this.requestCount++;
    const server = this.mcpServer.createServer();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true,
    });

    res.on('close', () => {
      transport.close().catch((error: unknown) => {
        this.errorHandler.logWarning('Failed to close MCP transport', { error: String(error) });
      });
      server.close().catch((error: unknown) => {
        this.errorHandler.logWarning('Failed to close MCP server', { error: String(error) });
      });
    });

    await server.connect(transport);
    await transport.handleRequest(req, res, req.body);
  }

  private setupRoutes(): void {
    this.app.get('/health', (req: Request, res: Response) => {
      const health = this.mcpServer.getHealthStatus();
      const info = this.mcpServer.getServerInfo();

      res.status(health.status === 'healthy' ? 200 : 503).json({
        ...health,
        service: SERVER_INFO.NAME,
        environment: this.config.environment,
        integrations: info.configured,
        checks: {
          uptime: process.uptime(),
          nodeVersion: process.version,
          mcpRequests: this.requestCount,
        },
      });
    });

    this.app.get('/', (req: Request, res: Response) => {
      res.json({
        name: SERVER_INFO.DISPLAY_NAME,
        version: SERVER_INFO.VERSION,
        description: 'MCP server for weather, Dutch railways, flights and an Obsidian vault',
        transport: 'http',
        endpoints: {
          health: '/health',
          mcp: '/mcp',
        },
        tools: this.mcpServer.listTools().map(tool => tool.name),
      });
    });

    this.app.all('/mcp', async (req: Request, res: Response) => {
      try {
        await this.handleMcpRequest(req, res);
      } catch (error) {
        const { type: errorType, status: statusCode } = this.categorizeError(error);
        const message = error instanceof Error ? error.message : String(error);

        this.errorHandler.logError('MCP request failed', error, {
          method: req.method,
          url: req.url,
          errorType,
        });

        if (!res.headersSent) {
          res.status(statusCode).json({
            error: `MCP ${errorType} error`,
            type: errorType,
            timestamp: new Date().toISOString(),
            message: this.config.environment === 'development' ? message : 'Internal server error',
          });
        }
      }
    });

    this.app.use('*', (req: Request, res: Response) => {
      res.status(404).json({
        error: 'Endpoint not found',
        path: req.originalUrl,
        availableEndpoints: ['/', '/health', '/mcp'],
      });
    });

    this.app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
      this.errorHandler.logError('Express server error', err, { path: req.path, method: req.method });
      res.status(500).json({
        error: 'Internal server error',
        details: this.config.environment === 'development' ? err.message : 'Something went wrong',
      });
    });
  }

  async start(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      const httpServer = this.app.listen(this.config.port, this.config.host, () => {
        this.errorHandler.logInfo(`${SERVER_INFO.DISPLAY_NAME} listening`, {
          url: `http://${this.config.host}:${this.config.port}`,
          environment: this.config.environment,
          endpoints: ['/health', '/mcp'],
        });
        resolve();
      });
      httpServer.once('error', reject);
      this.httpServer = httpServer;
    });

    this.setupGracefulShutdown();
  }

  private categorizeError(error: unknown): { type: string; status: number } {
    if (!(error instanceof Error)) {
      return ExpressServer.DEFAULT_ERROR;
    }
    for (const { pattern, type, status } of ExpressServer.ERROR_PATTERNS) {
      if (pattern.test(error.message)) {
        return { type, status };
      }
    }
    return ExpressServer.DEFAULT_ERROR;
  }

  private setupGracefulShutdown(): void {
    const shutdownHandler = () => {
      this.stop()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          this.errorHandler.logError('Error during shutdown', error);
          process.exit(1);
        });
    };

    process.once('SIGTERM', shutdownHandler);
    process.once('SIGINT', shutdownHandler);
  }

  /**
   * Stop accepting tool calls and close the listener
   */
  async stop(): Promise<void> {
    this.mcpServer.beginShutdown();
    const httpServer = this.httpServer;
    this.httpServer = undefined;
    if (!httpServer) return;

    await new Promise<void>((resolve, reject) => {
      httpServer.close(error => (error ? reject(error) : resolve()));
    });
    this.errorHandler.logInfo('HTTP server stopped', { mcpRequests: this.requestCount });
  }
}
