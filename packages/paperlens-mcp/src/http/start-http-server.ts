import { serve } from '@hono/node-server';
import { WebStandardStreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/webStandardStreamableHttp.js';
import { Hono } from 'hono';
import type { AppConfig } from '../config.js';
import { describeError, type Logger } from '../core/logger.js';
import { createPaperLensMcpServer, type PaperLensServices } from '../mcp/create-paperlens-mcp-server.js';

const LOCAL_HOSTS = new Set(['127.0.0.1', 'localhost', '::1']);

const INTERNAL_ERROR_BODY = {
  jsonrpc: '2.0',
  error: {
    code: -32603,
    message: 'Internal server error'
  },
  id: null
};

const normalizeHostHeader = (hostHeader: string): { full: string; hostname: string } => {
  const normalized = hostHeader.trim().toLowerCase();
  const withoutPort = normalized.startsWith('[')
    ? normalized.replace(/^\[([^\]]+)\](?::\d+)?$/, '$1')
    : normalized.replace(/:\d+$/, '');

  return {
    full: normalized,
    hostname: withoutPort
  };
};

const isLoopbackOrigin = (origin: string): boolean => {
  if (!URL.canParse(origin)) {
    return false;
  }

  return LOCAL_HOSTS.has(new URL(origin).hostname.toLowerCase());
};

export const isHostAllowed = (hostHeader: string, config: AppConfig): boolean => {
  if (!hostHeader) {
    return false;
  }

  const host = normalizeHostHeader(hostHeader);

  if (config.allowedHosts.length > 0) {
    return config.allowedHosts.includes(host.full) || config.allowedHosts.includes(host.hostname);
  }

  if (LOCAL_HOSTS.has(config.host.toLowerCase())) {
    return LOCAL_HOSTS.has(host.hostname);
  }

  return true;
};

export const isOriginAllowed = (origin: string | undefined, config: AppConfig): boolean => {
  if (!origin) {
    return true;
  }

  if (config.allowedOrigins.length > 0) {
    return config.allowedOrigins.includes(origin);
  }

  if (LOCAL_HOSTS.has(config.host.toLowerCase())) {
    return isLoopbackOrigin(origin);
  }

  return true;
};

const isAuthorized = (authorization: string | undefined, config: AppConfig): boolean => {
  if (!config.apiKey) {
    return true;
  }

  if (!authorization || !authorization.startsWith('Bearer ')) {
    return false;
  }

  const token = authorization.slice('Bearer '.length).trim();
  return token.length > 0 && token === config.apiKey;
};

const attachCorsHeaders = (response: Response, origin: string | undefined): Response => {
  if (!origin) {
    return response;
  }

  response.headers.set('Access-Control-Allow-Origin', origin);
  response.headers.set('Access-Control-Allow-Methods', 'GET,POST,DELETE,OPTIONS');
  response.headers.set('Access-Control-Allow-Headers', 'Content-Type, Authorization, MCP-Protocol-Version');
  response.headers.set('Access-Control-Expose-Headers', 'MCP-Protocol-Version');
  response.headers.set('Vary', 'Origin');
  return response;
};

/**
 * Stateless streamable-HTTP endpoint: every request gets its own MCP server and transport,
 * closed once the response is produced.
 */
export const createHttpApp = (config: AppConfig, services: PaperLensServices, logger: Logger): Hono => {
  const app = new Hono();

  app.onError((error, c) => {
    logger.error('Unhandled HTTP runtime error', {
      error: describeError(error)
    });

    return c.json(INTERNAL_ERROR_BODY, 500);
  });

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.get('/', (c) =>
    c.json({
      name: config.serverName,
      version: config.serverVersion,
      transport: 'streamable-http',
      endpoint: config.endpointPath,
      health: config.healthPath,
      analysisMode: config.analysisMode
    })
  );

  app.get(config.healthPath, (c) =>
    c.json({
      status: 'ok',
      uptimeSeconds: Math.round(process.uptime()),
      serverName: config.serverName,
      serverVersion: config.serverVersion,
      transport: 'http',
      analysisMode: config.analysisMode,
      extractionBackends: services.extractor.backendNames,
      timestamp: new Date().toISOString()
    })
  );

  app.use(config.endpointPath, async (c, next) => {
    const hostHeader = c.req.header('host') ?? '';
    const origin = c.req.header('origin');
    const authorization = c.req.header('authorization');

    if (!isHostAllowed(hostHeader, config)) {
      return attachCorsHeaders(c.json({ error: 'Forbidden host header' }, 403), origin);
    }

    if (!isOriginAllowed(origin, config)) {
      return attachCorsHeaders(c.json({ error: 'Forbidden origin' }, 403), origin);
    }

    if (c.req.method !== 'OPTIONS' && !isAuthorized(authorization, config)) {
      return attachCorsHeaders(c.json({ error: 'Unauthorized' }, 401), origin);
    }

    await next();
  });

  app.options(config.endpointPath, (c) => {
    const origin = c.req.header('origin');
    return attachCorsHeaders(new Response(null, { status: 204 }), origin);
  });

  app.all(config.endpointPath, async (c) => {
    const origin = c.req.header('origin');
    const server = createPaperLensMcpServer(config, services, logger);
    const transport = new WebStandardStreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true
    });

    try {
      await server.connect(transport);
      const response = await transport.handleRequest(c.req.raw);
      return attachCorsHeaders(response, origin);
    } catch (error) {
      logger.error('MCP HTTP request handling failed', {
        error: describeError(error)
      });

      return attachCorsHeaders(Response.json(INTERNAL_ERROR_BODY, { status: 500 }), origin);
    } finally {
      await transport.close().catch((error: unknown) => {
        logger.debug('Failed to close MCP HTTP transport', { error: describeError(error) });
      });
      await server.close().catch((error: unknown) => {
        logger.debug('Failed to close MCP server', { error: describeError(error) });
      });
    }
  });

  return app;
};

export const startHttpServer = (config: AppConfig, services: PaperLensServices, logger: Logger) => {
  const app = createHttpApp(config, services, logger);

  const server = serve(
    {
      fetch: app.fetch,
      port: config.port,
      hostname: config.host
    },
    (info) => {
      logger.info('PaperLens HTTP transport listening', {
        host: config.host,
        port: info.port,
        endpoint: config.endpointPath,
        health: config.healthPath
      });
    }
  );

  const shutdown = (signal: string) => {
    logger.info('Shutting down HTTP transport', { signal });
    server.close();
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  return server;
};
