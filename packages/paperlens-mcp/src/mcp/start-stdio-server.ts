import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { AppConfig } from '../config.js';
import type { Logger } from '../core/logger.js';
import { createPaperLensMcpServer, type PaperLensServices } from './create-paperlens-mcp-server.js';

export const startStdioServer = async (config: AppConfig, services: PaperLensServices, logger: Logger): Promise<void> => {
  const server = createPaperLensMcpServer(config, services, logger);
  const transport = new StdioServerTransport();

  await server.connect(transport);
  logger.info('PaperLens stdio transport ready', {
    analysisMode: config.analysisMode,
    extractionBackends: services.extractor.backendNames
  });
};
