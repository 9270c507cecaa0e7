#!/usr/bin/env node

import { config as loadDotEnv } from 'dotenv';
import { AnalysisFacade } from './analysis/analysis-facade.js';
import { createCapabilities } from './capabilities/openai-capabilities.js';
import { parseCliArgs, CLI_USAGE } from './cli/args.js';
import { parseConfig, type ConfigOverrides } from './config.js';
import { describeError, Logger } from './core/logger.js';
import { TextExtractor } from './extraction/text-extractor.js';
import { startHttpServer } from './http/start-http-server.js';
import type { PaperLensServices } from './mcp/create-paperlens-mcp-server.js';
import { startStdioServer } from './mcp/start-stdio-server.js';
import { getPackageVersion } from './version.js';

loadDotEnv({ quiet: true });

const printStdout = (message: string): void => {
  process.stdout.write(`${message}\n`);
};

const printStderr = (message: string): void => {
  process.stderr.write(`${message}\n`);
};

const run = async (): Promise<void> => {
  const cli = parseCliArgs(process.argv.slice(2));

  if (cli.showHelp) {
    printStdout(CLI_USAGE);
    return;
  }

  if (cli.showVersion) {
    printStdout(getPackageVersion());
    return;
  }

  const overrides: ConfigOverrides = {
    ...(cli.transport ? { PAPERLENS_TRANSPORT: cli.transport } : {}),
    ...(cli.analysisMode ? { ANALYSIS_MODE: cli.analysisMode } : {})
  };
  const config = parseConfig(overrides);

  const logger = new Logger(config.logLevel);
  const services: PaperLensServices = {
    extractor: TextExtractor.fromConfig(config, logger),
    analysis: AnalysisFacade.fromConfig(config, logger, createCapabilities(config, logger))
  };

  switch (config.transport) {
    case 'stdio': {
      await startStdioServer(config, services, logger);
      return;
    }
    case 'http': {
      startHttpServer(config, services, logger);
      return;
    }
    case 'both': {
      startHttpServer(config, services, logger);
      await startStdioServer(config, services, logger);
      return;
    }
    default: {
      throw new Error(`Unsupported transport mode: ${String(config.transport)}`);
    }
  }
};

run().catch((error) => {
  const message = describeError(error);
  printStderr(`PaperLens failed to start: ${message}`);
  if (error instanceof Error && error.stack) {
    printStderr(error.stack);
  }
  if (message.includes('Unknown argument') || message.includes('Invalid ') || message.includes('Missing value')) {
    printStderr('');
    printStderr(CLI_USAGE);
  }
  process.exitCode = 1;
});
