import type { AnalysisMode, TransportMode } from '../config.js';

export interface CliArgs {
  showHelp: boolean;
  showVersion: boolean;
  transport?: TransportMode;
  analysisMode?: AnalysisMode;
}

const TRANSPORT_OPTIONS: readonly TransportMode[] = ['stdio', 'http', 'both'];
const ANALYSIS_MODE_OPTIONS: readonly AnalysisMode[] = ['auto', 'heuristic'];

const parseChoice = <T extends string>(flag: string, value: string, options: readonly T[]): T => {
  const normalized = value.trim().toLowerCase();
  const match = options.find((option) => option === normalized);

  if (!match) {
    throw new Error(`Invalid ${flag} "${value}". Expected one of: ${options.join(', ')}.`);
  }

  return match;
};

/**
 * Reads the value of `--flag value` or `--flag=value` starting at `index`.
 * Returns null when `argv[index]` is not the flag, otherwise the value and how many entries it used.
 */
const readOptionValue = (argv: string[], index: number, flag: string): { value: string; consumed: number } | null => {
  const arg = argv[index]?.trim() ?? '';

  if (arg === flag) {
    const nextValue = argv[index + 1];
    if (!nextValue) {
      throw new Error(`Missing value after ${flag}.`);
    }

    return { value: nextValue, consumed: 2 };
  }

  if (arg.startsWith(`${flag}=`)) {
    return { value: arg.slice(flag.length + 1), consumed: 1 };
  }

  return null;
};

export const CLI_USAGE = `PaperLens document analysis MCP server

Usage:
  paperlens-mcp [--transport <stdio|http|both>] [--analysis-mode <auto|heuristic>]
  paperlens-mcp --help
  paperlens-mcp --version

Options:
  --transport <mode>       Override PAPERLENS_TRANSPORT for this run
  --analysis-mode <mode>   Override ANALYSIS_MODE (heuristic disables embedding and completion calls)
  -h, --help               Show help
  -v, --version            Print package version`;

export const parseCliArgs = (argv: string[]): CliArgs => {
  const args: CliArgs = {
    showHelp: false,
    showVersion: false
  };

  let index = 0;
  while (index < argv.length) {
    const arg = argv[index]?.trim();

    if (!arg) {
      index += 1;
      continue;
    }

    if (arg === '-h' || arg === '--help') {
      args.showHelp = true;
      index += 1;
      continue;
    }

    if (arg === '-v' || arg === '--version') {
      args.showVersion = true;
      index += 1;
      continue;
    }

    const transport = readOptionValue(argv, index, '--transport');
    if (transport) {
      args.transport = parseChoice('transport', transport.value, TRANSPORT_OPTIONS);
      index += transport.consumed;
      continue;
    }

    const analysisMode = readOptionValue(argv, index, '--analysis-mode');
    if (analysisMode) {
      args.analysisMode = parseChoice('analysis mode', analysisMode.value, ANALYSIS_MODE_OPTIONS);
      index += analysisMode.consumed;
      continue;
    }

    throw new Error(`Unknown argument "${arg}".`);
  }

  return args;
};
