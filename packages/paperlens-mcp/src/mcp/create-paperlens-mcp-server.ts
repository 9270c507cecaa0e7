import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { AnalysisFacade } from '../analysis/analysis-facade.js';
import { DEFAULT_FLASHCARD_COUNT, MAX_FLASHCARD_COUNT } from '../analysis/flashcard-generator.js';
import { DEFAULT_MAX_TERMS } from '../analysis/glossary-extractor.js';
import { countWords } from '../analysis/text-utils.js';
import type { AnalysisRecord } from '../analysis/types.js';
import type { AppConfig } from '../config.js';
import { PaperLensError, SourceAccessError } from '../core/errors.js';
import { describeError, type Logger } from '../core/logger.js';
import type { TextExtractor } from '../extraction/text-extractor.js';
import { normalizeText } from '../extraction/text-normalizer.js';

export interface PaperLensServices {
  extractor: TextExtractor;
  analysis: AnalysisFacade;
}

interface DocumentSource {
  text?: string;
  local_path?: string;
}

const documentSourceShape = {
  text: z.string().min(1).optional().describe('Extracted plain text of the document.'),
  local_path: z
    .string()
    .min(1)
    .optional()
    .describe('Absolute or workspace-relative path to a PDF or plain-text file. Used when text is omitted.')
};

const toStructuredContent = (payload: object): Record<string, unknown> => Object.fromEntries(Object.entries(payload));

const toToolResult = (payload: object): CallToolResult => ({
  content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
  structuredContent: toStructuredContent(payload)
});

/** Analysis records with a populated `error` are still returned whole, but flagged as errors. */
const toAnalysisResult = (record: AnalysisRecord): CallToolResult => ({
  ...toToolResult(record),
  ...(record.error ? { isError: true } : {})
});

const toToolError = (error: unknown): CallToolResult => {
  const fallbackMessage = 'Unknown PaperLens error.';

  if (error instanceof PaperLensError) {
    return {
      isError: true,
      content: [{ type: 'text', text: error.message }],
      structuredContent: {
        error: error.name,
        message: error.message,
        details: error.details
      }
    };
  }

  if (error instanceof Error) {
    return {
      isError: true,
      content: [{ type: 'text', text: error.message }],
      structuredContent: {
        error: error.name,
        message: error.message
      }
    };
  }

  return {
    isError: true,
    content: [{ type: 'text', text: fallbackMessage }],
    structuredContent: {
      error: 'UnknownError',
      message: fallbackMessage
    }
  };
};

export const createPaperLensMcpServer = (config: AppConfig, services: PaperLensServices, logger: Logger): McpServer => {
  const { extractor, analysis } = services;

  const extractLocalDocument = async (localPath: string) => {
    if (!config.extractionAllowLocalFiles) {
      throw new SourceAccessError('Reading local files is disabled (EXTRACTION_ALLOW_LOCAL_FILES=false).', {
        localPath
      });
    }

    return extractor.extract({ kind: 'file', path: localPath });
  };

  const resolveText = async (source: DocumentSource): Promise<string> => {
    if (source.text !== undefined) {
      return normalizeText(source.text);
    }

    if (source.local_path !== undefined) {
      const document = await extractLocalDocument(source.local_path);
      return document.text;
    }

    throw new PaperLensError('Provide either text or local_path.');
  };

  const server = new McpServer(
    {
      name: config.serverName,
      version: config.serverVersion,
      title: 'PaperLens',
      description: 'Scholarly document analysis exposed over MCP'
    },
    {
      capabilities: {
        logging: {}
      }
    }
  );

  const runTool = async (tool: string, task: () => Promise<CallToolResult>): Promise<CallToolResult> => {
    try {
      return await task();
    } catch (error) {
      logger.warn('Analysis tool failed', {
        tool,
        error: describeError(error)
      });
      return toToolError(error);
    }
  };

  const analysisAnnotations = {
    readOnlyHint: true,
    openWorldHint: false
  };

  server.registerTool(
    'extract_document_text',
    {
      title: 'Extract Document Text',
      description:
        'Extract canonical plain text from a local PDF or text file, trying GROBID (when configured), the PDF text layer, then plain text.',
      annotations: analysisAnnotations,
      inputSchema: {
        local_path: z.string().min(1).describe('Absolute or workspace-relative path to a PDF or plain-text file.'),
        max_chars: z
          .number()
          .int()
          .min(100)
          .optional()
          .describe('Optional cap on the number of text characters returned.')
      }
    },
    async ({ local_path, max_chars }): Promise<CallToolResult> => {
      try {
        const document = await extractLocalDocument(local_path);
        const truncated = max_chars !== undefined && document.text.length > max_chars;

        return toToolResult({
          title: document.title,
          metadata: document.metadata,
          backend: document.backend,
          wordCount: countWords(document.text),
          characterCount: document.text.length,
          truncated,
          text: truncated ? document.text.slice(0, max_chars) : document.text,
          attempts: document.attempts
        });
      } catch (error) {
        logger.warn('Document extraction failed', {
          tool: 'extract_document_text',
          local_path,
          error: describeError(error)
        });
        return toToolError(error);
      }
    }
  );

  server.registerTool(
    'analyze_citations',
    {
      title: 'Analyze Citations',
      description: 'Count citation mentions, publication years and frequently cited authors, and summarize the citation network.',
      annotations: analysisAnnotations,
      inputSchema: documentSourceShape
    },
    async (args): Promise<CallToolResult> =>
      runTool('analyze_citations', async () => toAnalysisResult(await analysis.analyzeCitations(await resolveText(args))))
  );

  server.registerTool(
    'analyze_methodology',
    {
      title: 'Analyze Methodology',
      description: 'Classify the research design and list the methods and named techniques the document uses.',
      annotations: analysisAnnotations,
      inputSchema: documentSourceShape
    },
    async (args): Promise<CallToolResult> =>
      runTool('analyze_methodology', async () => toAnalysisResult(await analysis.analyzeMethodology(await resolveText(args))))
  );

  server.registerTool(
    'search_document',
    {
      title: 'Search Document',
      description: 'Rank passages of the document against a query (dense embeddings when available, keyword overlap otherwise).',
      annotations: analysisAnnotations,
      inputSchema: {
        query: z.string().min(1).describe('What to look for in the document.'),
        ...documentSourceShape
      }
    },
    async (args): Promise<CallToolResult> =>
      runTool('search_document', async () => toAnalysisResult(await analysis.search(args.query, await resolveText(args))))
  );

  server.registerTool(
    'build_concept_map',
    {
      title: 'Build Concept Map',
      description: 'Extract up to 20 key concepts and link those that appear in the same sentence.',
      annotations: analysisAnnotations,
      inputSchema: documentSourceShape
    },
    async (args): Promise<CallToolResult> =>
      runTool('build_concept_map', async () => toAnalysisResult(await analysis.buildConceptMap(await resolveText(args))))
  );

  server.registerTool(
    'identify_research_gaps',
    {
      title: 'Identify Research Gaps',
      description: 'Find limitation and future-work statements and categorize the research gaps they describe.',
      annotations: analysisAnnotations,
      inputSchema: documentSourceShape
    },
    async (args): Promise<CallToolResult> =>
      runTool('identify_research_gaps', async () => toAnalysisResult(await analysis.identifyGaps(await resolveText(args))))
  );

  server.registerTool(
    'extract_glossary',
    {
      title: 'Extract Glossary',
      description: 'List technical terms used in the document with short definitions.',
      annotations: analysisAnnotations,
      inputSchema: {
        max_terms: z.number().int().min(1).max(50).default(DEFAULT_MAX_TERMS).describe('Maximum number of terms.'),
        ...documentSourceShape
      }
    },
    async (args): Promise<CallToolResult> =>
      runTool('extract_glossary', async () => toAnalysisResult(await analysis.extractGlossary(await resolveText(args), args.max_terms)))
  );

  server.registerTool(
    'summarize_document',
    {
      title: 'Summarize Document',
      description: 'Produce a short and a detailed summary of the document.',
      annotations: analysisAnnotations,
      inputSchema: documentSourceShape
    },
    async (args): Promise<CallToolResult> =>
      runTool('summarize_document', async () => toAnalysisResult(await analysis.summarize(await resolveText(args))))
  );

  server.registerTool(
    'generate_flashcards',
    {
      title: 'Generate Flashcards',
      description: 'Write question and answer study cards from the definitions and limitations in the document.',
      annotations: analysisAnnotations,
      inputSchema: {
        num_cards: z
          .number()
          .int()
          .min(1)
          .max(MAX_FLASHCARD_COUNT)
          .default(DEFAULT_FLASHCARD_COUNT)
          .describe('Maximum number of cards.'),
        ...documentSourceShape
      }
    },
    async (args): Promise<CallToolResult> =>
      runTool('generate_flashcards', async () =>
        toAnalysisResult(await analysis.generateFlashcards(await resolveText(args), args.num_cards))
      )
  );

  server.registerTool(
    'compare_documents',
    {
      title: 'Compare Documents',
      description: 'Compare two or three documents by research design, techniques and shared concepts.',
      annotations: analysisAnnotations,
      inputSchema: {
        documents: z
          .array(
            z.object({
              label: z.string().min(1).describe('Name shown for this document in the comparison.'),
              ...documentSourceShape
            })
          )
          .min(2)
          .max(3)
      }
    },
    async ({ documents }): Promise<CallToolResult> =>
      runTool('compare_documents', async () => {
        const inputs = await Promise.all(
          documents.map(async (document) => ({ label: document.label, text: await resolveText(document) }))
        );
        return toAnalysisResult(await analysis.compareDocuments(inputs));
      })
  );

  server.registerTool(
    'analyze_document',
    {
      title: 'Analyze Document',
      description: 'Run every analysis over one document concurrently and return the combined report.',
      annotations: analysisAnnotations,
      inputSchema: {
        query: z.string().min(1).optional().describe('Optional search query to include a ranked passage list.'),
        ...documentSourceShape
      }
    },
    async (args): Promise<CallToolResult> =>
      runTool('analyze_document', async () => toAnalysisResult(await analysis.analyzeDocument(await resolveText(args), args.query)))
  );

  return server;
};
