/**
 * CSV Chat MCP Server
 *
 * Lets a client load a CSV dataset, inspect its profile and ask questions about
 * it that are answered by a chat-completion model. Every MCP session owns its
 * own dataset and conversation history.
 * Uses streamable-http transport.
 */

import 'dotenv/config';
import { randomUUID } from 'node:crypto';
import { fileURLToPath } from 'node:url';
import express from 'express';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { loadConfig, SERVER_NAME, SERVER_VERSION, type Config } from './config.ts';
import type { LlmCollaborator } from './core/llm.ts';
import { ChatSession } from './core/session.ts';
import { CSV_CHAT_USAGE_PROMPT } from './prompts/csv-chat-usage.ts';
import { AskQuestionSchema, DescribeDatasetSchema, LoadCsvSchema } from './schemas/csv-chat.schema.ts';
import { OpenRouterChatClient } from './services/openrouter.ts';
import {
  askQuestion,
  clearHistory,
  describeDataset,
  getHistory,
  loadCsv,
  type CsvChatContext,
} from './tools/csv-chat.ts';
import { setupGracefulShutdown, setupMcpEndpoints } from './utils/http-server.ts';
import { logger } from './utils/logger.ts';
import { withToolErrorHandler } from './utils/tool-handler.ts';
import { setupUploadRoutes } from './upload/upload-routes.ts';

const TOOL_NAMES = ['load_csv', 'describe_dataset', 'ask_question', 'get_history', 'clear_history'];

export interface ServerDependencies {
  config: Readonly<Config>;
  /** Undefined when no API key is configured; ask_question then reports a configuration error. */
  llm: LlmCollaborator | undefined;
}

/**
 * Creates an MCP server bound to one chat session
 */
export function createMcpServer(session: ChatSession, deps: ServerDependencies): McpServer {
  const ctx: CsvChatContext = { session, config: deps.config, llm: deps.llm };

  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
        resources: {},
        prompts: {},
      },
      instructions: `You have access to a CSV analysis server backed by a language model.

Usage:
- Load the data first with load_csv (or the HTTP upload route), then ask questions with ask_question
- Use describe_dataset to see column names, types, the first rows and summary statistics
- Answers only use the loaded data; loading a new file replaces the dataset but keeps the conversation
- Use clear_history to start a fresh conversation`,
    },
  );

  server.registerTool(
    'load_csv',
    {
      description: 'Load CSV text as the dataset for this session. Replaces any previously loaded dataset and returns its profile.',
      inputSchema: LoadCsvSchema.shape,
    },
    withToolErrorHandler('load_csv', (args: unknown) => loadCsv(args, ctx)),
  );

  server.registerTool(
    'describe_dataset',
    {
      description: 'Show the profile of the loaded dataset: shape, column names and types, the first rows, and summary statistics.',
      inputSchema: DescribeDatasetSchema.shape,
    },
    withToolErrorHandler('describe_dataset', (args: unknown) => describeDataset(args, ctx)),
  );

  server.registerTool(
    'ask_question',
    {
      description: 'Ask a natural-language question about the loaded dataset. The answer is added to the conversation history.',
      inputSchema: AskQuestionSchema.shape,
    },
    withToolErrorHandler('ask_question', (args: unknown) => askQuestion(args, ctx)),
  );

  server.registerTool(
    'get_history',
    {
      description: 'List the questions and answers of this session in the order they were asked.',
      inputSchema: {},
    },
    withToolErrorHandler('get_history', () => getHistory(ctx)),
  );

  server.registerTool(
    'clear_history',
    {
      description: 'Forget all earlier questions and answers of this session. The dataset stays loaded.',
      inputSchema: {},
    },
    withToolErrorHandler('clear_history', () => clearHistory(ctx)),
  );

  server.registerResource(
    'info',
    'csv-chat://info',
    {
      description: 'Information about the CSV chat MCP server',
      mimeType: 'application/json',
    },
    async () => ({
      contents: [
        {
          uri: 'csv-chat://info',
          mimeType: 'application/json',
          text: JSON.stringify(
            {
              name: SERVER_NAME,
              version: SERVER_VERSION,
              description: 'MCP Server answering questions about an uploaded CSV dataset',
              tools: TOOL_NAMES,
              model: deps.config.llmModel,
              replayPolicy: deps.config.replayPolicy,
              historyCapacity: session.history.capacity,
              dataset: session.dataset
                ? {
                    source: session.dataset.source,
                    rows: session.dataset.profile.rowCount,
                    columns: session.dataset.profile.columnCount,
                    loadedAt: session.dataset.loadedAt,
                  }
                : null,
              uptime: process.uptime(),
              nodeVersion: process.version,
            },
            null,
            2,
          ),
        },
      ],
    }),
  );

  server.registerPrompt(
    CSV_CHAT_USAGE_PROMPT.name,
    { description: CSV_CHAT_USAGE_PROMPT.description },
    async () => ({
      messages: [
        {
          role: 'user' as const,
          content: {
            type: 'text' as const,
            text: CSV_CHAT_USAGE_PROMPT.content,
          },
        },
      ],
    }),
  );

  return server;
}

/**
 * Creates the Express application with the MCP endpoints and the upload route
 */
export function createApp(deps: ServerDependencies): {
  app: express.Application;
  transports: Map<string, StreamableHTTPServerTransport>;
  sessions: Map<string, ChatSession>;
} {
  const transports = new Map<string, StreamableHTTPServerTransport>();
  const sessions = new Map<string, ChatSession>();

  const createSession = () => {
    const chatSession = new ChatSession({
      historyCapacity: deps.config.historyMaxExchanges,
      headRows: deps.config.profileHeadRows,
    });
    const server = createMcpServer(chatSession, deps);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      enableJsonResponse: true,
      onsessioninitialized: (sessionId: string) => {
        logger.info({ sessionId, totalSessions: transports.size + 1 }, 'Session initialized');
        transports.set(sessionId, transport);
        sessions.set(sessionId, chatSession);
      },
    });

    server.server.onclose = () => {
      const sid = transport.sessionId;
      if (sid && transports.has(sid)) {
        logger.info({ sessionId: sid, totalSessions: transports.size - 1 }, 'Session closed');
        transports.delete(sid);
      }
      if (sid) sessions.delete(sid);
    };

    return { server, transport };
  };

  const app = express();
  app.use(express.json({ limit: '10mb' }));
  app.disable('x-powered-by');

  setupMcpEndpoints(app, {
    serverName: SERVER_NAME,
    version: SERVER_VERSION,
    transports,
    createServer: createSession,
    onSessionClosed: (sessionId) => sessions.delete(sessionId),
    logger,
  });
  setupUploadRoutes(app, sessions, { maxFileSizeMb: deps.config.maxUploadMb });

  return { app, transports, sessions };
}

async function main(): Promise<void> {
  const config = loadConfig();

  let llm: LlmCollaborator | undefined;
  if (config.apiKey) {
    llm = new OpenRouterChatClient(config.apiKey, {
      baseUrl: config.llmBaseUrl,
      timeoutMs: config.llmTimeoutMs,
    });
  } else {
    logger.warn('No OPENROUTER_API_KEY or OPENAI_API_KEY set; ask_question will fail until one is configured');
  }

  const { app, transports } = createApp({ config, llm });
  const server = app.listen(config.port, '0.0.0.0', () => {
    logger.info(
      {
        port: config.port,
        server: SERVER_NAME,
        version: SERVER_VERSION,
        model: config.llmModel,
        replay: config.replayPolicy,
      },
      'MCP CSV Chat Server started',
    );
  });

  setupGracefulShutdown(server, transports, logger);
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((error) => {
    logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Failed to start server');
    process.exit(1);
  });
}
