import type { z } from 'zod';
import type { Config } from '../config.ts';
import { askQuestion as composeAndAsk } from '../core/composer.ts';
import type { LlmCollaborator } from '../core/llm.ts';
import type { ChatSession } from '../core/session.ts';
import { parseCsv } from '../core/table.ts';
import {
  AskQuestionSchema,
  DescribeDatasetSchema,
  LoadCsvSchema,
} from '../schemas/csv-chat.schema.ts';
import { ValidationError } from '../utils/errors.ts';
import { logger } from '../utils/logger.ts';
import type { ToolResult } from '../utils/tool-handler.ts';

/** Everything a tool call needs, owned by the MCP session that made it. */
export interface CsvChatContext {
  session: ChatSession;
  config: Readonly<Config>;
  llm: LlmCollaborator | undefined;
}

function textResult(text: string): ToolResult {
  return { content: [{ type: 'text', text }] };
}

function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(`Invalid input: ${result.error.issues.map((i) => i.message).join('; ')}`);
  }
  return result.data;
}

export async function loadCsv(input: unknown, ctx: CsvChatContext): Promise<ToolResult> {
  const { csv, filename } = parseInput(LoadCsvSchema, input);
  const source = filename ?? 'inline.csv';

  const dataset = ctx.session.loadTable(parseCsv(csv), source);
  const { rowCount, columnCount } = dataset.profile;

  return textResult(
    `Loaded "${source}": ${rowCount} rows, ${columnCount} columns.\n\n${dataset.profileText}`,
  );
}

export async function describeDataset(input: unknown, ctx: CsvChatContext): Promise<ToolResult> {
  const { include_statistics } = parseInput(DescribeDatasetSchema, input);
  return textResult(ctx.session.describe(include_statistics ?? true));
}

export async function askQuestion(input: unknown, ctx: CsvChatContext): Promise<ToolResult> {
  const { question } = parseInput(AskQuestionSchema, input);
  const { config } = ctx;

  const answer = await composeAndAsk(ctx.session, question, {
    instructions: config.systemPrompt,
    replay: config.replayPolicy,
    model: config.llmModel,
    temperature: config.llmTemperature,
    timeoutMs: config.llmTimeoutMs,
    llm: ctx.llm,
  });

  return textResult(answer);
}

export async function getHistory(ctx: CsvChatContext): Promise<ToolResult> {
  const exchanges = ctx.session.history.snapshot();
  if (exchanges.length === 0) {
    return textResult('No questions asked yet.');
  }

  const rendered = exchanges
    .map((exchange) => `**You:** ${exchange.question}\n**Assistant:** ${exchange.answer}`)
    .join('\n\n---\n\n');
  return textResult(`# Conversation History (${exchanges.length})\n\n${rendered}`);
}

export async function clearHistory(ctx: CsvChatContext): Promise<ToolResult> {
  const removed = ctx.session.history.size;
  ctx.session.history.clear();
  logger.info({ removed }, 'Conversation history cleared');
  return textResult('Conversation history cleared.');
}
