/*
 * Copyright (C) 2025-2026 flickleafy
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU General Public License for more details.
 *
 * You should have received a copy of the GNU General Public License
 * along with this program. If not, see <https://www.gnu.org/licenses/>.
 */

/**
 * LLM-backed judgements used by the corrective, self-reflective and
 * adaptive strategies
 *
 * @packageDocumentation
 */

import { ILLMService } from '../interfaces';
import { ChatOptions, KnowledgeChunk } from '../models';
import { buildContextString } from './retrieval';
import { QuestionRoute } from './types';

const BINARY_SCORE_INSTRUCTIONS =
  'Respond with a JSON object of the form {"score": "yes"} or {"score": "no"} and nothing else.';

function graderOptions(model: string): ChatOptions {
  return { model, temperature: 0, format: 'json' };
}

function readJsonField(output: string, field: string): string | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(output);
  } catch {
    return undefined;
  }

  if (typeof parsed !== 'object' || parsed === null) {
    return undefined;
  }

  const value: unknown = Reflect.get(parsed, field);
  return typeof value === 'string' ? value : undefined;
}

/**
 * Read a yes/no verdict, either as `{"score": "yes"}` or as plain text
 * starting with "yes".
 */
export function parseBinaryScore(output: string): boolean {
  const score = readJsonField(output, 'score') ?? output;
  return /^\s*"?yes\b/i.test(score);
}

async function askBinary(llmService: ILLMService, system: string, user: string, model: string): Promise<boolean> {
  const output = await llmService.chat(
    [
      { role: 'system', content: `${system}\n${BINARY_SCORE_INSTRUCTIONS}` },
      { role: 'user', content: user },
    ],
    graderOptions(model)
  );
  return parseBinaryScore(output);
}

export function gradeChunkRelevance(
  llmService: ILLMService,
  question: string,
  chunk: KnowledgeChunk,
  model: string
): Promise<boolean> {
  return askBinary(
    llmService,
    'You grade whether a retrieved document is relevant to a user question. ' +
      'If the document contains keywords or meaning related to the question, grade it as relevant.',
    `Retrieved document:\n${chunk.content}\n\nUser question: ${question}`,
    model
  );
}

export function gradeGrounding(
  llmService: ILLMService,
  chunks: KnowledgeChunk[],
  generation: string,
  model: string
): Promise<boolean> {
  return askBinary(
    llmService,
    'You grade whether an answer is grounded in and supported by a set of facts.',
    `Facts:\n${buildContextString(chunks)}\n\nAnswer: ${generation}`,
    model
  );
}

export function gradeAnswerUsefulness(
  llmService: ILLMService,
  question: string,
  generation: string,
  model: string
): Promise<boolean> {
  return askBinary(
    llmService,
    'You grade whether an answer addresses and resolves a question.',
    `Question: ${question}\n\nAnswer: ${generation}`,
    model
  );
}

/**
 * Rephrase a question for better vector retrieval. Falls back to the
 * original question when the model returns nothing.
 */
export async function rewriteQuestion(llmService: ILLMService, question: string, model: string): Promise<string> {
  const output = await llmService.chat(
    [
      {
        role: 'system',
        content:
          'You rewrite questions into a better version optimized for vector store retrieval. ' +
          'Reply with the improved question only.',
      },
      { role: 'user', content: question },
    ],
    { model, temperature: 0 }
  );

  const rewritten = output.trim();
  return rewritten.length > 0 ? rewritten : question;
}

/**
 * Decide whether a question needs the knowledge index or can be answered
 * directly by the model.
 */
export async function routeQuestion(llmService: ILLMService, question: string, model: string): Promise<QuestionRoute> {
  const output = await llmService.chat(
    [
      {
        role: 'system',
        content:
          'You route user questions. The vector store holds question and answer pairs about ' +
          'machine learning concepts. Use "vectorstore" for questions on those topics and "direct" otherwise. ' +
          'Respond with a JSON object of the form {"datasource": "vectorstore"} or {"datasource": "direct"}.',
      },
      { role: 'user', content: question },
    ],
    graderOptions(model)
  );

  const datasource = (readJsonField(output, 'datasource') ?? output).trim().toLowerCase();
  return datasource.startsWith('direct') ? 'direct' : 'vectorstore';
}

/**
 * Keep the chunks the model judges relevant, in retrieval order
 */
export async function filterRelevantChunks(
  llmService: ILLMService,
  question: string,
  chunks: KnowledgeChunk[],
  model: string
): Promise<KnowledgeChunk[]> {
  const relevant: KnowledgeChunk[] = [];
  for (const chunk of chunks) {
    if (await gradeChunkRelevance(llmService, question, chunk, model)) {
      relevant.push(chunk);
    }
  }
  return relevant;
}
