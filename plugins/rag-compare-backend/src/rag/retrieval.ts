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
 * Retrieval and generation steps shared by the strategies
 *
 * @packageDocumentation
 */

import { ILLMService, IVectorStore } from '../interfaces';
import { ChatMessage, KnowledgeChunk } from '../models';

export const ANSWER_SYSTEM_PROMPT = `You are an assistant for question-answering tasks about machine learning.
Use the following pieces of retrieved context to answer the question.
If the answer cannot be found in the context, say that you don't know.
Keep the answer concise.`;

/**
 * Embed the query and return the `topK` nearest chunks
 */
export async function retrieveChunks(
  llmService: ILLMService,
  vectorStore: IVectorStore,
  query: string,
  topK: number
): Promise<KnowledgeChunk[]> {
  const [queryVector] = await llmService.generateEmbeddings([query]);
  const results = await vectorStore.search(queryVector, topK);
  return results.map(result => result.chunk);
}

export function buildContextString(chunks: KnowledgeChunk[]): string {
  if (chunks.length === 0) {
    return 'No relevant context found.';
  }

  return chunks
    .map((chunk, index) => `[${index + 1}] ${chunk.title} (${chunk.metadata.source})\n${chunk.content}`)
    .join('\n\n---\n\n');
}

/**
 * Answer from the given context, or straight from the model when there is none
 */
export async function generateAnswer(
  llmService: ILLMService,
  query: string,
  chunks: KnowledgeChunk[],
  model: string
): Promise<string> {
  const messages: ChatMessage[] =
    chunks.length === 0
      ? [{ role: 'user', content: query }]
      : [
          {
            role: 'system',
            content: `${ANSWER_SYSTEM_PROMPT}\n\nContext:\n${buildContextString(chunks)}`,
          },
          { role: 'user', content: query },
        ];

  return llmService.chat(messages, { model });
}
