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
 * Scripted LLM and seeded store for strategy tests
 */

import { ConfigReader } from '@backstage/config';
import { ILLMService } from '../../interfaces';
import { createRootLogger } from '../../logging/createRootLogger';
import { ChatMessage, ChatOptions, KnowledgeChunk } from '../../models';
import { ConfigService } from '../../services/ConfigService';
import { InMemoryVectorStore } from '../../services/InMemoryVectorStore';

export type PromptKind = 'relevance' | 'grounding' | 'usefulness' | 'rewrite' | 'route' | 'answer';

export interface RecordedChat {
  kind: PromptKind;
  messages: ChatMessage[];
  options?: ChatOptions;
}

/**
 * Reply for the `count`-th call (zero based) of one prompt kind. `user`
 * is the content of the last message.
 */
export type ScriptedReply = (user: string, count: number) => string;

export const testLogger = createRootLogger({ silent: true });

const DEFAULT_REPLIES: Record<PromptKind, ScriptedReply> = {
  relevance: () => '{"score": "yes"}',
  grounding: () => '{"score": "yes"}',
  usefulness: () => '{"score": "yes"}',
  rewrite: () => 'rewritten question',
  route: () => '{"datasource": "vectorstore"}',
  answer: () => 'generated answer',
};

export function classifyPrompt(messages: ChatMessage[]): PromptKind {
  const system = messages.find(message => message.role === 'system')?.content ?? '';
  if (system.includes('retrieved document is relevant')) {
    return 'relevance';
  }
  if (system.includes('grounded in and supported')) {
    return 'grounding';
  }
  if (system.includes('addresses and resolves')) {
    return 'usefulness';
  }
  if (system.includes('You rewrite questions')) {
    return 'rewrite';
  }
  if (system.includes('You route user questions')) {
    return 'route';
  }
  return 'answer';
}

/**
 * Embeds by keyword so retrieval is predictable: gradient questions land
 * on gradient chunks, tree questions on tree chunks.
 */
export function keywordEmbedding(text: string): number[] {
  const lower = text.toLowerCase();
  return [lower.includes('gradient') ? 1 : 0, lower.includes('tree') ? 1 : 0, 0.1];
}

export class ScriptedLLM implements ILLMService {
  readonly chats: RecordedChat[] = [];
  readonly embedded: string[] = [];
  private readonly replies: Record<PromptKind, ScriptedReply>;

  constructor(replies: Partial<Record<PromptKind, ScriptedReply>> = {}) {
    this.replies = { ...DEFAULT_REPLIES, ...replies };
  }

  async chat(messages: ChatMessage[], options?: ChatOptions): Promise<string> {
    const kind = classifyPrompt(messages);
    const count = this.kinds().filter(seen => seen === kind).length;
    this.chats.push({ kind, messages, options });
    return this.replies[kind](messages[messages.length - 1]?.content ?? '', count);
  }

  async generateEmbeddings(inputs: string[]): Promise<number[][]> {
    this.embedded.push(...inputs);
    return inputs.map(keywordEmbedding);
  }

  kinds(): PromptKind[] {
    return this.chats.map(chat => chat.kind);
  }

  callsOf(kind: PromptKind): RecordedChat[] {
    return this.chats.filter(chat => chat.kind === kind);
  }
}

export const gradientChunk: KnowledgeChunk = {
  id: 'row-0-1',
  documentId: 'row-0',
  title: 'What is gradient descent?',
  content: 'Gradient descent steps against the gradient of the loss.',
  metadata: { source: 'answer', rowIndex: 0, chunkIndex: 1, totalChunks: 2 },
};

export const treeChunk: KnowledgeChunk = {
  id: 'row-1-1',
  documentId: 'row-1',
  title: 'What is a decision tree?',
  content: 'A decision tree splits the data on feature thresholds.',
  metadata: { source: 'answer', rowIndex: 1, chunkIndex: 1, totalChunks: 2 },
};

export async function seededStore(chunks: KnowledgeChunk[] = [gradientChunk, treeChunk]): Promise<InMemoryVectorStore> {
  const store = new InMemoryVectorStore(testLogger);
  await store.storeBatch(
    chunks.map(chunk => ({ id: chunk.id, chunkId: chunk.id, vector: keywordEmbedding(chunk.content), chunk }))
  );
  return store;
}

type ConfigData = NonNullable<ConstructorParameters<typeof ConfigReader>[0]>;

export function testConfig(overrides: ConfigData = {}): ConfigService {
  return new ConfigService(new ConfigReader({ ragCompare: { defaultTopK: 1, ...overrides } }));
}
