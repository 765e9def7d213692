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
 * Document processor for chunking dataset rows
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { IConfigService, IDocumentProcessor } from '../interfaces';
import { ChunkSource, DatasetRow, KnowledgeChunk } from '../models';

/**
 * Turns dataset rows into knowledge chunks: the question as one chunk,
 * and the answer column (when present) as overlapping word windows.
 */
export class DocumentProcessor implements IDocumentProcessor {
  private readonly logger: Logger;
  private readonly configService: IConfigService;
  private readonly answerColumn: string;

  constructor(logger: Logger, configService: IConfigService, answerColumn = 'Answer') {
    this.logger = logger;
    this.configService = configService;
    this.answerColumn = answerColumn;
  }

  chunkRow(row: DatasetRow, rowIndex: number): KnowledgeChunk[] {
    const documentId = `row-${rowIndex}`;
    const question = this.extractText(row.Question);

    if (question.length === 0) {
      this.logger.warn(`No question text to index for ${documentId}`);
      return [];
    }

    const pieces: Array<{ source: ChunkSource; content: string }> = [
      { source: 'question', content: question },
    ];

    const answer = row[this.answerColumn];
    if (typeof answer === 'string') {
      for (const window of this.splitIntoWindows(this.extractText(answer))) {
        pieces.push({ source: 'answer', content: window });
      }
    }

    return pieces.map((piece, chunkIndex) => ({
      id: `${documentId}-${chunkIndex}`,
      documentId,
      title: question,
      content: piece.content,
      metadata: {
        source: piece.source,
        rowIndex,
        chunkIndex,
        totalChunks: pieces.length,
      },
    }));
  }

  /**
   * Extract clean text from content
   * Removes markdown, HTML, and excessive whitespace
   */
  extractText(content: string): string {
    let text = content;

    // Code blocks go before anything that could match inside them
    text = text.replace(/```[\s\S]*?```/g, ' ');
    text = text.replace(/<[^>]*>/g, ' ');
    text = text.replace(/\[([^\]]+)\]\([^)]+\)/g, '$1');
    text = text.replace(/^#+\s+/gm, '');
    text = text.replace(/`([^`]+)`/g, '$1');
    text = text.replace(/[*_~]/g, '');
    text = text.replace(/https?:\/\/[^\s]+/g, ' ');

    return text.replace(/\s+/g, ' ').trim();
  }

  private splitIntoWindows(text: string): string[] {
    if (text.length === 0) {
      return [];
    }

    const { chunkSize, chunkOverlap } = this.configService.getConfig();
    const words = text.split(' ');
    const step = Math.max(1, chunkSize - chunkOverlap);
    const windows: string[] = [];

    for (let start = 0; start < words.length; start += step) {
      windows.push(words.slice(start, start + chunkSize).join(' '));
      if (start + chunkSize >= words.length) {
        break;
      }
    }

    return windows;
  }
}
