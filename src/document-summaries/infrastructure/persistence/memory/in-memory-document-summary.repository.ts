import { Injectable, NotFoundException } from '@nestjs/common';
import { randomUUID } from 'crypto';
import {
  DocumentSummaryRepositoryPort,
  SummaryQueryOptions,
} from '../../../domain/ports/document-summary.repository.port';
import {
  DocumentSummary,
  NewDocumentSummary,
} from '../../../domain/entities/document-summary.entity';
import { SummaryStatus } from '../../../domain/enums/summary-status.enum';
import { NullableType } from '../../../../utils/types/nullable.type';

/**
 * Process-local summary store for CLI runs and tests.
 * Records are lost when the process exits.
 */
@Injectable()
export class InMemoryDocumentSummaryRepository
  implements DocumentSummaryRepositoryPort
{
  private readonly summaries = new Map<string, DocumentSummary>();
  private sequence = 0;

  async create(summary: NewDocumentSummary): Promise<DocumentSummary> {
    // Strictly increasing timestamps keep ordering stable within one millisecond
    const now = new Date(Date.now() + this.sequence++);
    const created: DocumentSummary = {
      ...summary,
      id: randomUUID(),
      createdAt: now,
      updatedAt: now,
    };
    this.summaries.set(created.id, created);
    return { ...created };
  }

  async update(
    id: string,
    partial: Partial<NewDocumentSummary>,
  ): Promise<void> {
    const existing = this.summaries.get(id);
    if (!existing) {
      throw new NotFoundException(`Summary ${id} not found`);
    }
    const defined = Object.fromEntries(
      Object.entries(partial).filter(([, value]) => value !== undefined),
    );
    this.summaries.set(id, { ...existing, ...defined, updatedAt: new Date() });
  }

  async updateStatus(
    id: string,
    status: SummaryStatus,
    fields?: Partial<NewDocumentSummary>,
  ): Promise<void> {
    await this.update(id, { ...fields, status });
  }

  async findById(id: string): Promise<NullableType<DocumentSummary>> {
    const summary = this.summaries.get(id);
    return summary ? { ...summary } : null;
  }

  async findMany(
    options?: SummaryQueryOptions,
  ): Promise<{ data: DocumentSummary[]; total: number }> {
    const matching = Array.from(this.summaries.values())
      .filter(
        (summary) =>
          (!options?.documentType?.length ||
            options.documentType.includes(summary.documentType)) &&
          (!options?.status?.length || options.status.includes(summary.status)),
      )
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());

    const skip = options?.skip ?? 0;
    const data =
      options?.limit !== undefined
        ? matching.slice(skip, skip + options.limit)
        : matching.slice(skip);

    return { data: data.map((summary) => ({ ...summary })), total: matching.length };
  }

  async findAll(): Promise<DocumentSummary[]> {
    return Array.from(this.summaries.values())
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map((summary) => ({ ...summary }));
  }
}
