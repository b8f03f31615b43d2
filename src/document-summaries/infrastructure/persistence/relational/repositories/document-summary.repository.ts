import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, In, Repository } from 'typeorm';
import {
  DocumentSummaryRepositoryPort,
  SummaryQueryOptions,
} from '../../../../domain/ports/document-summary.repository.port';
import {
  DocumentSummary,
  NewDocumentSummary,
} from '../../../../domain/entities/document-summary.entity';
import { SummaryStatus } from '../../../../domain/enums/summary-status.enum';
import { DocumentSummaryEntity } from '../entities/document-summary.entity';
import { DocumentSummaryMapper } from '../mappers/document-summary.mapper';
import { NullableType } from '../../../../../utils/types/nullable.type';

@Injectable()
export class DocumentSummaryRepositoryAdapter
  implements DocumentSummaryRepositoryPort
{
  private readonly logger = new Logger(DocumentSummaryRepositoryAdapter.name);

  constructor(
    @InjectRepository(DocumentSummaryEntity)
    private readonly summaryRepository: Repository<DocumentSummaryEntity>,
  ) {}

  async create(summary: NewDocumentSummary): Promise<DocumentSummary> {
    const entity = DocumentSummaryMapper.toPersistence(summary);
    const saved = await this.summaryRepository.save(entity);
    return DocumentSummaryMapper.toDomain(saved);
  }

  async update(
    id: string,
    partial: Partial<NewDocumentSummary>,
  ): Promise<void> {
    const entity = await this.summaryRepository.findOne({ where: { id } });
    if (!entity) {
      throw new NotFoundException(`Summary ${id} not found`);
    }
    await this.summaryRepository.save(
      this.summaryRepository.merge(entity, partial),
    );
  }

  async updateStatus(
    id: string,
    status: SummaryStatus,
    fields?: Partial<NewDocumentSummary>,
  ): Promise<void> {
    this.logger.debug(`[REPOSITORY] Summary ${id} → ${status}`);
    await this.update(id, { ...fields, status });
  }

  async findById(id: string): Promise<NullableType<DocumentSummary>> {
    const entity = await this.summaryRepository.findOne({ where: { id } });
    return entity ? DocumentSummaryMapper.toDomain(entity) : null;
  }

  async findMany(
    options?: SummaryQueryOptions,
  ): Promise<{ data: DocumentSummary[]; total: number }> {
    const where: FindOptionsWhere<DocumentSummaryEntity> = {};
    if (options?.documentType?.length) {
      where.documentType = In(options.documentType);
    }
    if (options?.status?.length) {
      where.status = In(options.status);
    }

    const [entities, total] = await this.summaryRepository.findAndCount({
      where,
      skip: options?.skip,
      take: options?.limit,
      order: { createdAt: 'DESC' },
    });

    return {
      data: entities.map(DocumentSummaryMapper.toDomain),
      total,
    };
  }

  async findAll(): Promise<DocumentSummary[]> {
    const entities = await this.summaryRepository.find({
      order: { createdAt: 'ASC' },
    });
    return entities.map(DocumentSummaryMapper.toDomain);
  }
}
