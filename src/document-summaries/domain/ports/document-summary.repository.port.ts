import {
  DocumentSummary,
  NewDocumentSummary,
} from '../entities/document-summary.entity';
import { DocumentType } from '../enums/document-type.enum';
import { SummaryStatus } from '../enums/summary-status.enum';
import { NullableType } from '../../../utils/types/nullable.type';

export interface SummaryQueryOptions {
  skip?: number;
  limit?: number;
  documentType?: DocumentType[];
  status?: SummaryStatus[];
}

export interface DocumentSummaryRepositoryPort {
  // Create/Update
  create(summary: NewDocumentSummary): Promise<DocumentSummary>;
  update(id: string, partial: Partial<NewDocumentSummary>): Promise<void>;
  updateStatus(
    id: string,
    status: SummaryStatus,
    fields?: Partial<NewDocumentSummary>,
  ): Promise<void>;

  // Read
  findById(id: string): Promise<NullableType<DocumentSummary>>;
  findMany(
    options?: SummaryQueryOptions,
  ): Promise<{ data: DocumentSummary[]; total: number }>;
  findAll(): Promise<DocumentSummary[]>; // Oldest first, for run reports
}
