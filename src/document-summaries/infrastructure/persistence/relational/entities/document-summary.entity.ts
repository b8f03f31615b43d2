import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
  ValueTransformer,
} from 'typeorm';
import { DocumentType } from '../../../../domain/enums/document-type.enum';
import { SummaryStatus } from '../../../../domain/enums/summary-status.enum';
import { ExtractedImage } from '../../../../domain/entities/document-summary.entity';
import {
  ChapterHeading,
  ClinicalTimeline,
  Diagnostics,
  ExtractedData,
  KeyConcept,
  PatientDemographics,
} from '../../../../domain/entities/extracted-data.entity';

// pg returns DECIMAL columns as strings
const decimalTransformer: ValueTransformer = {
  to: (value: number) => value,
  from: (value: string | null) => (value === null ? null : parseFloat(value)),
};

@Entity({ name: 'document_summaries' })
export class DocumentSummaryEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'document_key', type: 'varchar', length: 12 })
  @Index()
  documentKey!: string;

  @Column({ name: 'document_name', type: 'varchar', length: 255 })
  documentName!: string;

  @Column({ name: 'document_type', type: 'varchar', length: 50 })
  @Index()
  documentType!: DocumentType;

  @Column({
    type: 'decimal',
    precision: 5,
    scale: 4,
    transformer: decimalTransformer,
  })
  confidence!: number;

  @Column({ type: 'varchar', length: 20 })
  @Index()
  status!: SummaryStatus;

  @Column({ name: 'page_count', type: 'int' })
  pageCount!: number;

  // Summary fields (PHI)
  @Column({ type: 'jsonb', nullable: true })
  demographics?: PatientDemographics | null;

  @Column({ type: 'jsonb', nullable: true })
  timeline?: ClinicalTimeline | null;

  @Column({ type: 'jsonb', nullable: true })
  diagnostics?: Diagnostics | null;

  @Column({ name: 'chapter_structure', type: 'jsonb', nullable: true })
  chapterStructure?: ChapterHeading[] | null;

  @Column({ name: 'key_concepts', type: 'jsonb', nullable: true })
  keyConcepts?: KeyConcept[] | null;

  @Column({ name: 'extracted_images', type: 'jsonb', default: () => "'[]'" })
  extractedImages!: ExtractedImage[];

  @Column({ name: 'extracted_data', type: 'jsonb', nullable: true })
  extractedData?: ExtractedData | null;

  @Column({ name: 'source_text', type: 'text' })
  sourceText!: string;

  @Column({ name: 'chunk_count', type: 'int', default: 0 })
  chunkCount!: number;

  @Column({ name: 'artifact_folder', type: 'varchar', length: 320 })
  artifactFolder!: string;

  @Column({
    name: 'markdown_path',
    type: 'varchar',
    length: 500,
    nullable: true,
  })
  markdownPath?: string | null;

  @Column({ name: 'error_message', type: 'text', nullable: true })
  errorMessage?: string | null;

  @Column({ name: 'processed_at', type: 'timestamp', nullable: true })
  processedAt?: Date | null;

  @CreateDateColumn({ name: 'created_at' })
  @Index()
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
